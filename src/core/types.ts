/**
 * Simple-element types shared by the registry, the capability façade and
 * the backends.
 */

import type { Result } from "./errors.js";
import type { MixerElement } from "./mixer.js";

export type Direction = "playback" | "capture" | "common";

/** Longest simple-element name in UTF-8 bytes, leaving room for a terminator in 60. */
export const MIXER_ELEM_NAME_MAXLEN = 59;

export interface MixerElementId {
  name: string;
  index: number;
}

/** Capability bits. Bits 24-31 are free for backend use. */
export const Cap = {
  GVolume: 1 << 1,
  GSwitch: 1 << 2,
  PVolume: 1 << 3,
  PVolumeJoin: 1 << 4,
  PSwitch: 1 << 5,
  PSwitchJoin: 1 << 6,
  CVolume: 1 << 7,
  CVolumeJoin: 1 << 8,
  CSwitch: 1 << 9,
  CSwitchJoin: 1 << 10,
  CSwitchExcl: 1 << 11,
  PEnum: 1 << 12,
  CEnum: 1 << 13,
} as const;

export const Channel = {
  Unknown: -1,
  FrontLeft: 0,
  FrontRight: 1,
  RearLeft: 2,
  RearRight: 3,
  FrontCenter: 4,
  Woofer: 5,
  SideLeft: 6,
  SideRight: 7,
  RearCenter: 8,
  Last: 31,
  Mono: 0,
} as const;

export interface VolumeRange {
  min: number;
  max: number;
}

/** Rounding direction for dB → volume conversion: down, nearest, up. */
export type Rounding = -1 | 0 | 1;

/**
 * Capability table a backend binds to each simple element. The façade
 * checks capability bits before calling any of these.
 */
export interface ElementOps {
  isActive(elem: MixerElement): boolean;
  hasChannel(elem: MixerElement, dir: Direction, channel: number): boolean;
  isEnumerated(elem: MixerElement, dir: Direction): boolean;
  getEnumCount(elem: MixerElement): Result<number>;
  getChannels(elem: MixerElement, dir: Direction): number;
  getRange(elem: MixerElement, dir: Direction): Result<VolumeRange>;
  setRange(elem: MixerElement, dir: Direction, range: VolumeRange): Result<void>;
  getDbRange(elem: MixerElement, dir: Direction): Result<VolumeRange>;
  askVolDb(elem: MixerElement, dir: Direction, value: number): Result<number>;
  askDbVol(elem: MixerElement, dir: Direction, db: number, rounding: Rounding): Result<number>;
  getVolume(elem: MixerElement, dir: Direction, channel: number): Result<number>;
  getDb(elem: MixerElement, dir: Direction, channel: number): Result<number>;
  setVolume(elem: MixerElement, dir: Direction, channel: number, value: number): Result<void>;
  setDb(
    elem: MixerElement,
    dir: Direction,
    channel: number,
    db: number,
    rounding: Rounding,
  ): Result<void>;
  getSwitch(elem: MixerElement, dir: Direction, channel: number): Result<boolean>;
  setSwitch(elem: MixerElement, dir: Direction, channel: number, on: boolean): Result<void>;
  enumItemName(elem: MixerElement, item: number): Result<string>;
  getEnumItem(elem: MixerElement, channel: number): Result<number>;
  setEnumItem(elem: MixerElement, channel: number, item: number): Result<void>;
}
