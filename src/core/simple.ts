/**
 * Simple-element query/set surface.
 *
 * Every call checks the element's capability bits first and fails with
 * Unsupported without touching the capability table when a bit is
 * missing. Joined controls collapse every channel onto channel 0.
 */

import assert from "node:assert";

import { OK, fail, type Result } from "./errors.js";
import type { MixerElement } from "./mixer.js";
import {
  Cap,
  Channel,
  type Direction,
  type Rounding,
  type VolumeRange,
} from "./types.js";

const CHANNEL_NAMES: Partial<Record<number, string>> = {
  [Channel.FrontLeft]: "Front Left",
  [Channel.FrontRight]: "Front Right",
  [Channel.RearLeft]: "Rear Left",
  [Channel.RearRight]: "Rear Right",
  [Channel.FrontCenter]: "Front Center",
  [Channel.Woofer]: "Woofer",
  [Channel.SideLeft]: "Side Left",
  [Channel.SideRight]: "Side Right",
  [Channel.RearCenter]: "Rear Center",
};

export function channelName(channel: number): string {
  assert(
    Number.isInteger(channel) && channel >= 0 && channel <= Channel.Last,
    `channel ${channel} out of range`,
  );
  return CHANNEL_NAMES[channel] ?? "?";
}

function hasCaps(elem: MixerElement, bits: number): boolean {
  return (elem.caps & bits) !== 0;
}

function unsupported(elem: MixerElement, what: string, dir?: Direction): Result<never> {
  const where = dir ? ` for ${dir}` : "";
  return fail("Unsupported", `element "${elem.name}" has no ${what}${where}`);
}

// ---------------------------------------------------------------------------
// Capability queries
// ---------------------------------------------------------------------------

export function hasVolume(elem: MixerElement, dir: Direction): boolean {
  switch (dir) {
    case "common":
      return hasCaps(elem, Cap.GVolume);
    case "playback":
      return hasCaps(elem, Cap.PVolume);
    case "capture":
      return hasCaps(elem, Cap.CVolume);
  }
}

export function hasVolumeJoined(elem: MixerElement, dir: Direction): boolean {
  if (dir === "playback") return hasCaps(elem, Cap.PVolumeJoin);
  if (dir === "capture") return hasCaps(elem, Cap.CVolumeJoin);
  return false;
}

export function hasSwitch(elem: MixerElement, dir: Direction): boolean {
  switch (dir) {
    case "common":
      return hasCaps(elem, Cap.GSwitch);
    case "playback":
      return hasCaps(elem, Cap.PSwitch);
    case "capture":
      return hasCaps(elem, Cap.CSwitch);
  }
}

export function hasSwitchJoined(elem: MixerElement, dir: Direction): boolean {
  if (dir === "playback") return hasCaps(elem, Cap.PSwitchJoin);
  if (dir === "capture") return hasCaps(elem, Cap.CSwitchJoin);
  return false;
}

export function hasSwitchExclusive(elem: MixerElement, dir: Direction): boolean {
  return dir === "capture" && hasCaps(elem, Cap.CSwitchExcl);
}

/** Exclusive capture group the element's switch belongs to. */
export function getGroup(elem: MixerElement, dir: Direction): Result<number> {
  if (dir !== "capture") return fail("InvalidArgument", "switch groups exist for capture only");
  if (!hasCaps(elem, Cap.CSwitchExcl)) return unsupported(elem, "exclusive switch group", dir);
  return { ok: true, value: elem.captureGroup };
}

export function isActive(elem: MixerElement): boolean {
  return elem.ops.isActive(elem);
}

export function hasChannel(elem: MixerElement, dir: Direction, channel: number): boolean {
  return elem.ops.hasChannel(elem, dir, channel);
}

export function getChannels(elem: MixerElement, dir: Direction): number {
  return elem.ops.getChannels(elem, dir);
}

// ---------------------------------------------------------------------------
// Volume
// ---------------------------------------------------------------------------

export function getVolumeRange(elem: MixerElement, dir: Direction): Result<VolumeRange> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  return elem.ops.getRange(elem, dir);
}

export function setVolumeRange(elem: MixerElement, dir: Direction, min: number, max: number): Result<void> {
  if (!(min < max)) return fail("InvalidArgument", `empty volume range [${min}, ${max}]`);
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  return elem.ops.setRange(elem, dir, { min, max });
}

export function getDbRange(elem: MixerElement, dir: Direction): Result<VolumeRange> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  return elem.ops.getDbRange(elem, dir);
}

export function askVolDb(elem: MixerElement, dir: Direction, value: number): Result<number> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  return elem.ops.askVolDb(elem, dir, value);
}

export function askDbVol(
  elem: MixerElement,
  dir: Direction,
  db: number,
  rounding: Rounding = 0,
): Result<number> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  return elem.ops.askDbVol(elem, dir, db, rounding);
}

export function getVolume(elem: MixerElement, dir: Direction, channel: number): Result<number> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  const chn = hasVolumeJoined(elem, dir) ? 0 : channel;
  return elem.ops.getVolume(elem, dir, chn);
}

export function getDb(elem: MixerElement, dir: Direction, channel: number): Result<number> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  const chn = hasVolumeJoined(elem, dir) ? 0 : channel;
  return elem.ops.getDb(elem, dir, chn);
}

export function setVolume(elem: MixerElement, dir: Direction, channel: number, value: number): Result<void> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  const chn = hasVolumeJoined(elem, dir) ? 0 : channel;
  return elem.ops.setVolume(elem, dir, chn, value);
}

export function setDb(
  elem: MixerElement,
  dir: Direction,
  channel: number,
  db: number,
  rounding: Rounding = 0,
): Result<void> {
  if (!hasVolume(elem, dir)) return unsupported(elem, "volume", dir);
  const chn = hasVolumeJoined(elem, dir) ? 0 : channel;
  return elem.ops.setDb(elem, dir, chn, db, rounding);
}

/**
 * Apply a per-channel setter to every channel the element has. A joined
 * control is done after channel 0.
 */
function forEachChannel(
  elem: MixerElement,
  dir: Direction,
  joined: boolean,
  set: (channel: number) => Result<void>,
): Result<void> {
  for (let chn = 0; chn <= Channel.Last; chn++) {
    if (!hasChannel(elem, dir, chn)) continue;
    const res = set(chn);
    if (!res.ok) return res;
    if (chn === 0 && joined) return OK;
  }
  return OK;
}

export function setVolumeAll(elem: MixerElement, dir: Direction, value: number): Result<void> {
  return forEachChannel(elem, dir, hasVolumeJoined(elem, dir), (chn) =>
    setVolume(elem, dir, chn, value),
  );
}

export function setDbAll(elem: MixerElement, dir: Direction, db: number, rounding: Rounding = 0): Result<void> {
  return forEachChannel(elem, dir, hasVolumeJoined(elem, dir), (chn) =>
    setDb(elem, dir, chn, db, rounding),
  );
}

// ---------------------------------------------------------------------------
// Switch
// ---------------------------------------------------------------------------

export function getSwitch(elem: MixerElement, dir: Direction, channel: number): Result<boolean> {
  if (!hasSwitch(elem, dir)) return unsupported(elem, "switch", dir);
  const chn = hasSwitchJoined(elem, dir) ? 0 : channel;
  return elem.ops.getSwitch(elem, dir, chn);
}

export function setSwitch(elem: MixerElement, dir: Direction, channel: number, on: boolean): Result<void> {
  if (!hasSwitch(elem, dir)) return unsupported(elem, "switch", dir);
  const chn = hasSwitchJoined(elem, dir) ? 0 : channel;
  return elem.ops.setSwitch(elem, dir, chn, on);
}

export function setSwitchAll(elem: MixerElement, dir: Direction, on: boolean): Result<void> {
  return forEachChannel(elem, dir, hasSwitchJoined(elem, dir), (chn) =>
    setSwitch(elem, dir, chn, on),
  );
}

// ---------------------------------------------------------------------------
// Enumerated
// ---------------------------------------------------------------------------

function hasEnum(elem: MixerElement): boolean {
  return hasCaps(elem, Cap.PEnum | Cap.CEnum);
}

export function isEnum(elem: MixerElement, dir: Direction): boolean {
  if (!hasEnum(elem)) return false;
  return elem.ops.isEnumerated(elem, dir);
}

export function getEnumItems(elem: MixerElement): Result<number> {
  if (!hasEnum(elem)) return unsupported(elem, "enumerated items");
  return elem.ops.getEnumCount(elem);
}

export function getEnumItemName(elem: MixerElement, item: number): Result<string> {
  if (!hasEnum(elem)) return unsupported(elem, "enumerated items");
  return elem.ops.enumItemName(elem, item);
}

export function getEnumItem(elem: MixerElement, channel: number): Result<number> {
  if (!hasEnum(elem)) return unsupported(elem, "enumerated items");
  return elem.ops.getEnumItem(elem, channel);
}

export function setEnumItem(elem: MixerElement, channel: number, item: number): Result<void> {
  if (!hasEnum(elem)) return unsupported(elem, "enumerated items");
  return elem.ops.setEnumItem(elem, channel, item);
}
