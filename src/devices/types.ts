/**
 * Virtual sound-card profile types.
 */

import type { ElementInterface, ElementType } from "../transport/types.js";

export interface CardControl {
  /** Control name: "Master Playback Volume", "Capture Source" */
  name: string;
  /** Interface class; defaults to "mixer" */
  iface?: ElementInterface;
  /** Index among controls sharing a name */
  index?: number;
  type: ElementType;
  /** Number of channels */
  count: number;
  /** Raw value range [min, max]; booleans are always [0, 1] */
  range?: [number, number];
  /** dB range [min, max] in hundredths of a dB */
  db?: [number, number];
  /** Item names (enumerated controls) */
  items?: string[];
  /** Initial value for every channel */
  initial?: number;
}

export interface CardProfile {
  /** Card identifier: "demo" */
  name: string;
  /** Human-readable name */
  label: string;
  controls: CardControl[];
}
