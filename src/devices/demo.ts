/**
 * Demo card: a typical stereo analogue codec.
 *
 * Stereo playback paths for Master, PCM and Headphone, a mono microphone
 * boost, a stereo capture path with a source selector, and one card-level
 * control that the mixer backends ignore.
 */

import type { CardControl, CardProfile } from "./types.js";

const playback: CardControl[] = [
  { name: "Master Playback Volume", type: "integer", count: 2, range: [0, 63], db: [-9450, 0], initial: 40 },
  { name: "Master Playback Switch", type: "boolean", count: 2, initial: 1 },
  { name: "Headphone Playback Volume", type: "integer", count: 2, range: [0, 31], db: [-4650, 0], initial: 20 },
  { name: "Headphone Playback Switch", type: "boolean", count: 2, initial: 0 },
  { name: "PCM Playback Volume", type: "integer", count: 2, range: [0, 255], db: [-5100, 0], initial: 200 },
  { name: "Mic Boost Volume", type: "integer", count: 1, range: [0, 3], db: [0, 3000], initial: 0 },
];

const capture: CardControl[] = [
  { name: "Capture Volume", type: "integer", count: 2, range: [0, 31], db: [-1200, 3450], initial: 16 },
  { name: "Capture Switch", type: "boolean", count: 2, initial: 1 },
  { name: "Capture Source", type: "enumerated", count: 1, items: ["Mic", "Line", "CD"], initial: 0 },
];

const card: CardControl[] = [
  { name: "Jack Detect", iface: "card", type: "boolean", count: 1, initial: 0 },
];

export const demoProfile: CardProfile = {
  name: "demo",
  label: "Demo stereo codec",
  controls: [...playback, ...capture, ...card],
};
