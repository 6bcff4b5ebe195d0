import { vi } from "vitest";
import { OK, ok } from "../../src/core/errors.js";
import type { MixerElement } from "../../src/core/mixer.js";
import type { Direction, ElementOps } from "../../src/core/types.js";

/** Capability table whose every entry is a spy; `channels` controls hasChannel. */
export function stubOps(channels = 2) {
  return {
    isActive: vi.fn(() => true),
    hasChannel: vi.fn((_elem: MixerElement, _dir: Direction, channel: number) => channel >= 0 && channel < channels),
    isEnumerated: vi.fn(() => true),
    getEnumCount: vi.fn(() => ok(3)),
    getChannels: vi.fn(() => channels),
    getRange: vi.fn(() => ok({ min: 0, max: 100 })),
    setRange: vi.fn(() => OK),
    getDbRange: vi.fn(() => ok({ min: -6000, max: 0 })),
    askVolDb: vi.fn(() => ok(-600)),
    askDbVol: vi.fn(() => ok(90)),
    getVolume: vi.fn(() => ok(42)),
    getDb: vi.fn(() => ok(-1200)),
    setVolume: vi.fn(() => OK),
    setDb: vi.fn(() => OK),
    getSwitch: vi.fn(() => ok(true)),
    setSwitch: vi.fn(() => OK),
    enumItemName: vi.fn(() => ok("Line")),
    getEnumItem: vi.fn(() => ok(1)),
    setEnumItem: vi.fn(() => OK),
  } satisfies ElementOps;
}
