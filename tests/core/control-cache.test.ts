import { describe, it, expect, vi } from "vitest";
import { compareControlsByNumid } from "../../src/core/compare-weight.js";
import { ControlCache, type ControlElement } from "../../src/core/control-cache.js";
import { MixerError } from "../../src/core/errors.js";
import { VirtualCard } from "../../src/transport/virtual-card.js";
import {
  EVENT_MASK_ADD,
  EVENT_MASK_REMOVE,
  EVENT_MASK_VALUE,
} from "../../src/transport/types.js";
import type { CardControl } from "../../src/devices/types.js";

const FIXTURE: CardControl[] = [
  { name: "PCM Playback Volume", type: "integer", count: 2, range: [0, 255] },
  { name: "Master Playback Volume", type: "integer", count: 2, range: [0, 63] },
  { name: "Capture Switch", type: "boolean", count: 2 },
];

const FIXTURE_ID = {
  numid: 0,
  iface: "mixer" as const,
  device: 0,
  subdevice: 0,
  name: "",
  index: 0,
};

function names(cache: ControlCache): string[] {
  return [...cache].map((elem) => elem.name);
}

function loaded(controls: CardControl[] = FIXTURE): { card: VirtualCard; cache: ControlCache } {
  const card = new VirtualCard("test", controls);
  card.subscribeEvents(true);
  const cache = new ControlCache(card);
  const res = cache.load();
  if (!res.ok) throw res.error;
  return { card, cache };
}

/** A card that gains a control between the sizing call and the fetch. */
class GrowingCard extends VirtualCard {
  readonly listCalls: number[] = [];
  private grown = false;

  override list(space: number) {
    this.listCalls.push(space);
    if (space > 0 && !this.grown) {
      this.grown = true;
      this.addControl({ name: "Headphone Playback Volume", type: "integer", count: 2, range: [0, 31] });
    }
    return super.list(space);
  }
}

describe("ControlCache", () => {
  it("loads controls in weight order", () => {
    const { cache } = loaded();
    expect(names(cache)).toEqual([
      "Master Playback Volume",
      "PCM Playback Volume",
      "Capture Switch",
    ]);
  });

  it("lists again when the card grows during load", () => {
    const card = new GrowingCard("test", FIXTURE);
    const cache = new ControlCache(card);
    expect(cache.load().ok).toBe(true);
    expect(card.listCalls).toEqual([0, 3, 4]);
    expect(names(cache)).toEqual([
      "Master Playback Volume",
      "Headphone Playback Volume",
      "PCM Playback Volume",
      "Capture Switch",
    ]);
  });

  it("announces each loaded control in sorted order", () => {
    const card = new VirtualCard("test", FIXTURE);
    const cache = new ControlCache(card);
    const seen: string[] = [];
    cache.setCallback((mask, elem) => {
      expect(mask).toBe(EVENT_MASK_ADD);
      seen.push(elem.name);
    });
    cache.load();
    expect(seen).toEqual(["Master Playback Volume", "PCM Playback Volume", "Capture Switch"]);
  });

  it("stops loading at the first callback error", () => {
    const card = new VirtualCard("test", FIXTURE);
    const cache = new ControlCache(card);
    cache.setCallback(() => new MixerError("Driver", "refused"));
    const res = cache.load();
    expect(res.ok ? null : res.error.message).toBe("refused");
  });

  it("stays empty when the controls do not fit", () => {
    const card = new VirtualCard("test", FIXTURE);
    const cache = new ControlCache(card, { capacity: 2 });
    const res = cache.load();
    expect(res.ok ? null : res.error.code).toBe("OutOfMemory");
    expect(cache.count).toBe(0);
  });

  it("refuses to load twice", () => {
    const { cache } = loaded();
    expect(() => cache.load()).toThrow("cache is already loaded");
  });

  it("truncates names to the driver limit", () => {
    const long = "Master Playback Volume With A Very Long Name Suffix";
    const { cache } = loaded([{ name: long, type: "integer", count: 1 }]);
    expect(cache.first()?.name).toBe(long.slice(0, 43));
  });

  it("truncates multi-byte names on a code point", () => {
    const long = `Mic ${"😀".repeat(12)}`;
    const { cache } = loaded([{ name: long, type: "integer", count: 1 }]);
    const first = cache.first();
    expect(first?.name).toBe(`Mic ${"😀".repeat(9)}`);
    expect(first && cache.find({ ...first.id, name: long })).toBe(first);
  });

  it("finds controls by id", () => {
    const { cache } = loaded();
    const master = cache.first();
    expect(master && cache.find(master.id)).toBe(master);
    expect(cache.find({ ...(master?.id ?? FIXTURE_ID), name: "Nope" })).toBeNull();
  });

  it("re-sorts by numid and restores the default", () => {
    const { cache } = loaded();
    expect(cache.setCompare(compareControlsByNumid).ok).toBe(true);
    expect(names(cache)).toEqual(FIXTURE.map((c) => c.name));
    cache.setCompare(null);
    expect(names(cache)[0]).toBe("Master Playback Volume");
  });

  it("keeps the previous order when the comparator throws", () => {
    const { cache } = loaded();
    const res = cache.setCompare(() => {
      throw new Error("bad");
    });
    expect(res.ok).toBe(false);
    expect(names(cache)[0]).toBe("Master Playback Volume");
  });

  it("inserts hot-plugged controls and announces them", () => {
    const { card, cache } = loaded();
    const cb = vi.fn();
    cache.setCallback(cb);
    card.addControl({ name: "Headphone Playback Volume", type: "integer", count: 2 });
    expect(cache.handleEvents()).toEqual({ ok: true, value: 1 });
    expect(names(cache)[1]).toBe("Headphone Playback Volume");
    expect(cb).toHaveBeenCalledTimes(1);
    expect(cb.mock.calls[0][0]).toBe(EVENT_MASK_ADD);
  });

  it("routes value events to the element callback", () => {
    const { card, cache } = loaded();
    const master = cache.first();
    if (!master) throw new Error("empty cache");
    const cb = vi.fn();
    master.setCallback(cb);
    master.write([5, 5]);
    cache.handleEvents();
    expect(cb).toHaveBeenCalledWith(EVENT_MASK_VALUE, master);
    expect(card.pendingEvents).toBe(0);
  });

  it("removes a control on a remove event", () => {
    const { card, cache } = loaded();
    const master = cache.first();
    if (!master) throw new Error("empty cache");
    const cb = vi.fn();
    master.setCallback(cb);
    card.removeControl(master.id);
    cache.handleEvents();
    expect(cb).toHaveBeenCalledWith(EVENT_MASK_REMOVE, master);
    expect(master.isReleased).toBe(true);
    expect(names(cache)).toEqual(["PCM Playback Volume", "Capture Switch"]);
    const read = master.read();
    expect(read.ok ? null : read.error.code).toBe("NotFound");
  });

  it("fails on a remove event for an unknown control", () => {
    const { cache } = loaded();
    const res = cache.handleEvent({ mask: EVENT_MASK_REMOVE, id: { ...FIXTURE_ID, name: "Ghost" } });
    expect(res.ok ? null : res.error.code).toBe("NotFound");
  });

  it("walks next/prev", () => {
    const { cache } = loaded();
    const first = cache.first();
    const second: ControlElement | null = first ? cache.next(first) : null;
    expect(second?.name).toBe("PCM Playback Volume");
    expect(second ? cache.prev(second) : null).toBe(first);
    expect(cache.last()?.name).toBe("Capture Switch");
  });

  it("frees from the last element, announcing each removal", () => {
    const { cache } = loaded();
    const order: string[] = [];
    for (const elem of cache) elem.setCallback((_mask, e) => void order.push(e.name));
    cache.free();
    expect(order).toEqual(["Capture Switch", "PCM Playback Volume", "Master Playback Volume"]);
    expect(cache.count).toBe(0);
  });
});
