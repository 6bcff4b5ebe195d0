import { describe, it, expect } from "vitest";
import { VirtualCard } from "../../src/transport/virtual-card.js";
import {
  EVENT_MASK_ADD,
  EVENT_MASK_REMOVE,
  EVENT_MASK_VALUE,
  POLLIN,
  POLLNVAL,
  type ElementId,
} from "../../src/transport/types.js";
import { demoProfile } from "../../src/devices/demo.js";

function stereoCard(): VirtualCard {
  return new VirtualCard("test", [
    { name: "Master Playback Volume", type: "integer", count: 2, range: [0, 63], initial: 10 },
    { name: "Master Playback Switch", type: "boolean", count: 2, initial: 1 },
  ]);
}

function idOf(card: VirtualCard, name: string): ElementId {
  const listed = card.list(100);
  if (!listed.ok) throw listed.error;
  const id = listed.value.ids.find((candidate) => candidate.name === name);
  if (!id) throw new Error(`no ${name}`);
  return id;
}

describe("VirtualCard", () => {
  it("builds every control of a profile with sequential numids", () => {
    const card = VirtualCard.fromProfile(demoProfile);
    const listed = card.list(100);
    expect(listed.ok && listed.value.count).toBe(demoProfile.controls.length);
    expect(listed.ok && listed.value.ids.map((id) => id.numid)).toEqual(
      demoProfile.controls.map((_, i) => i + 1),
    );
  });

  it("reports the count without ids for a zero-space list", () => {
    const listed = stereoCard().list(0);
    expect(listed).toEqual({ ok: true, value: { count: 2, ids: [] } });
  });

  it("reads initial values and describes controls", () => {
    const card = stereoCard();
    const id = idOf(card, "Master Playback Volume");
    expect(card.read(id)).toEqual({ ok: true, value: [10, 10] });
    const info = card.info(id);
    expect(info.ok && { min: info.value.min, max: info.value.max, count: info.value.count }).toEqual({
      min: 0,
      max: 63,
      count: 2,
    });
  });

  it("looks controls up by name when numid is 0", () => {
    const card = stereoCard();
    const id = { ...idOf(card, "Master Playback Switch"), numid: 0 };
    expect(card.read(id)).toEqual({ ok: true, value: [1, 1] });
  });

  it("validates writes", () => {
    const card = stereoCard();
    const id = idOf(card, "Master Playback Volume");
    const short = card.write(id, [1]);
    const outside = card.write(id, [0, 64]);
    const fractional = card.write(id, [0.5, 1]);
    expect(short.ok ? null : short.error.code).toBe("InvalidArgument");
    expect(outside.ok ? null : outside.error.code).toBe("InvalidArgument");
    expect(fractional.ok ? null : fractional.error.code).toBe("InvalidArgument");
    expect(card.read(id)).toEqual({ ok: true, value: [10, 10] });
  });

  it("reports whether a write changed the value", () => {
    const card = stereoCard();
    const id = idOf(card, "Master Playback Volume");
    expect(card.write(id, [10, 10])).toEqual({ ok: true, value: false });
    expect(card.write(id, [20, 10])).toEqual({ ok: true, value: true });
  });

  it("queues events only while subscribed", () => {
    const card = stereoCard();
    const id = idOf(card, "Master Playback Volume");
    card.write(id, [1, 1]);
    expect(card.pendingEvents).toBe(0);

    card.subscribeEvents(true);
    card.write(id, [2, 2]);
    const event = card.readEvent();
    expect(event.ok && event.value?.mask).toBe(EVENT_MASK_VALUE);
    expect(event.ok && event.value?.id.numid).toBe(id.numid);
    expect(card.readEvent()).toEqual({ ok: true, value: null });
  });

  it("announces hot-plugged controls", () => {
    const card = stereoCard();
    card.subscribeEvents(true);
    const added = card.addControl({ name: "PCM Playback Volume", type: "integer", count: 2, range: [0, 255] });
    expect(added.ok && added.value.numid).toBe(3);
    const removed = added.ok ? card.removeControl(added.value) : added;
    expect(removed.ok).toBe(true);

    const first = card.readEvent();
    const second = card.readEvent();
    expect(first.ok && first.value?.mask).toBe(EVENT_MASK_ADD);
    expect(second.ok && second.value?.mask).toBe(EVENT_MASK_REMOVE);
    expect(card.list(0)).toEqual({ ok: true, value: { count: 2, ids: [] } });
  });

  it("rejects a duplicate control", () => {
    const card = stereoCard();
    const dup = card.addControl({ name: "Master Playback Switch", type: "boolean", count: 2 });
    expect(dup.ok ? null : dup.error.code).toBe("Busy");
  });

  it("reshapes values when the description changes", () => {
    const card = stereoCard();
    card.subscribeEvents(true);
    const id = idOf(card, "Master Playback Volume");
    expect(card.touchInfo(id, { count: 1, range: [0, 7] }).ok).toBe(true);
    const info = card.info(id);
    expect(info.ok && [info.value.count, info.value.min, info.value.max]).toEqual([1, 0, 7]);
    expect(card.read(id)).toEqual({ ok: true, value: [7] });
    card.touchInfo(id, { count: 3 });
    expect(card.read(id)).toEqual({ ok: true, value: [7, 7, 7] });
    expect(card.pendingEvents).toBe(2);
  });

  it("rejects description changes it cannot apply", () => {
    const card = stereoCard();
    const bad = card.touchInfo(idOf(card, "Master Playback Volume"), { count: 0 });
    expect(bad.ok ? null : bad.error.code).toBe("InvalidArgument");
    const fixed = card.touchInfo(idOf(card, "Master Playback Switch"), { range: [0, 5] });
    expect(fixed.ok ? null : fixed.error.code).toBe("InvalidArgument");
  });

  it("sets POLLIN while events are pending", () => {
    const card = stereoCard();
    card.subscribeEvents(true);
    expect(card.pollDescriptors()[0].revents).toBe(0);
    card.touchInfo(idOf(card, "Master Playback Switch"));
    expect(card.pollDescriptors()[0].revents).toBe(POLLIN);
  });

  it("times out a wait with nothing pending", async () => {
    const card = stereoCard();
    card.subscribeEvents(true);
    await expect(card.waitReady(0)).resolves.toBe(false);
    await expect(card.waitReady(10)).resolves.toBe(false);
  });

  it("wakes a waiter when an event arrives", async () => {
    const card = stereoCard();
    card.subscribeEvents(true);
    const waiting = card.waitReady(1000);
    setTimeout(() => card.touchInfo(idOf(card, "Master Playback Switch")), 5);
    await expect(waiting).resolves.toBe(true);
  });

  it("gives up a wait on abort", async () => {
    const card = stereoCard();
    card.subscribeEvents(true);
    const controller = new AbortController();
    const waiting = card.waitReady(1000, controller.signal);
    controller.abort();
    await expect(waiting).resolves.toBe(false);
  });

  it("refuses operations once closed", () => {
    const card = stereoCard();
    expect(card.close().ok).toBe(true);
    expect(card.pollDescriptors()[0].revents).toBe(POLLNVAL);
    const listed = card.list(0);
    expect(listed.ok ? null : listed.error.code).toBe("Io");
  });
});
