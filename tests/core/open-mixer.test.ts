import { describe, it, expect, vi } from "vitest";
import { OK, fail, ok } from "../../src/core/errors.js";
import { openMixer } from "../../src/core/open-mixer.js";
import type { MixerBackend } from "../../src/backends/types.js";
import { VirtualCard } from "../../src/transport/virtual-card.js";
import { testConfig } from "../fixtures/demo-mixer.js";

const openCard = () =>
  ok(
    new VirtualCard("card", [
      { name: "PCM Playback Volume", type: "integer", count: 2, range: [0, 255] },
      { name: "Master Playback Volume", type: "integer", count: 2, range: [0, 63] },
      { name: "Capture Switch", type: "boolean", count: 2 },
    ]),
  );

describe("openMixer", () => {
  it("follows aliases and names the mixer after the definition", async () => {
    const res = await openMixer({ name: "master", config: testConfig, openControl: openCard });
    expect(res.ok && res.value.name).toBe("default");
  });

  it("loads the fixture controls in weight order", async () => {
    const res = await openMixer({ name: "default", config: testConfig, openControl: openCard });
    if (!res.ok) throw res.error;
    expect([...res.value].map((e) => e.name)).toEqual(["Master", "PCM", "Capture"]);
    expect([...res.value.controls[0]].map((c) => c.name)).toEqual([
      "Master Playback Volume",
      "PCM Playback Volume",
      "Capture Switch",
    ]);
  });

  it("prefers a backend passed by the caller", async () => {
    const open = vi.fn(() => OK);
    const backend: MixerBackend = { type: "basic", open };
    const res = await openMixer({
      name: "default",
      config: testConfig,
      openControl: openCard,
      backends: [backend],
    });
    expect(res.ok && res.value.count).toBe(0);
    expect(open).toHaveBeenCalledTimes(1);
  });

  it("reports an unknown definition", async () => {
    const res = await openMixer({ name: "nowhere", config: testConfig, openControl: openCard });
    expect(res.ok ? null : res.error.code).toBe("NotFound");
  });

  it("reports a device that cannot be opened", async () => {
    const res = await openMixer({
      name: "default",
      config: testConfig,
      openControl: () => fail("NotFound", "no such card"),
    });
    expect(res.ok ? null : res.error.message).toBe("no such card");
  });

  it("closes the mixer when loading fails", async () => {
    const card = new VirtualCard("card", [
      { name: "Master Playback Volume", type: "integer", count: 2 },
      { name: "PCM Playback Volume", type: "integer", count: 2 },
    ]);
    const res = await openMixer({
      name: "default",
      config: testConfig,
      openControl: () => ok(card),
      controlCapacity: 1,
    });
    expect(res.ok ? null : res.error.code).toBe("OutOfMemory");
    expect(card.isClosed).toBe(true);
  });
});
