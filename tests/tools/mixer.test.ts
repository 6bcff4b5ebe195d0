import { describe, it, expect } from "vitest";
import { ok } from "../../src/core/errors.js";
import { Cap } from "../../src/core/types.js";
import { demoProfile } from "../../src/devices/demo.js";
import {
  executeHandleEvents,
  executeListControls,
  executeListElements,
  executeSetEnumItem,
  executeSetSwitch,
  executeSetVolume,
  formatCaps,
} from "../../src/tools/mixer.js";
import { MixerSession, openVirtualCard } from "../../src/tools/session.js";
import { VirtualCard } from "../../src/transport/virtual-card.js";
import { testConfig } from "../fixtures/demo-mixer.js";

function session(): MixerSession {
  return new MixerSession({
    config: testConfig,
    openControl: (device) => ok(new VirtualCard(device, demoProfile.controls)),
  });
}

const master = { mixer: "default", element: "Master", index: 0 };

describe("formatCaps", () => {
  it("lists capability names", () => {
    expect(formatCaps(Cap.PVolume | Cap.PSwitch)).toBe("pvolume,pswitch");
    expect(formatCaps(0)).toBe("none");
  });
});

describe("openVirtualCard", () => {
  it("opens registered cards and rejects others", () => {
    expect(openVirtualCard("demo").ok).toBe(true);
    const res = openVirtualCard("nope");
    expect(res.ok ? null : res.error.code).toBe("NotFound");
  });
});

describe("MixerSession", () => {
  it("keeps one mixer per definition name", async () => {
    const s = session();
    const first = await s.get("default");
    expect(await s.get("default")).toBe(first);
    await s.closeAll();
    expect(first.count).toBe(0);
  });

  it("retries a failed open", async () => {
    const s = session();
    await expect(s.get("nowhere")).rejects.toThrow('unknown mixer definition "nowhere"');
    await expect(s.get("nowhere")).rejects.toThrow("unknown mixer definition");
  });
});

describe("mixer tools", () => {
  it("lists raw controls in cache order", async () => {
    const text = await executeListControls(session(), { mixer: "default" });
    const lines = text.split("\n");
    expect(lines[0]).toBe("demo (10 controls)");
    expect(lines[1]).toBe('  #10 card "Jack Detect",0  weight=1000000000');
    expect(lines[2]).toBe('  #2 mixer "Master Playback Switch",0  weight=2003');
  });

  it("lists simple elements with values", async () => {
    const text = await executeListElements(session(), { mixer: "default" });
    const lines = text.split("\n");
    expect(lines[0]).toBe("default: 6 elements");
    expect(lines[1]).toBe('"Master",0  caps=pvolume,pswitch');
    expect(lines[2]).toBe("  playback volume [40, 40] range 0..63");
    expect(lines[3]).toBe("  playback switch [on, on]");
    expect(text).toContain('"Capture Source",0  caps=cenum\n  items [Mic, Line, CD] selected Mic');
  });

  it("sets the volume of every channel", async () => {
    const text = await executeSetVolume(session(), {
      ...master,
      direction: "playback",
      value: 50,
      db: false,
    });
    const lines = text.split("\n");
    expect(lines[0]).toBe('Set playback volume of "Master" all channels to 50');
    expect(lines[2]).toBe("  playback volume [50, 50] range 0..63");
  });

  it("sets one channel in dB", async () => {
    const text = await executeSetVolume(session(), {
      ...master,
      direction: "playback",
      channel: 1,
      value: 0,
      db: true,
    });
    const lines = text.split("\n");
    expect(lines[0]).toBe('Set playback volume of "Master" channel 1 (Front Right) to 0 (1/100 dB)');
    expect(lines[2]).toBe("  playback volume [40, 63] range 0..63");
  });

  it("reports a missing capability as an error", async () => {
    await expect(
      executeSetVolume(session(), { ...master, element: "Capture Source", direction: "capture", value: 1, db: false }),
    ).rejects.toThrow('element "Capture Source" has no volume for capture');
  });

  it("reports an unknown element", async () => {
    await expect(
      executeSetSwitch(session(), { ...master, element: "Bass", direction: "playback", on: true }),
    ).rejects.toThrow('No element "Bass",0 on default');
  });

  it("mutes a switch", async () => {
    const text = await executeSetSwitch(session(), { ...master, direction: "playback", channel: 0, on: false });
    const lines = text.split("\n");
    expect(lines[0]).toBe('Set playback switch of "Master" channel 0 (Front Left) off');
    expect(lines[3]).toBe("  playback switch [off, on]");
  });

  it("selects an item by name", async () => {
    const text = await executeSetEnumItem(session(), {
      ...master,
      element: "Capture Source",
      channel: 0,
      item: "Line",
    });
    expect(text).toBe('Selected item 1 ("Line") of "Capture Source" on channel 0');
  });

  it("rejects an unknown item name", async () => {
    await expect(
      executeSetEnumItem(session(), { ...master, element: "Capture Source", channel: 0, item: "Aux" }),
    ).rejects.toThrow('"Capture Source" has no item "Aux". Items: Mic, Line, CD');
  });

  it("counts the events produced by earlier changes", async () => {
    const s = session();
    await executeSetVolume(s, { ...master, direction: "playback", value: 10, db: false });
    expect(await executeHandleEvents(s, { mixer: "default" })).toBe(
      "default: handled events, 2 element events thrown",
    );
    expect(await executeHandleEvents(s, { mixer: "default" })).toBe(
      "default: handled events, 0 element events thrown",
    );
  });
});
