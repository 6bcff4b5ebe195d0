import { describe, it, expect } from "vitest";
import { cardNames, getCard } from "../src/devices/index.js";
import { demoProfile } from "../src/devices/demo.js";

describe("card profiles", () => {
  it("finds a profile by device name, ignoring case", () => {
    expect(getCard("demo")).toEqual({ ok: true, value: demoProfile });
    expect(getCard("Demo")).toEqual({ ok: true, value: demoProfile });
    expect(cardNames()).toEqual(["demo"]);
  });

  it("reports NotFound with the known names for an unknown device", () => {
    const res = getCard("sb16");
    expect(res.ok ? null : res.error.code).toBe("NotFound");
    expect(res.ok ? null : res.error.message).toBe('no card profile "sb16" (known: demo)');
  });
});
