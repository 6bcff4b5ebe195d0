import { describe, it, expect } from "vitest";
import { Bag } from "../../src/core/bag.js";

describe("Bag", () => {
  it("adds each member once", () => {
    const bag = new Bag<string>();
    expect(bag.add("a")).toBe(true);
    expect(bag.add("a")).toBe(false);
    expect(bag.size).toBe(1);
  });

  it("reports deletion of absent members", () => {
    const bag = new Bag<string>();
    bag.add("a");
    expect(bag.delete("b")).toBe(false);
    expect(bag.delete("a")).toBe(true);
    expect(bag.empty).toBe(true);
  });

  it("iterates a snapshot", () => {
    const bag = new Bag<number>();
    bag.add(1);
    bag.add(2);
    const seen: number[] = [];
    for (const n of bag) {
      seen.push(n);
      bag.delete(n);
      bag.add(n + 10);
    }
    expect(seen).toEqual([1, 2]);
    expect(bag.toArray().sort((a, b) => a - b)).toEqual([11, 12]);
  });

  it("drains every member", () => {
    const bag = new Bag<string>();
    bag.add("x");
    bag.add("y");
    expect(bag.drain()).toEqual(["x", "y"]);
    expect(bag.empty).toBe(true);
  });
});
