// CHANGE: Check URL claims and name counters shared by concurrent plugin tasks.
// WHY: Only the first claim of a URL is processed and repeated names get increasing suffixes.

import { describe, expect, it } from "vitest";
import { RunRegistry } from "../src/registry.js";

describe("RunRegistry", () => {
  it("grants only the first claim of a URL", () => {
    const registry = new RunRegistry();
    expect(registry.claimUrl("https://example.com/a.js")).toBe(true);
    expect(registry.claimUrl("https://example.com/a.js")).toBe(false);
    expect(registry.claimUrl("https://example.com/b.js")).toBe(true);
  });

  it("suffixes repeated names with an increasing counter", () => {
    const registry = new RunRegistry();
    expect(["Foo", "Foo", "Bar", "Foo"].map(name => registry.reserveName(name))).toEqual([
      "Foo",
      "Foo_1",
      "Bar",
      "Foo_2"
    ]);
    expect(registry.stats()).toEqual({ urls: 0, names: 2 });
  });
});
