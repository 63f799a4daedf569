import { describe, it, expect } from "vitest";
import { DIMENSION_NAMES, getAllDimensions, getDimension, isDimensionName } from "../dimensions.js";

describe("getAllDimensions", () => {
  it("returns the ten dimensions in registry order", () => {
    const names = getAllDimensions().map((d) => d.name);
    expect(names).toEqual([...DIMENSION_NAMES]);
    expect(names).toHaveLength(10);
  });

  it("every sub-test has a name, positive weight and description", () => {
    for (const dim of getAllDimensions()) {
      expect(dim.subTests.length).toBeGreaterThan(0);
      for (const test of dim.subTests) {
        expect(test.name).toBeTruthy();
        expect(test.weight).toBeGreaterThan(0);
        expect(test.description).toBeTruthy();
      }
    }
  });

  it("has no duplicate sub-test names within a dimension", () => {
    for (const dim of getAllDimensions()) {
      const names = dim.subTests.map((t) => t.name);
      expect(new Set(names).size).toBe(names.length);
    }
  });

  it("returns the same frozen table on every call", () => {
    const first = getAllDimensions();
    expect(getAllDimensions()).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first[0].subTests)).toBe(true);
  });
});

describe("getDimension", () => {
  it("looks up sub-test counts by name", () => {
    expect(getDimension("information_integration")?.subTests).toHaveLength(3);
    expect(getDimension("emotional_valence")?.subTests).toHaveLength(2);
    expect(getDimension("creative_generation")?.subTests).toHaveLength(4);
  });

  it("returns undefined for unknown names", () => {
    expect(getDimension("free_will")).toBeUndefined();
  });
});

describe("isDimensionName", () => {
  it("accepts registry names only", () => {
    expect(isDimensionName("metacognition")).toBe(true);
    expect(isDimensionName("Metacognition")).toBe(false);
    expect(isDimensionName("")).toBe(false);
  });
});
