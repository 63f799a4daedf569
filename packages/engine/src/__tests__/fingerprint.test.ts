import { describe, it, expect } from "vitest";
import { canonicalize, fingerprint } from "../fingerprint.js";

describe("canonicalize", () => {
  it("sorts keys and separates entries with \", \" and \": \"", () => {
    expect(canonicalize({ self_modeling: 1, metacognition: 0.5 })).toBe(
      '{"metacognition": 0.5, "self_modeling": 1}',
    );
  });

  it("renders an empty map as {}", () => {
    expect(canonicalize({})).toBe("{}");
  });

  it("keeps raw values, including out-of-range ones", () => {
    expect(canonicalize({ self_modeling: -0.5 })).toBe('{"self_modeling": -0.5}');
  });
});

describe("fingerprint", () => {
  it("hashes the canonical form with SHA-256", () => {
    expect(fingerprint({})).toBe(
      "44136fa355b3678a1146ad16f7e8649e94fb4fc21fe77e8310c060f61caaff8a",
    );
    expect(fingerprint({ self_modeling: 1, metacognition: 0.5 })).toBe(
      "546407f885bdbf35579fc7ae8376758670e28e099a23e46cf8915582e0af8494",
    );
  });

  it("does not depend on key insertion order", () => {
    const a = fingerprint({ metacognition: 0.5, self_modeling: 1 });
    const b = fingerprint({ self_modeling: 1, metacognition: 0.5 });
    expect(a).toBe(b);
  });

  it("changes when any raw value changes", () => {
    expect(fingerprint({ metacognition: 0.5 })).not.toBe(fingerprint({ metacognition: 0.51 }));
  });
});
