import { describe, it, expect } from "vitest";
import { parseAssessmentInputs, parseAssessmentReports } from "../schemas.js";
import { ScoreEngine } from "../engine.js";
import { FIXED_NOW } from "./fixtures.js";

describe("parseAssessmentInputs", () => {
  it("wraps a single input in a list and defaults missing scores", () => {
    expect(parseAssessmentInputs({ subject: "solo" })).toEqual({
      success: true,
      data: [{ subject: "solo", scores: {} }],
    });
  });

  it("accepts a list of inputs", () => {
    const outcome = parseAssessmentInputs([
      { subject: "a", scores: { metacognition: 0.4 } },
      { subject: "b", scores: {} },
    ]);
    expect(outcome.success && outcome.data.map((i) => i.subject)).toEqual(["a", "b"]);
  });

  it("reports issue paths for bad entries", () => {
    expect(parseAssessmentInputs([{ subject: "a", scores: { metacognition: "high" } }])).toEqual({
      success: false,
      errors: ["0.scores.metacognition: Expected number, received string"],
    });
  });

  it("rejects a non-string subject", () => {
    expect(parseAssessmentInputs({ subject: 42 })).toEqual({
      success: false,
      errors: ["subject: Expected string, received number"],
    });
  });

  it("labels root-level problems", () => {
    expect(parseAssessmentInputs(undefined)).toEqual({
      success: false,
      errors: ["(root): Required"],
    });
  });
});

describe("parseAssessmentReports", () => {
  const engine = new ScoreEngine({ now: () => FIXED_NOW });
  const report = engine.assess("round-trip", { metacognition: 0.7 });

  it("accepts reports the engine produced", () => {
    const data: unknown = JSON.parse(JSON.stringify([report, report]));
    const outcome = parseAssessmentReports(data);
    expect(outcome.success && outcome.data).toEqual([report, report]);
  });

  it("rejects an unknown level name", () => {
    const outcome = parseAssessmentReports({ ...report, level_name: "GODLIKE" });
    expect(outcome.success).toBe(false);
    expect(!outcome.success && outcome.errors[0].startsWith("level_name:")).toBe(true);
  });
});
