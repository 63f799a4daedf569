/**
 * Assessment model: per-dimension results and the record one `assess` call
 * produces. Both are frozen once built.
 */

import type { DimensionDefinition, DimensionName } from "./dimensions.js";
import { levelForAverage, type Level } from "./levels.js";
import type { AssessmentReport } from "./schemas.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SCORED_CONFIDENCE = 0.85;
export const PASS_MARK = 0.5;
export const REPORT_PRECISION = 4;

export function clampScore(raw: number): number {
  if (raw < 0) return 0;
  if (raw > 1) return 1;
  return raw;
}

export function roundTo(value: number, digits: number = REPORT_PRECISION): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Arithmetic mean using Neumaier-compensated summation. A plain running sum of
 * ten 0.85s gives 8.499999999999998, putting an average that sits exactly on a
 * threshold one level low.
 */
export function meanOf(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  let compensation = 0;
  for (const value of values) {
    const next = sum + value;
    if (Math.abs(sum) >= Math.abs(value)) {
      compensation += sum - next + value;
    } else {
      compensation += value - next + sum;
    }
    sum = next;
  }
  return (sum + compensation) / values.length;
}

/** Explicit `+00:00` UTC offset rather than the `Z` suffix. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/Z$/, "+00:00");
}

// ---------------------------------------------------------------------------
// DimensionResult
// ---------------------------------------------------------------------------

export class DimensionResult {
  readonly name: DimensionName;
  readonly score: number;
  readonly confidence: number;
  readonly evidence: readonly string[];
  readonly testsPassed: number;
  readonly testsTotal: number;

  private constructor(
    name: DimensionName,
    score: number,
    testsPassed: number,
    testsTotal: number,
  ) {
    this.name = name;
    this.score = score;
    this.confidence = score > 0 ? SCORED_CONFIDENCE : 0;
    this.evidence = Object.freeze([]);
    this.testsPassed = testsPassed;
    this.testsTotal = testsTotal;
    Object.freeze(this);
  }

  /**
   * Score one dimension. The dimension's own clamped score is checked against
   * every sub-test, so either all sub-tests pass or none do.
   */
  static evaluate(definition: DimensionDefinition, raw: number): DimensionResult {
    const score = clampScore(raw);
    const total = definition.subTests.length;
    const passed = definition.subTests.filter(() => score > PASS_MARK).length;
    return new DimensionResult(definition.name, score, passed, total);
  }

  get reliability(): number {
    return this.testsTotal === 0 ? 0 : this.testsPassed / this.testsTotal;
  }
}

// ---------------------------------------------------------------------------
// Assessment
// ---------------------------------------------------------------------------

export class Assessment {
  readonly subject: string;
  readonly dimensions: ReadonlyMap<DimensionName, DimensionResult>;
  readonly timestamp: Date;
  readonly averageScore: number;
  readonly level: Level;

  constructor(subject: string, results: DimensionResult[], timestamp: Date) {
    this.subject = subject;
    this.dimensions = new Map(results.map((r) => [r.name, r]));
    this.timestamp = timestamp;

    this.averageScore = meanOf(results.map((r) => r.score));
    this.level = levelForAverage(this.averageScore);
    Object.freeze(this);
  }

  toReport(proofHash: string): AssessmentReport {
    const dimensions: AssessmentReport["dimensions"] = {};
    for (const [name, result] of this.dimensions) {
      dimensions[name] = {
        score: roundTo(result.score),
        reliability: roundTo(result.reliability),
      };
    }

    return {
      subject: this.subject,
      sentience_level: this.level.value,
      level_name: this.level.name,
      level_description: this.level.description,
      average_score: roundTo(this.averageScore),
      dimensions,
      timestamp: formatTimestamp(this.timestamp),
      proof_hash: proofHash,
    };
  }
}
