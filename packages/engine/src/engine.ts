/**
 * ScoreEngine: turns a named score map into a levelled assessment report and
 * keeps the assessments it has produced.
 *
 * Pipeline per call: validate -> clamp each registry dimension -> average ->
 * threshold lookup -> fingerprint raw input -> append to history.
 */

import { getAllDimensions } from "./dimensions.js";
import { Assessment, DimensionResult } from "./assessment.js";
import { AssessmentInputError } from "./errors.js";
import { fingerprint } from "./fingerprint.js";
import { compareReports } from "./ranking.js";
import { RawScoresSchema, type AssessmentReport, type RankEntry, type RawScores } from "./schemas.js";
import { logger } from "./logger.js";

export interface ScoreEngineOptions {
  /** Keep at most this many assessments; oldest are dropped first. Unbounded when null or omitted. */
  historyLimit?: number | null;
  /** Clock used for assessment timestamps. */
  now?: () => Date;
}

export class ScoreEngine {
  private readonly _history: Assessment[] = [];
  private readonly historyLimit: number | null;
  private readonly now: () => Date;

  constructor(options: ScoreEngineOptions = {}) {
    const limit = options.historyLimit ?? null;
    if (limit !== null && (!Number.isInteger(limit) || limit < 1)) {
      throw new RangeError(`historyLimit must be a positive integer, got ${limit}`);
    }
    this.historyLimit = limit;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Score `rawScores` for `subject`. Missing dimensions count as 0, scores
   * outside [0, 1] are clamped and unknown keys are ignored. Throws
   * {@link AssessmentInputError} for a non-string subject or non-finite values,
   * which untyped callers can still pass.
   */
  assess(subject: string, rawScores: Readonly<Record<string, number>>): AssessmentReport {
    if (typeof subject !== "string") {
      throw new AssessmentInputError(
        `subject: expected string, received ${kindOf(subject)}`,
        "subject",
      );
    }

    const parsed = RawScoresSchema.safeParse(rawScores);
    if (!parsed.success) {
      throw AssessmentInputError.fromIssue(parsed.error.issues[0], "scores");
    }
    const scores: RawScores = parsed.data;

    const results = getAllDimensions().map((definition) =>
      DimensionResult.evaluate(definition, scores[definition.name] ?? 0),
    );

    const assessment = new Assessment(subject, results, this.now());
    const report = assessment.toReport(fingerprint(scores));
    this.record(assessment);

    logger.debug(
      `assessed '${subject}': average ${report.average_score} -> level ${report.sentience_level} (${report.level_name})`,
    );
    return report;
  }

  /**
   * Rank previously produced reports. Pure: history is neither read nor written.
   */
  compare(reports: readonly AssessmentReport[]): RankEntry[] {
    return compareReports(reports);
  }

  get history(): readonly Assessment[] {
    return this._history;
  }

  clearHistory(): void {
    this._history.length = 0;
  }

  private record(assessment: Assessment): void {
    this._history.push(assessment);
    if (this.historyLimit !== null && this._history.length > this.historyLimit) {
      const dropped = this._history.length - this.historyLimit;
      this._history.splice(0, dropped);
      logger.debug(`history limit ${this.historyLimit} reached, dropped ${dropped} oldest assessment(s)`);
    }
  }
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
