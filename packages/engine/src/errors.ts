import type { ZodIssue } from "zod";

/**
 * Raised when `assess` receives input it cannot normalize: a subject that is
 * not a string, a score map that is not an object, or a non-finite score.
 * Missing dimensions and out-of-range scores are never errors.
 */
export class AssessmentInputError extends Error {
  constructor(message: string, public path: string) {
    super(message);
    this.name = "AssessmentInputError";
  }

  static fromIssue(issue: ZodIssue, root: string): AssessmentInputError {
    const path = [root, ...issue.path.map(String)].join(".");
    return new AssessmentInputError(`${path}: ${issue.message}`, path);
  }
}

export const isAssessmentInputError = (error: unknown): error is AssessmentInputError =>
  error instanceof AssessmentInputError;
