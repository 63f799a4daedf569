import { z } from "zod";
import { LEVEL_NAMES } from "./levels.js";

export const LevelNameSchema = z.enum(LEVEL_NAMES);

/** Raw caller input: any keys, finite numeric values. Unknown keys are ignored when scoring. */
export const RawScoresSchema = z.record(z.string(), z.number().finite());

export type RawScores = z.infer<typeof RawScoresSchema>;

export const AssessmentInputSchema = z.object({
  subject: z.string(),
  scores: RawScoresSchema.default({}),
});

export type AssessmentInput = z.infer<typeof AssessmentInputSchema>;

export const AssessmentInputListSchema = z.array(AssessmentInputSchema);

export const DimensionReportSchema = z.object({
  score: z.number().min(0).max(1),
  reliability: z.number().min(0).max(1),
});

export const AssessmentReportSchema = z.object({
  subject: z.string(),
  sentience_level: z.number().int().min(0).max(7),
  level_name: LevelNameSchema,
  level_description: z.string(),
  average_score: z.number().min(0).max(1),
  dimensions: z.record(z.string(), DimensionReportSchema),
  timestamp: z.string(),
  proof_hash: z.string().regex(/^[0-9a-f]{64}$/),
});

export type AssessmentReport = z.infer<typeof AssessmentReportSchema>;

export const AssessmentReportListSchema = z.array(AssessmentReportSchema);

export const RankEntrySchema = z.object({
  rank: z.number().int().positive(),
  subject: z.string(),
  level: z.string(),
  score: z.number(),
});

export type RankEntry = z.infer<typeof RankEntrySchema>;

// ---------------------------------------------------------------------------
// Document parsing (CLI input files, saved reports)
// ---------------------------------------------------------------------------

export type ParseOutcome<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

function failure(error: z.ZodError): { success: false; errors: string[] } {
  return {
    success: false,
    errors: error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
  };
}

/**
 * Accepts a single `{ subject, scores }` object or a list of them.
 */
export function parseAssessmentInputs(data: unknown): ParseOutcome<AssessmentInput[]> {
  if (Array.isArray(data)) {
    const result = AssessmentInputListSchema.safeParse(data);
    return result.success ? { success: true, data: result.data } : failure(result.error);
  }
  const result = AssessmentInputSchema.safeParse(data);
  return result.success ? { success: true, data: [result.data] } : failure(result.error);
}

/**
 * Accepts a single report record or a list of them, as written by `assess --format json`.
 */
export function parseAssessmentReports(data: unknown): ParseOutcome<AssessmentReport[]> {
  if (Array.isArray(data)) {
    const result = AssessmentReportListSchema.safeParse(data);
    return result.success ? { success: true, data: result.data } : failure(result.error);
  }
  const result = AssessmentReportSchema.safeParse(data);
  return result.success ? { success: true, data: [result.data] } : failure(result.error);
}
