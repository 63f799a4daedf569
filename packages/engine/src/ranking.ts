import type { AssessmentReport, RankEntry } from "./schemas.js";

type Rankable = Pick<AssessmentReport, "subject" | "level_name" | "average_score">;

/**
 * Rank reports by average score, highest first. Equal scores keep their input
 * order and still get consecutive ranks. The input array is not touched.
 */
export function compareReports(reports: readonly Rankable[]): RankEntry[] {
  return [...reports]
    .sort((a, b) => b.average_score - a.average_score)
    .map((r, i) => ({
      rank: i + 1,
      subject: r.subject,
      level: r.level_name,
      score: r.average_score,
    }));
}
