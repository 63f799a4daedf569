import { compareReports, parseAssessmentReports, logger, type AssessmentReport } from "@sentiscore/engine";
import { formatRanking } from "../formatter.js";
import { readDocument, emit } from "../io.js";

export interface CompareOptions {
  files: string[];
  cwd: string;
  format: "table" | "json";
  output?: string;
  noColor: boolean;
}

/**
 * Rank saved reports (from `assess --format json`) across one or more files.
 * Returns the process exit code.
 */
export function runCompare(options: CompareOptions): number {
  if (options.files.length === 0) {
    logger.error("Error: compare needs at least one report file");
    return 1;
  }

  const reports: AssessmentReport[] = [];
  for (const file of options.files) {
    const document = readDocument(file, options.cwd);
    if (!document) return 1;

    const parsed = parseAssessmentReports(document.data);
    if (!parsed.success) {
      for (const error of parsed.errors) {
        logger.error(`Error: ${file}: ${error}`);
      }
      return 1;
    }
    reports.push(...parsed.data);
  }

  const output = formatRanking(compareReports(reports), options);
  return emit(output, options.output, options.cwd) ? 0 : 1;
}
