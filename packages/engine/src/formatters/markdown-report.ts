/**
 * Markdown assessment report generator.
 *
 * Produces a standalone markdown document summarising one or more assessment
 * reports, with a ranking when several subjects are present.
 */

import type { AssessmentReport } from "../schemas.js";
import { getAllDimensions } from "../dimensions.js";
import { compareReports } from "../ranking.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  title?: string;
  timestamp?: string | Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function fixed(value: number): string {
  return value.toFixed(4);
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a complete markdown assessment report.
 */
export function generateMarkdownReport(
  reports: readonly AssessmentReport[],
  options?: ReportOptions,
): string {
  const title = options?.title ?? "Assessment";
  const ts =
    options?.timestamp instanceof Date
      ? options.timestamp.toISOString()
      : options?.timestamp ?? new Date().toISOString();

  const sections: string[] = [];

  sections.push(`# Sentience Report: ${title}`);
  sections.push("");
  sections.push(`*Generated: ${ts}*`);
  sections.push("");

  // ── Summary ───────────────────────────────────────────────────────────
  sections.push("## Summary");
  sections.push("");

  if (reports.length === 0) {
    sections.push("No assessments to report.");
    sections.push("");
  } else {
    sections.push("| Subject | Level | Average | Fingerprint |");
    sections.push("|---------|-------|---------|-------------|");
    for (const r of reports) {
      sections.push(
        `| ${escapeCell(r.subject)} | ${r.sentience_level} ${r.level_name} | ${fixed(r.average_score)} | \`${r.proof_hash.slice(0, 12)}\` |`,
      );
    }
    sections.push("");
  }

  // ── Ranking ───────────────────────────────────────────────────────────
  if (reports.length > 1) {
    sections.push("## Ranking");
    sections.push("");
    for (const entry of compareReports(reports)) {
      sections.push(`${entry.rank}. **${entry.subject}** (${entry.level}) - ${fixed(entry.score)}`);
    }
    sections.push("");
  }

  // ── Per-subject dimensions ────────────────────────────────────────────
  for (const r of reports) {
    sections.push(`## ${r.subject}`);
    sections.push("");
    sections.push(`**Level ${r.sentience_level}: ${r.level_name}** - ${r.level_description}`);
    sections.push("");
    sections.push("| Dimension | Score | Reliability |");
    sections.push("|-----------|-------|-------------|");
    for (const dim of getAllDimensions()) {
      const entry = r.dimensions[dim.name];
      if (!entry) continue;
      sections.push(`| ${dim.name} | ${fixed(entry.score)} | ${fixed(entry.reliability)} |`);
    }
    sections.push("");
    sections.push(`- **Assessed:** ${r.timestamp}`);
    sections.push(`- **Proof hash:** \`${r.proof_hash}\``);
    sections.push("");
  }

  sections.push("---");
  sections.push("*Report generated by sentiscore*");
  sections.push("");

  return sections.join("\n");
}
