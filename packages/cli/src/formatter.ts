import type { AssessmentReport, RankEntry, DimensionDefinition, Level, OutputFormat } from "@sentiscore/engine";
import { generateMarkdownReport, compareReports, getAllDimensions } from "@sentiscore/engine";

// ANSI escape codes — no dependencies needed
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const BG_GREEN = "\x1b[42m";
const BG_YELLOW = "\x1b[43m";
const BG_BLUE = "\x1b[44m";
const WHITE = "\x1b[37m";

export interface FormatOptions {
  format: OutputFormat;
  noColor?: boolean;
  /** Markdown report title. */
  title?: string;
}

type Paint = (color: string, text: string) => string;

function painter(noColor: boolean | undefined): Paint {
  if (noColor) return (_color, text) => text;
  return (color, text) => `${color}${text}${RESET}`;
}

function levelColor(level: number): string {
  if (level >= 6) return BG_GREEN + WHITE;
  if (level >= 4) return BG_BLUE + WHITE;
  if (level >= 2) return BG_YELLOW + WHITE;
  return BG_RED + WHITE;
}

function scoreColor(score: number): string {
  if (score > 0.5) return GREEN;
  if (score > 0) return YELLOW;
  return RED;
}

function banner(c: Paint, title: string): string[] {
  return [
    "",
    c(CYAN, "  ╔══════════════════════════════════════════╗"),
    c(CYAN, "  ║") + c(BOLD, title.padStart(21 + Math.ceil(title.length / 2)).padEnd(42)) + c(CYAN, "║"),
    c(CYAN, "  ╚══════════════════════════════════════════╝"),
    "",
  ];
}

// ---------------------------------------------------------------------------
// Assessment reports
// ---------------------------------------------------------------------------

export function formatReports(
  reports: AssessmentReport[],
  options: FormatOptions,
): string {
  switch (options.format) {
    case "json":
      return formatJson(reports);
    case "markdown":
      return generateMarkdownReport(reports, { title: options.title });
    case "table":
    default:
      return formatTable(reports, painter(options.noColor));
  }
}

/** One report prints as the bare record; several as an array. */
function formatJson(reports: AssessmentReport[]): string {
  return JSON.stringify(reports.length === 1 ? reports[0] : reports, null, 2);
}

function formatTable(reports: AssessmentReport[], c: Paint): string {
  const lines: string[] = banner(c, "SENTIENCE ASSESSMENT");

  if (reports.length === 0) {
    lines.push(c(DIM, "  No subjects assessed."));
    lines.push("");
    return lines.join("\n");
  }

  for (const r of reports) {
    const badge = c(levelColor(r.sentience_level), ` ${r.sentience_level} ${r.level_name} `);
    lines.push(`  ${c(BOLD, r.subject || "(unnamed)")}  ${badge}`);
    lines.push(`  Average: ${c(BOLD, r.average_score.toFixed(4))}  ${c(DIM, r.level_description)}`);
    lines.push("");

    for (const dim of getAllDimensions()) {
      const entry = r.dimensions[dim.name];
      if (!entry) continue;
      const score = c(scoreColor(entry.score), entry.score.toFixed(4));
      lines.push(`    ${dim.name.padEnd(26)}${score}  ${c(DIM, `reliability ${entry.reliability.toFixed(4)}`)}`);
    }
    lines.push("");
    lines.push(`  ${c(DIM, `proof ${r.proof_hash}`)}`);
    lines.push(`  ${c(DIM, r.timestamp)}`);
    lines.push("");
  }

  if (reports.length > 1) {
    lines.push(...formatRankingLines(compareReports(reports), c));
  }

  lines.push(c(DIM, "  ─".repeat(22)));
  lines.push(`  ${reports.length} subject${reports.length === 1 ? "" : "s"} assessed`);
  lines.push("");

  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

function formatRankingLines(ranking: RankEntry[], c: Paint): string[] {
  const lines: string[] = [];
  lines.push(c(BOLD, "  RANKING"));
  lines.push("");
  for (const entry of ranking) {
    lines.push(
      `  ${String(entry.rank).padStart(3)}. ${entry.subject.padEnd(24)}${entry.score.toFixed(4)}  ${c(DIM, entry.level)}`,
    );
  }
  lines.push("");
  return lines;
}

export function formatRanking(
  ranking: RankEntry[],
  options: Pick<FormatOptions, "format" | "noColor">,
): string {
  if (options.format === "json") return JSON.stringify(ranking, null, 2);

  const c = painter(options.noColor);
  const lines = banner(c, "RANKING");
  if (ranking.length === 0) {
    lines.push(c(DIM, "  No reports to rank."));
    lines.push("");
    return lines.join("\n");
  }
  lines.push(...formatRankingLines(ranking, c).slice(2));
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Registry listings
// ---------------------------------------------------------------------------

export function formatDimensionsTable(
  dimensions: readonly DimensionDefinition[],
  noColor?: boolean,
): string {
  const c = painter(noColor);
  const lines = banner(c, "DIMENSIONS");

  const nameW = 26;
  const testW = 26;
  lines.push(`  ${c(BOLD, "DIMENSION".padEnd(nameW))}${c(BOLD, "SUB-TEST".padEnd(testW))}${c(BOLD, "WEIGHT")}`);
  lines.push(`  ${"─".repeat(nameW + testW + 8)}`);

  let total = 0;
  for (const dim of dimensions) {
    dim.subTests.forEach((test, i) => {
      const label = i === 0 ? dim.name : "";
      lines.push(`  ${label.padEnd(nameW)}${test.name.padEnd(testW)}${test.weight.toFixed(2)}`);
      total++;
    });
  }

  lines.push("");
  lines.push(`  ${dimensions.length} dimensions, ${total} sub-tests`);
  lines.push("");
  return lines.join("\n");
}

export function formatLevelsTable(levels: readonly Level[], noColor?: boolean): string {
  const c = painter(noColor);
  const lines = banner(c, "LEVELS");

  lines.push(`  ${c(BOLD, "LVL".padEnd(5))}${c(BOLD, "NAME".padEnd(24))}${c(BOLD, "MIN AVG".padEnd(9))}${c(BOLD, "DESCRIPTION")}`);
  lines.push(`  ${"─".repeat(70)}`);

  for (const level of [...levels].reverse()) {
    const min = level.value === 0 ? "-" : level.threshold.toFixed(2);
    lines.push(
      `  ${String(level.value).padEnd(5)}${c(levelColor(level.value), level.name.padEnd(24))}${min.padEnd(9)}${level.description}`,
    );
  }

  lines.push("");
  return lines.join("\n");
}
