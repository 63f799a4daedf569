import {
  ScoreEngine,
  loadConfig,
  isBelowThreshold,
  isOutputFormat,
  parseLevelName,
  parseAssessmentInputs,
  logger,
  DEFAULT_CONFIG,
  VALID_FORMATS,
  type AssessmentReport,
  type LevelName,
} from "@sentiscore/engine";
import { formatReports } from "../formatter.js";
import { readDocument, emit } from "../io.js";

export interface AssessOptions {
  file: string;
  /** Directory holding `.sentiscore.yml`; relative paths resolve against it. */
  cwd: string;
  format?: string;
  output?: string;
  failBelow?: string;
  noColor: boolean;
}

/**
 * Score every subject in the input file and print the reports.
 * Returns the process exit code.
 */
export function runAssess(options: AssessOptions): number {
  const config = loadConfig(options.cwd) ?? DEFAULT_CONFIG;

  const format = options.format ?? config.format;
  if (!isOutputFormat(format)) {
    logger.error(`Error: invalid format '${format}'. Must be one of: ${VALID_FORMATS.join(", ")}`);
    return 1;
  }

  let failBelow: LevelName | null = config.fail_below;
  if (options.failBelow !== undefined) {
    failBelow = parseLevelName(options.failBelow, "--fail-below");
    if (!failBelow) return 1;
  }

  const document = readDocument(options.file, options.cwd);
  if (!document) return 1;

  const parsed = parseAssessmentInputs(document.data);
  if (!parsed.success) {
    for (const error of parsed.errors) {
      logger.error(`Error: ${options.file}: ${error}`);
    }
    return 1;
  }

  const engine = new ScoreEngine({ historyLimit: config.history_limit });
  const reports: AssessmentReport[] = parsed.data.map((input) => engine.assess(input.subject, input.scores));
  logger.debug(`assessed ${reports.length} subject(s) from ${options.file}`);

  const output = formatReports(reports, { format, noColor: options.noColor, title: options.file });
  if (!emit(output, options.output, options.cwd)) return 1;

  const failing = reports.filter((r) => isBelowThreshold(r, { fail_below: failBelow }));
  if (failing.length > 0) {
    for (const r of failing) {
      logger.error(`'${r.subject}' is at ${r.level_name}, below ${failBelow}`);
    }
    return 1;
  }

  return 0;
}
