/**
 * Config loader — reads and validates `.sentiscore.yml` configuration files.
 * Uses Zod for schema validation and suggests the closest valid value on typos.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { LEVEL_NAMES, findLevelByName, type LevelName } from "./levels.js";
import type { AssessmentReport } from "./schemas.js";
import { logger } from "./logger.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILENAME = ".sentiscore.yml";

export const VALID_FORMATS = ["table", "json", "markdown"] as const;
export type OutputFormat = typeof VALID_FORMATS[number];

export interface SentiscoreConfig {
  /** Maximum assessments kept in engine history; null keeps everything */
  history_limit: number | null;
  /** Level name below which the CLI exits non-zero */
  fail_below: LevelName | null;
  /** Default CLI output format */
  format: OutputFormat;
}

export const DEFAULT_CONFIG: SentiscoreConfig = {
  history_limit: null,
  fail_below: null,
  format: "table",
};

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const sentiscoreConfigSchema = z.object({
  history_limit: z.number().int().positive().nullable().optional(),
  fail_below: z.string().nullable().optional(),
  format: z.string().optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

export function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some((f) => f === value);
}

function hint(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? ` — did you mean '${suggestion}'?` : "";
}

/**
 * Resolve a level name from config or a CLI flag, warning with a suggestion
 * when it does not match. Returns null for unknown names.
 */
export function parseLevelName(raw: string, source: string): LevelName | null {
  const level = findLevelByName(raw);
  if (level) return level.name;
  logger.warn(`Warning: unknown level '${raw}' in ${source}${hint(raw, LEVEL_NAMES)}`);
  return null;
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.sentiscore.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): SentiscoreConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILENAME));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    logger.warn(`Warning: could not read ${CONFIG_FILENAME} — ${errorMessage(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err) {
    logger.warn(`Warning: could not parse ${CONFIG_FILENAME} — ${errorMessage(err)}. Using defaults.`);
    return { ...DEFAULT_CONFIG };
  }

  if (!parsed || typeof parsed !== "object") return { ...DEFAULT_CONFIG };

  const result = sentiscoreConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return { ...DEFAULT_CONFIG };
  }

  const data = result.data;

  const knownKeys = new Set(["history_limit", "fail_below", "format"]);
  for (const key of Object.keys(data)) {
    if (!knownKeys.has(key)) {
      logger.warn(`Warning: unknown config key '${key}'`);
    }
  }

  const config: SentiscoreConfig = { ...DEFAULT_CONFIG };

  if (data.history_limit !== undefined) {
    config.history_limit = data.history_limit;
  }

  if (typeof data.fail_below === "string") {
    config.fail_below = parseLevelName(data.fail_below, CONFIG_FILENAME);
  }

  if (data.format !== undefined) {
    if (isOutputFormat(data.format)) {
      config.format = data.format;
    } else {
      logger.warn(
        `Warning: invalid format '${data.format}'${hint(data.format, VALID_FORMATS)}. Using default '${DEFAULT_CONFIG.format}'.`,
      );
    }
  }

  return config;
}

/**
 * True when the report's level sits below the configured `fail_below` level.
 */
export function isBelowThreshold(
  report: Pick<AssessmentReport, "sentience_level">,
  config: Pick<SentiscoreConfig, "fail_below">,
): boolean {
  if (!config.fail_below) return false;
  const floor = findLevelByName(config.fail_below);
  return floor !== undefined && report.sentience_level < floor.value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
