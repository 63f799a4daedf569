// ---------------------------------------------------------------------------
// @sentiscore/engine
//
// Dimension scoring engine. Shared by the CLI and any library consumer.
// ---------------------------------------------------------------------------

// Registry
export {
  DIMENSION_NAMES,
  getAllDimensions,
  getDimension,
  isDimensionName,
  type DimensionName,
  type DimensionDefinition,
  type SubTest,
} from "./dimensions.js";

// Levels
export {
  LEVEL_NAMES,
  levelForAverage,
  getAllLevels,
  getLevel,
  isLevelName,
  findLevelByName,
  type Level,
  type LevelName,
  type LevelValue,
} from "./levels.js";

// Schemas
export {
  LevelNameSchema,
  RawScoresSchema,
  AssessmentInputSchema,
  AssessmentInputListSchema,
  DimensionReportSchema,
  AssessmentReportSchema,
  AssessmentReportListSchema,
  RankEntrySchema,
  parseAssessmentInputs,
  parseAssessmentReports,
  type ParseOutcome,
  type RawScores,
  type AssessmentInput,
  type AssessmentReport,
  type RankEntry,
} from "./schemas.js";

// Scoring
export {
  Assessment,
  DimensionResult,
  clampScore,
  roundTo,
  meanOf,
  formatTimestamp,
  SCORED_CONFIDENCE,
  PASS_MARK,
  REPORT_PRECISION,
} from "./assessment.js";

export { ScoreEngine, type ScoreEngineOptions } from "./engine.js";
export { compareReports } from "./ranking.js";
export { canonicalize, fingerprint } from "./fingerprint.js";

// Errors
export { AssessmentInputError, isAssessmentInputError } from "./errors.js";

// Formatters
export {
  generateMarkdownReport,
  type ReportOptions,
} from "./formatters/markdown-report.js";

// Config
export {
  loadConfig,
  isBelowThreshold,
  isOutputFormat,
  parseLevelName,
  didYouMean,
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  VALID_FORMATS,
  type SentiscoreConfig,
  type OutputFormat,
} from "./config.js";

// Logger
export { logger } from "./logger.js";
