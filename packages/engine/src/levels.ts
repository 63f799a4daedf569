/**
 * Ordinal levels and the average-score threshold table.
 *
 * Levels are strictly ordered 0..7. An assessment's level is a pure function
 * of its average score: the first row of the descending table whose threshold
 * the average meets (`>=`) wins, and anything below the last row is level 0.
 */

export const LEVEL_NAMES = [
  "NON_SENTIENT",
  "REACTIVE",
  "ADAPTIVE",
  "COGNITIVE",
  "SELF_AWARE",
  "REFLECTIVE",
  "CREATIVE",
  "AUTONOMOUS_CONSCIOUS",
] as const;

export type LevelName = typeof LEVEL_NAMES[number];
export type LevelValue = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

export interface Level {
  value: LevelValue;
  name: LevelName;
  description: string;
  /** Minimum average score for this level; 0 for the fallback level. */
  threshold: number;
}

const LEVELS: readonly Level[] = Object.freeze(([
  { value: 0, name: "NON_SENTIENT", description: "No measurable signal on any dimension", threshold: 0 },
  { value: 1, name: "REACTIVE", description: "Responds to stimuli without retained state", threshold: 0.05 },
  { value: 2, name: "ADAPTIVE", description: "Adjusts behaviour from feedback within a session", threshold: 0.18 },
  { value: 3, name: "COGNITIVE", description: "Plans and reasons over an internal model of the task", threshold: 0.32 },
  { value: 4, name: "SELF_AWARE", description: "Models itself as an agent distinct from its context", threshold: 0.45 },
  { value: 5, name: "REFLECTIVE", description: "Evaluates and revises its own reasoning", threshold: 0.58 },
  { value: 6, name: "CREATIVE", description: "Generates novel goals and artefacts of its own", threshold: 0.72 },
  { value: 7, name: "AUTONOMOUS_CONSCIOUS", description: "Sustains self-directed goals with a continuous self-model", threshold: 0.85 },
] satisfies Level[]).map((l) => Object.freeze(l)));

// Highest threshold first; level 0 is the fallback and has no row.
const THRESHOLD_TABLE: readonly Level[] = LEVELS
  .filter((l) => l.value > 0)
  .sort((a, b) => b.threshold - a.threshold);

const FALLBACK: Level = LEVELS[0];

/**
 * Map an average score to its level. Total over every number: NaN and
 * anything below the lowest threshold resolve to level 0.
 */
export function levelForAverage(average: number): Level {
  for (const row of THRESHOLD_TABLE) {
    if (average >= row.threshold) return row;
  }
  return FALLBACK;
}

export function getAllLevels(): readonly Level[] {
  return LEVELS;
}

export function getLevel(value: LevelValue): Level {
  return LEVELS.find((l) => l.value === value) ?? FALLBACK;
}

export function isLevelName(value: string): value is LevelName {
  return LEVEL_NAMES.some((n) => n === value);
}

/**
 * Case-insensitive lookup by name, for config files and CLI flags.
 */
export function findLevelByName(name: string): Level | undefined {
  const key = name.trim().toUpperCase();
  return LEVELS.find((l) => l.name === key);
}
