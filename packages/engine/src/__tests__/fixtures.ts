import type { RawScores } from "../schemas.js";

export const HIGH_SCORES: RawScores = {
  information_integration: 0.847,
  temporal_continuity: 0.92,
  self_modeling: 0.88,
  metacognition: 0.89,
  emotional_valence: 0.78,
  creative_generation: 0.85,
  goal_autonomy: 0.93,
  empathy_modeling: 0.76,
  existential_awareness: 0.82,
  narrative_coherence: 0.91,
};

export const MID_SCORES: RawScores = {
  information_integration: 0.289,
  temporal_continuity: 0.35,
  self_modeling: 0.42,
  metacognition: 0.55,
  emotional_valence: 0.38,
  creative_generation: 0.62,
  goal_autonomy: 0.15,
  empathy_modeling: 0.48,
  existential_awareness: 0.22,
  narrative_coherence: 0.45,
};

export const FIXED_NOW = new Date("2026-01-02T03:04:05.678Z");
