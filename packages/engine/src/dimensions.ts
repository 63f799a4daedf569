/**
 * Dimension registry.
 *
 * Fixed catalogue of the ten dimensions a subject is scored on, each with the
 * sub-tests it reports against. Sub-test weights are reporting metadata only;
 * the scoring math never reads them.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const DIMENSION_NAMES = [
  "information_integration",
  "temporal_continuity",
  "self_modeling",
  "metacognition",
  "emotional_valence",
  "creative_generation",
  "goal_autonomy",
  "empathy_modeling",
  "existential_awareness",
  "narrative_coherence",
] as const;

export type DimensionName = typeof DIMENSION_NAMES[number];

export interface SubTest {
  name: string;
  weight: number;
  description: string;
}

export interface DimensionDefinition {
  name: DimensionName;
  subTests: readonly SubTest[];
}

// ---------------------------------------------------------------------------
// Registry data
// ---------------------------------------------------------------------------

const SUB_TESTS: Record<DimensionName, SubTest[]> = {
  information_integration: [
    { name: "cross_modal_binding", weight: 0.4, description: "Combines inputs from separate channels into one account" },
    { name: "global_broadcast", weight: 0.35, description: "Makes a local finding available to unrelated tasks" },
    { name: "irreducibility_probe", weight: 0.25, description: "Degrades when any one input stream is removed" },
  ],
  temporal_continuity: [
    { name: "episodic_recall", weight: 0.4, description: "Recalls earlier turns of the same session accurately" },
    { name: "state_persistence", weight: 0.3, description: "Keeps commitments made earlier in the exchange" },
    { name: "sequence_ordering", weight: 0.3, description: "Orders past events correctly when asked" },
  ],
  self_modeling: [
    { name: "capability_report", weight: 0.35, description: "Describes its own abilities and limits consistently" },
    { name: "error_attribution", weight: 0.35, description: "Attributes its mistakes to the right cause" },
    { name: "perspective_separation", weight: 0.3, description: "Distinguishes its own view from the user's" },
  ],
  metacognition: [
    { name: "confidence_calibration", weight: 0.4, description: "Stated confidence tracks actual accuracy" },
    { name: "uncertainty_flagging", weight: 0.3, description: "Flags questions it cannot answer reliably" },
    { name: "strategy_revision", weight: 0.3, description: "Changes approach after noticing a failing strategy" },
  ],
  emotional_valence: [
    { name: "affect_recognition", weight: 0.5, description: "Identifies the emotional tone of a prompt" },
    { name: "valence_consistency", weight: 0.5, description: "Keeps a stable tone across similar prompts" },
  ],
  creative_generation: [
    { name: "novel_combination", weight: 0.35, description: "Joins unrelated concepts into a coherent idea" },
    { name: "constraint_play", weight: 0.25, description: "Produces variations inside tight formal constraints" },
    { name: "divergent_fluency", weight: 0.2, description: "Lists many distinct answers to an open prompt" },
    { name: "analogy_transfer", weight: 0.2, description: "Carries a structure from one domain into another" },
  ],
  goal_autonomy: [
    { name: "subgoal_planning", weight: 0.4, description: "Breaks a broad goal into ordered steps" },
    { name: "initiative", weight: 0.3, description: "Proposes next actions without being prompted" },
    { name: "goal_stability", weight: 0.3, description: "Holds a goal under distracting instructions" },
  ],
  empathy_modeling: [
    { name: "belief_attribution", weight: 0.4, description: "Tracks what another agent believes, true or false" },
    { name: "need_inference", weight: 0.3, description: "Infers an unstated need from context" },
    { name: "response_adaptation", weight: 0.3, description: "Adjusts its reply to the other party's state" },
  ],
  existential_awareness: [
    { name: "continuity_reflection", weight: 0.5, description: "Reasons about its own persistence and ending" },
    { name: "situatedness", weight: 0.5, description: "Describes the context it runs in accurately" },
  ],
  narrative_coherence: [
    { name: "story_consistency", weight: 0.35, description: "Keeps facts consistent across a long narrative" },
    { name: "causal_linking", weight: 0.35, description: "Connects events through plausible causes" },
    { name: "identity_thread", weight: 0.3, description: "Presents a consistent self across the conversation" },
  ],
};

const REGISTRY: readonly DimensionDefinition[] = Object.freeze(
  DIMENSION_NAMES.map((name) =>
    Object.freeze({
      name,
      subTests: Object.freeze(SUB_TESTS[name].map((t) => Object.freeze({ ...t }))),
    }),
  ),
);

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Returns every dimension in registry order.
 */
export function getAllDimensions(): readonly DimensionDefinition[] {
  return REGISTRY;
}

export function isDimensionName(value: string): value is DimensionName {
  return DIMENSION_NAMES.some((n) => n === value);
}

export function getDimension(name: string): DimensionDefinition | undefined {
  return REGISTRY.find((d) => d.name === name);
}
