import { mkdtempSync, writeFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { vi } from "vitest";

export function makeWorkspace(files: Record<string, string> = {}): string {
  const dir = mkdtempSync(join(tmpdir(), "sentiscore-cli-test-"));
  for (const [name, content] of Object.entries(files)) {
    writeFileSync(join(dir, name), content);
  }
  return dir;
}

export function removeWorkspace(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Capture stdout and stderr writes for the duration of a test. */
export function captureOutput(): { stdout: () => string; stderr: () => string[] } {
  const out = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  const err = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  return {
    stdout: () => out.mock.calls.map((c) => String(c[0])).join(""),
    stderr: () => err.mock.calls.map((c) => String(c[0])),
  };
}

export const HIGH_SUBJECT = {
  subject: "alpha",
  scores: {
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
  },
};

export const MID_SUBJECT = {
  subject: "mid",
  scores: {
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
  },
};
