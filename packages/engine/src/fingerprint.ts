/**
 * Input fingerprint (`proof_hash`).
 *
 * SHA-256 over a canonical rendering of the raw score map: JSON with keys
 * sorted by code unit and `", "` / `": "` separators, numbers in shortest
 * round-trip form. The hash depends on the raw input only, never on clamped or
 * derived values.
 *
 * Numbers are rendered the way `JSON.stringify` renders them, so an integral
 * value prints as `1`, not `1.0`. Hashes of inputs holding integral values
 * only match other implementations that render numbers the same way.
 */

import { createHash } from "node:crypto";
import type { RawScores } from "./schemas.js";

export function canonicalize(rawScores: RawScores): string {
  const keys = Object.keys(rawScores).sort();
  const body = keys.map((k) => `${JSON.stringify(k)}: ${JSON.stringify(rawScores[k])}`);
  return `{${body.join(", ")}}`;
}

export function fingerprint(rawScores: RawScores): string {
  return createHash("sha256").update(canonicalize(rawScores), "utf8").digest("hex");
}
