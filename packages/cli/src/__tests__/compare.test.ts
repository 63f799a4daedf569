import { describe, it, expect, afterEach, vi } from "vitest";
import { ScoreEngine } from "@sentiscore/engine";
import { runCompare, type CompareOptions } from "../commands/compare.js";
import { makeWorkspace, removeWorkspace, captureOutput, HIGH_SUBJECT, MID_SUBJECT } from "./helpers.js";

const engine = new ScoreEngine({ now: () => new Date("2026-03-04T05:06:07.000Z") });
const high = engine.assess(HIGH_SUBJECT.subject, HIGH_SUBJECT.scores);
const mid = engine.assess(MID_SUBJECT.subject, MID_SUBJECT.scores);
const midTwin = engine.assess("mid-twin", MID_SUBJECT.scores);

describe("compare command", () => {
  const dirs: string[] = [];

  function workspace(files: Record<string, string>): string {
    const dir = makeWorkspace(files);
    dirs.push(dir);
    return dir;
  }

  function options(cwd: string, files: string[]): CompareOptions {
    return { files, cwd, format: "json", noColor: true };
  }

  afterEach(() => {
    for (const d of dirs) removeWorkspace(d);
    dirs.length = 0;
    vi.restoreAllMocks();
  });

  it("ranks reports across files, keeping ties in input order", () => {
    const cwd = workspace({
      "a.json": JSON.stringify([mid, midTwin]),
      "b.json": JSON.stringify(high),
    });
    const io = captureOutput();

    expect(runCompare(options(cwd, ["a.json", "b.json"]))).toBe(0);
    expect(JSON.parse(io.stdout())).toEqual([
      { rank: 1, subject: "alpha", level: "AUTONOMOUS_CONSCIOUS", score: 0.8587 },
      { rank: 2, subject: "mid", level: "COGNITIVE", score: 0.3909 },
      { rank: 3, subject: "mid-twin", level: "COGNITIVE", score: 0.3909 },
    ]);
  });

  it("prints a table ranking", () => {
    const cwd = workspace({ "a.json": JSON.stringify([mid, high]) });
    const io = captureOutput();

    expect(runCompare({ ...options(cwd, ["a.json"]), format: "table" })).toBe(0);
    expect(io.stdout().split("\n")).toContain(`    1. ${"alpha".padEnd(24)}0.8587  AUTONOMOUS_CONSCIOUS`);
  });

  it("rejects files that are not reports", () => {
    const cwd = workspace({ "a.json": JSON.stringify({ ...high, proof_hash: "not-a-hash" }) });
    const io = captureOutput();

    expect(runCompare(options(cwd, ["a.json"]))).toBe(1);
    expect(io.stderr().some((line) => line.startsWith("[sentiscore] Error: a.json: proof_hash:"))).toBe(true);
  });

  it("needs at least one file", () => {
    const io = captureOutput();
    expect(runCompare(options(".", []))).toBe(1);
    expect(io.stderr()).toContain("[sentiscore] Error: compare needs at least one report file\n");
  });
});
