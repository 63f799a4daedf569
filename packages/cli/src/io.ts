import { readFileSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { logger } from "@sentiscore/engine";

export interface LoadedDocument {
  data: unknown;
}

/**
 * Read a YAML or JSON document. `-` reads stdin.
 * Returns null after logging when the file cannot be read or parsed.
 */
export function readDocument(path: string, cwd: string): LoadedDocument | null {
  let raw: string;
  try {
    raw = path === "-" ? readFileSync(0, "utf-8") : readFileSync(resolve(cwd, path), "utf-8");
  } catch (err) {
    logger.error(`Error: could not read ${path} — ${errorMessage(err)}`);
    return null;
  }

  try {
    return { data: yaml.load(raw, { filename: path }) };
  } catch (err) {
    logger.error(`Error: could not parse ${path} — ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Write `output` to `path` (relative to `cwd`), or to stdout when no path is given.
 */
export function emit(output: string, path: string | undefined, cwd: string): boolean {
  if (!path) {
    process.stdout.write(output.endsWith("\n") ? output : `${output}\n`);
    return true;
  }
  try {
    writeFileSync(resolve(cwd, path), output.endsWith("\n") ? output : `${output}\n`);
    logger.info(`Report written to ${path}`);
    return true;
  } catch (err) {
    logger.error(`Error: could not write to ${path} — ${errorMessage(err)}`);
    return false;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
