import { existsSync, writeFileSync, statSync } from "node:fs";
import { resolve, join } from "node:path";
import { CONFIG_FILENAME, DIMENSION_NAMES, logger } from "@sentiscore/engine";

export interface InitOptions {
  path: string;
  force: boolean;
}

export const EXAMPLE_FILENAME = "subjects.example.yml";

const CONFIG_TEMPLATE = `# sentiscore configuration

# Keep at most this many assessments in memory per run (null = unbounded)
history_limit: null

# Exit non-zero when a subject scores below this level (null = never)
# One of: NON_SENTIENT, REACTIVE, ADAPTIVE, COGNITIVE, SELF_AWARE,
#         REFLECTIVE, CREATIVE, AUTONOMOUS_CONSCIOUS
fail_below: null

# Default output format: table, json, markdown
format: table
`;

function generateExample(): string {
  const scores = DIMENSION_NAMES.map((name) => `    ${name}: 0.5`).join("\n");
  return `# Scores are clamped to [0, 1]; omitted dimensions count as 0.
- subject: example-subject
  scores:
${scores}
`;
}

/**
 * Write a starter config and example input into `path`.
 * Existing files are kept unless `force` is set. Returns the exit code.
 */
export function runInit(options: InitOptions): number {
  const dir = resolve(options.path);

  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    logger.error(`Error: ${dir} is not a directory`);
    return 1;
  }

  const created: string[] = [];
  const skipped: string[] = [];

  const files: Array<[string, string]> = [
    [CONFIG_FILENAME, CONFIG_TEMPLATE],
    [EXAMPLE_FILENAME, generateExample()],
  ];

  for (const [name, content] of files) {
    const target = join(dir, name);
    if (existsSync(target) && !options.force) {
      skipped.push(name);
    } else {
      writeFileSync(target, content);
      created.push(name);
    }
  }

  for (const name of created) process.stdout.write(`  \x1b[32m+\x1b[0m ${name}\n`);
  for (const name of skipped) process.stdout.write(`  \x1b[2m=\x1b[0m ${name} (exists)\n`);
  return 0;
}
