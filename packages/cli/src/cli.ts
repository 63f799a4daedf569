#!/usr/bin/env node

import { logger } from "@sentiscore/engine";
import { parseArgs, UsageError } from "./args.js";
import { runAssess } from "./commands/assess.js";
import { runCompare } from "./commands/compare.js";
import { runInit } from "./commands/init.js";
import { runDimensions, runLevels } from "./commands/listings.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36msentiscore\x1b[0m — dimension scoring and levelling
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  sentiscore assess <file>              Score subjects from a YAML/JSON file (- for stdin)
  sentiscore compare <report.json...>   Rank saved JSON reports
  sentiscore dimensions                 List dimensions and sub-tests
  sentiscore levels                     List levels and thresholds
  sentiscore init [path]                Write .sentiscore.yml and an example input
  sentiscore version                    Print version

\x1b[1mASSESS OPTIONS\x1b[0m
  --format <fmt>               Output: table, json, markdown (default: table or config)
  --output <file>              Write report to file
  --fail-below <level>         Exit 1 if any subject is below this level

\x1b[1mCOMPARE OPTIONS\x1b[0m
  --format <fmt>               Output: table, json (default: table)
  --output <file>              Write ranking to file

\x1b[1mINIT OPTIONS\x1b[0m
  --force                      Overwrite existing files

\x1b[1mEXAMPLES\x1b[0m
  sentiscore assess subjects.yml                          Table report
  sentiscore assess subjects.yml --format json -o out.json  JSON reports to file
  sentiscore assess subjects.yml --fail-below COGNITIVE   CI gate
  sentiscore compare run-a.json run-b.json                Rank across runs

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output
  --no-color                   Plain output (also honours NO_COLOR)

\x1b[1mENVIRONMENT\x1b[0m
  SENTISCORE_LOG_LEVEL              Log level: debug, info, warn, error, silent

`);
}

function listingFormat(raw: string | undefined): "table" | "json" {
  if (raw === undefined || raw === "table") return "table";
  if (raw === "json") return "json";
  throw new UsageError(`invalid format '${raw}'. Must be one of: table, json`);
}

function main(): number {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`sentiscore v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);
  const noColor = args["no-color"] === "true" || Boolean(process.env.NO_COLOR);
  const cwd = process.cwd();

  switch (command) {
    case "version":
      process.stdout.write(`sentiscore v${VERSION}\n`);
      return 0;

    case "dimensions":
      runDimensions(listingFormat(args["format"]), noColor);
      return 0;

    case "levels":
      runLevels(listingFormat(args["format"]), noColor);
      return 0;

    case "init":
      return runInit({
        path: positional[0] || ".",
        force: args["force"] === "true",
      });

    case "assess": {
      if (!positional[0]) throw new UsageError("assess needs an input file (or - for stdin)");
      return runAssess({
        file: positional[0],
        cwd,
        format: args["format"],
        output: args["output"],
        failBelow: args["fail-below"],
        noColor,
      });
    }

    case "compare":
      return runCompare({
        files: positional,
        cwd,
        format: listingFormat(args["format"]),
        output: args["output"],
        noColor,
      });

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

try {
  process.exitCode = main();
} catch (err) {
  if (err instanceof UsageError) {
    logger.error(`Error: ${err.message}`);
  } else {
    logger.error(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  }
  process.exitCode = 1;
}
