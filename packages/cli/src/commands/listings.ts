import { getAllDimensions, getAllLevels } from "@sentiscore/engine";
import { formatDimensionsTable, formatLevelsTable } from "../formatter.js";

export function runDimensions(format: "table" | "json", noColor: boolean): void {
  if (format === "json") {
    process.stdout.write(`${JSON.stringify(getAllDimensions(), null, 2)}\n`);
    return;
  }
  process.stdout.write(formatDimensionsTable(getAllDimensions(), noColor));
}

export function runLevels(format: "table" | "json", noColor: boolean): void {
  if (format === "json") {
    process.stdout.write(`${JSON.stringify(getAllLevels(), null, 2)}\n`);
    return;
  }
  process.stdout.write(formatLevelsTable(getAllLevels(), noColor));
}
