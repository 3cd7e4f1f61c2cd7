import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { getResultsPath, getRunDir } from "./artifacts.js";
import { filterByScope, formatResults, readResultRecords } from "./sink.js";
import type { ExportFormat, ExportScope } from "./types.js";

const SCOPES: readonly ExportScope[] = ["all", "success", "failed"];
const FORMATS: readonly ExportFormat[] = ["json", "jsonl", "csv"];

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function pick<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T | null {
  if (value === undefined) return fallback;
  return choices.find((choice) => choice === value) ?? null;
}

/**
 * Write runs/<run_id>/export-<scope>.<format> from the run's result store.
 */
export function exportRun(
  runDir: string,
  scope: ExportScope,
  format: ExportFormat
): { outputPath: string; count: number } {
  const records = filterByScope(readResultRecords(getResultsPath(runDir)), scope);
  const outputPath = path.join(runDir, `export-${scope}.${format}`);
  fs.writeFileSync(outputPath, formatResults(records, format));
  return { outputPath, count: records.length };
}

export async function runCli() {
  const [, , runId, rawScope, rawFormat] = process.argv;
  if (!runId) {
    fail("Usage: npm run export -- <run_id> [all|success|failed] [json|jsonl|csv]");
  }

  const scope = pick(rawScope, SCOPES, "all");
  if (!scope) {
    fail(`Unknown scope: ${rawScope}. Expected one of ${SCOPES.join(", ")}`);
  }
  const format = pick(rawFormat, FORMATS, "json");
  if (!format) {
    fail(`Unknown format: ${rawFormat}. Expected one of ${FORMATS.join(", ")}`);
  }

  const runDir = getRunDir(runId);
  if (!fs.existsSync(runDir)) {
    fail(`Run directory not found: ${runDir}`);
  }

  const { outputPath, count } = exportRun(runDir, scope, format);
  console.log(`Exported ${count} records: ${outputPath}`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli().catch((error) => {
    console.error("Fatal:", error);
    process.exit(1);
  });
}
