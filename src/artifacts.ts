import fs from "node:fs";
import path from "node:path";
import type { ExecutionStatus, LogEntry, RunManifest, RunSummary } from "./types.js";

export const RUNS_ROOT = path.resolve(import.meta.dirname, "../runs");

export function getRunDir(runId: string, root: string = RUNS_ROOT): string {
  return path.join(root, runId);
}

export function getResultsPath(runDir: string): string {
  return path.join(runDir, "results.jsonl");
}

/**
 * Keep the first and last four characters of a credential.
 */
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return "*".repeat(secret.length);
  }
  return secret.slice(0, 4) + "*".repeat(secret.length - 8) + secret.slice(-4);
}

function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

export function readJson<T>(filePath: string): T {
  return JSON.parse(fs.readFileSync(filePath, "utf8")) as T;
}

export function writeManifest(runDir: string, manifest: RunManifest): void {
  writeJson(path.join(runDir, "manifest.json"), manifest);
}

export function buildRunSummary(status: ExecutionStatus): RunSummary {
  const { current: _current, ...progress } = status.progress;
  return {
    run_id: status.run_id ?? "",
    phase: status.phase,
    start_time: status.start_time,
    end_time: status.end_time,
    error: status.error,
    progress,
    statistics: status.statistics,
    rejected_groups: status.rejected_groups,
  };
}

export function writeRunSummary(runDir: string, summary: RunSummary): void {
  writeJson(path.join(runDir, "summary.json"), summary);
}

export function readRunSummary(runDir: string): RunSummary {
  return readJson<RunSummary>(path.join(runDir, "summary.json"));
}

export function writeRunLog(runDir: string, entries: LogEntry[]): void {
  writeJson(path.join(runDir, "log.json"), entries);
}
