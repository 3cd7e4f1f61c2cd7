import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { getResultsPath, getRunDir, readJson, readRunSummary } from "./artifacts.js";
import { readResultRecords } from "./sink.js";
import type { ResultRecord, RunManifest, RunSummary } from "./types.js";

const REPLY_PREVIEW_LEN = 80;

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function escapeCell(value: string): string {
  return value.replace(/\|/g, "\\|").replace(/\n/g, " ").trim();
}

function fmtStatus(value: string | undefined): string {
  if (!value) return "unknown";
  return value.toUpperCase();
}

function fmtSeconds(value: number | null): string {
  return value === null ? "-" : `${value.toFixed(2)}s`;
}

function truncate(value: string): string {
  return value.length <= REPLY_PREVIEW_LEN ? value : value.slice(0, REPLY_PREVIEW_LEN) + "...";
}

function groupRecords(records: ResultRecord[]): Map<string, ResultRecord[]> {
  const byGroup = new Map<string, ResultRecord[]>();
  for (const record of records) {
    const existing = byGroup.get(record.group_id);
    if (existing) {
      existing.push(record);
    } else {
      byGroup.set(record.group_id, [record]);
    }
  }
  return byGroup;
}

function groupStatus(records: ResultRecord[]): string {
  if (records.some((record) => record.final_status === "failed")) return "failed";
  if (records.some((record) => record.final_status === "cancelled")) return "cancelled";
  return "completed";
}

export function buildReportMarkdown(
  runDir: string,
  summary: RunSummary,
  records: ResultRecord[],
  manifest: RunManifest | null,
  generatedAt: Date = new Date()
): string {
  const { progress, statistics } = summary;

  const lines: string[] = [];
  lines.push("# Chatflow Eval Report");
  lines.push("");
  lines.push(`- Generated at: ${generatedAt.toISOString()}`);
  lines.push(`- Run ID: ${summary.run_id}`);
  if (manifest) {
    lines.push(`- Provider: ${manifest.provider} (${manifest.response_mode})`);
    if (manifest.model) {
      lines.push(`- Model: ${manifest.model}`);
    }
  }
  lines.push(`- Run directory: \`${runDir}\``);
  lines.push("");

  lines.push("## Overview");
  lines.push("");
  lines.push(`- Final phase: ${fmtStatus(summary.phase)}`);
  lines.push(`- Started: ${summary.start_time ?? "-"}`);
  lines.push(`- Ended: ${summary.end_time ?? "-"}`);
  lines.push(`- Turns: ${progress.completed}/${progress.total}`);
  lines.push(
    `- Outcomes: succeeded=${progress.succeeded}, failed=${progress.failed}, skipped=${progress.skipped}, cancelled=${progress.cancelled}`
  );
  if (summary.error) {
    lines.push(`- Error: ${summary.error}`);
  }
  lines.push("");

  lines.push("## Statistics");
  lines.push("");
  lines.push(`- Success rate: ${statistics.success_rate}%`);
  lines.push(
    `- Latency: min ${fmtSeconds(statistics.min_latency_seconds)}, avg ${fmtSeconds(
      statistics.avg_latency_seconds
    )}, max ${fmtSeconds(statistics.max_latency_seconds)}`
  );
  lines.push("");

  lines.push("## Groups");
  lines.push("");
  lines.push("| Group | Status | Turns | Succeeded | Session |");
  lines.push("| --- | --- | ---: | ---: | --- |");
  for (const [groupId, groupRows] of groupRecords(records)) {
    const succeeded = groupRows.filter((record) => record.final_status === "success").length;
    const session = groupRows.find((record) => record.session_id)?.session_id ?? "";
    lines.push(
      `| ${escapeCell(groupId)} | ${groupStatus(groupRows)} | ${groupRows.length} | ${succeeded} | ${escapeCell(session)} |`
    );
  }
  lines.push("");

  lines.push("## Turns");
  lines.push("");
  lines.push("| Group | Turn | Status | Attempts | Latency (s) | Reply |");
  lines.push("| --- | ---: | --- | ---: | ---: | --- |");
  for (const record of records) {
    lines.push(
      `| ${escapeCell(record.group_id)} | ${record.turn_number} | ${record.final_status} | ${record.attempts} | ${record.latency_seconds.toFixed(
        3
      )} | ${escapeCell(truncate(record.actual_reply))} |`
    );
  }
  lines.push("");

  const failures = records.filter((record) => record.final_status === "failed");
  lines.push("## Failures");
  lines.push("");
  if (failures.length === 0) {
    lines.push("- none");
  } else {
    for (const record of failures) {
      lines.push(`- ${record.group_id} turn ${record.turn_number}: ${record.error_detail ?? "unknown error"}`);
    }
  }
  lines.push("");

  lines.push("## Rejected Groups");
  lines.push("");
  if (summary.rejected_groups.length === 0) {
    lines.push("- none");
  } else {
    for (const issue of summary.rejected_groups) {
      lines.push(`- ${issue.group_id ?? "(missing id)"}: ${issue.defects.join("; ")}`);
    }
  }
  lines.push("");

  return lines.join("\n");
}

export async function runCli() {
  const [, , runId] = process.argv;
  if (!runId) {
    fail("Usage: npm run report -- <run_id>");
  }

  const runDir = getRunDir(runId);
  if (!fs.existsSync(runDir)) {
    fail(`Run directory not found: ${runDir}`);
  }
  if (!fs.existsSync(path.join(runDir, "summary.json"))) {
    fail(`summary.json not found in run directory: ${runDir}`);
  }

  const summary = readRunSummary(runDir);
  const records = readResultRecords(getResultsPath(runDir));
  const manifestPath = path.join(runDir, "manifest.json");
  const manifest = fs.existsSync(manifestPath) ? readJson<RunManifest>(manifestPath) : null;

  const report = buildReportMarkdown(runDir, summary, records, manifest);
  const outputPath = path.join(runDir, "report.md");
  fs.writeFileSync(outputPath, report);

  console.log(`Wrote report: ${outputPath}`);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli().catch((error) => {
    console.error("Fatal:", error);
    process.exit(1);
  });
}
