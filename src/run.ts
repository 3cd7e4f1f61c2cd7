import "dotenv/config";
import path from "node:path";
import { loadCaseRows } from "./cases.js";
import { RetryingChatClient } from "./client.js";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { ExecutionController } from "./controller.js";
import { createDelivery } from "./delivery.js";
import { countCases, groupCases } from "./grouping.js";
import { JsonlResultSink } from "./sink.js";
import { formatProgressLine } from "./status.js";
import { createRunId, createTraceId } from "./trace.js";
import {
  buildRunSummary,
  getResultsPath,
  getRunDir,
  maskSecret,
  writeManifest,
  writeRunLog,
  writeRunSummary,
} from "./artifacts.js";
import type { LogEntry, RunManifest } from "./types.js";

const PROGRESS_INTERVAL_MS = 15_000;

const LEVEL_LABELS: Record<LogEntry["level"], string> = {
  info: "INFO ",
  success: "OK   ",
  warning: "WARN ",
  error: "ERROR",
};

function printLog(entry: LogEntry): void {
  const time = entry.timestamp.slice(11, 19);
  const line = `[${time}] ${LEVEL_LABELS[entry.level]} ${entry.message}`;
  if (entry.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

async function main() {
  // CLI args: case file, then optional group IDs to filter
  const [caseFile, ...filterIds] = process.argv.slice(2).filter((a) => !a.startsWith("-"));
  if (!caseFile) {
    console.error("Usage: npm run eval -- <cases.json> [group_id ...]");
    process.exit(1);
  }

  const config = loadConfig();

  console.log("=== Chatflow Eval ===\n");
  console.log(`Provider: ${config.provider}`);
  console.log(`API:      ${config.apiUrl || "(default)"}`);
  console.log(`Mode:     ${config.responseMode}`);
  console.log(`Retries:  ${config.retryCount} x ${config.retryDelayMs}ms (${config.retryPolicy})`);

  const rows = loadCaseRows(path.resolve(caseFile), filterIds);
  const { groups, issues } = groupCases(rows);
  console.log(`Cases:    ${rows.length} rows, ${groups.length} valid groups, ${issues.length} rejected\n`);

  if (groups.length === 0) {
    for (const issue of issues) {
      console.error(`  ${issue.group_id ?? "(missing id)"}: ${issue.defects.join("; ")}`);
    }
    console.error("No valid conversation groups to run.");
    process.exit(1);
  }

  const runId = createRunId();
  const runDir = getRunDir(runId);

  const manifest: RunManifest = {
    run_id: runId,
    timestamp_utc: new Date().toISOString(),
    provider: config.provider,
    api_url: config.apiUrl,
    api_key: maskSecret(config.apiKey),
    model: config.provider === "openai-responses" ? config.model : null,
    response_mode: config.responseMode,
    timeout_ms: config.timeoutMs,
    retry: {
      policy: config.retryPolicy,
      count: config.retryCount,
      delay_ms: config.retryDelayMs,
    },
    case_file: path.resolve(caseFile),
    group_count: groups.length,
    case_count: countCases(groups),
    groups: groups.map((group, index) => ({
      group_id: group.group_id,
      trace_id: createTraceId(group.group_id, index, runId),
      turns: group.cases.length,
    })),
    rejected_groups: issues,
  };
  writeManifest(runDir, manifest);

  const client = new RetryingChatClient(createDelivery(config), {
    runId,
    timeoutMs: config.timeoutMs,
    retryCount: config.retryCount,
    retryDelayMs: config.retryDelayMs,
    retryPolicy: config.retryPolicy,
  });
  const controller = new ExecutionController({
    logCapacity: config.logCapacity,
    turnDelayMs: config.turnDelayMs,
    onLog: printLog,
  });

  // First Ctrl-C stops at the next checkpoint; a second one exits immediately.
  process.on("SIGINT", () => {
    const result = controller.stop();
    if (!result.ok) {
      console.error(`\nForced exit (${result.message})`);
      process.exit(130);
    }
    console.log("\nStopping after the current turn... press Ctrl-C again to force exit.");
  });

  const started = controller.start({
    runId,
    groups,
    rejected: issues,
    client,
    sink: new JsonlResultSink(getResultsPath(runDir)),
  });
  if (!started.ok) {
    console.error(started.message);
    process.exit(1);
  }

  const ticker = setInterval(() => {
    console.log(formatProgressLine(controller.status()));
  }, PROGRESS_INTERVAL_MS);

  const final = await controller.whenSettled();
  clearInterval(ticker);

  writeRunSummary(runDir, buildRunSummary(final));
  writeRunLog(runDir, controller.exportLog());

  console.log("\n=== Run Complete ===");
  console.log(`Run ID:    ${runId}`);
  console.log(`Artifacts: ${runDir}/`);
  console.log(`Status:    ${formatProgressLine(final)}`);
  console.log(`Success:   ${final.statistics.success_rate}%`);
  if (final.error) {
    console.log(`Error:     ${final.error}`);
  }

  process.exit(final.phase === "completed" ? 0 : 1);
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`Config error: ${err.message}`);
    process.exit(1);
  }
  console.error("Fatal:", err);
  process.exit(1);
});
