import "dotenv/config";
import { pathToFileURL } from "node:url";
import { RetryingChatClient } from "./client.js";
import { loadConfig } from "./config.js";
import { ConfigError } from "./errors.js";
import { createDelivery } from "./delivery.js";
import { maskSecret } from "./artifacts.js";
import { createRunId } from "./trace.js";
import type { EvalConfig } from "./config.js";
import type { CallOutcome } from "./types.js";

const PROBE_MESSAGE = "connection test";

/**
 * Send a single probe turn with no retries.
 */
export async function checkConnection(config: EvalConfig): Promise<CallOutcome> {
  const runId = `check-${createRunId()}`;
  const client = new RetryingChatClient(createDelivery(config), {
    runId,
    timeoutMs: config.timeoutMs,
    retryCount: 0,
    retryDelayMs: 0,
    retryPolicy: config.retryPolicy,
  });
  return client.executeTurn({
    sessionId: null,
    message: PROBE_MESSAGE,
    extraInputs: {},
    traceId: "trace_connection_check",
  });
}

export async function runCli() {
  const config = loadConfig();

  console.log(`Provider: ${config.provider}`);
  console.log(`API:      ${config.apiUrl || "(default)"}`);
  console.log(`Key:      ${maskSecret(config.apiKey)}`);
  console.log(`Mode:     ${config.responseMode}`);

  const outcome = await checkConnection(config);
  if (outcome.status === "success") {
    console.log(`Connected in ${(outcome.latency_ms / 1000).toFixed(2)}s`);
    console.log(`Reply:    ${outcome.reply_text.slice(0, 100)}`);
    return;
  }

  console.error(`Connection failed: ${outcome.error_detail ?? "unknown error"}`);
  process.exit(1);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runCli().catch((error) => {
    if (error instanceof ConfigError) {
      console.error(`Config error: ${error.message}`);
      process.exit(1);
    }
    console.error("Fatal:", error);
    process.exit(1);
  });
}
