import { ConfigError } from "./errors.js";
import type { ProviderKind, ResponseMode, RetryPolicy } from "./types.js";

const DEFAULT_USER_ID = "test_user";
const DEFAULT_MODEL = "gpt-5-mini-2025-08-07";
const DEFAULT_TIMEOUT_MS = 120_000;
const DEFAULT_RETRY_COUNT = 3;
const DEFAULT_RETRY_DELAY_MS = 5000;
const DEFAULT_TURN_DELAY_MS = 2000;
const DEFAULT_LOG_BUFFER = 100;

export interface EvalConfig {
  provider: ProviderKind;
  apiUrl: string;
  apiKey: string;
  userId: string;
  model: string;
  responseMode: ResponseMode;
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  retryPolicy: RetryPolicy;
  turnDelayMs: number;
  logCapacity: number;
}

type Env = Record<string, string | undefined>;

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) {
    return Math.floor(parsed);
  }
  return fallback;
}

// Like parsePositiveInt, but 0 is meaningful (no retries, no delay).
function parseNonNegativeInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed >= 0) {
    return Math.floor(parsed);
  }
  return fallback;
}

function parseChoice<T extends string>(
  name: string,
  value: string | undefined,
  choices: readonly T[],
  fallback: T
): T {
  const raw = value?.trim();
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join(", ")} (got "${raw}")`);
  }
  return match;
}

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

/**
 * Build the run configuration from environment variables.
 * Entry points load .env through dotenv before calling this.
 */
export function loadConfig(env: Env = process.env): EvalConfig {
  const provider = parseChoice(
    "CHATFLOW_PROVIDER",
    env.CHATFLOW_PROVIDER,
    ["chat-messages", "openai-responses"] as const,
    "chat-messages"
  );
  const apiUrl = normalizeBaseUrl(env.CHATFLOW_API_URL ?? "");
  const apiKey = env.CHATFLOW_API_KEY?.trim() ?? "";

  if (provider === "chat-messages" && !apiUrl) {
    throw new ConfigError("CHATFLOW_API_URL is required for the chat-messages provider");
  }
  if (!apiKey) {
    throw new ConfigError("CHATFLOW_API_KEY is required");
  }

  return {
    provider,
    apiUrl,
    apiKey,
    userId: env.CHATFLOW_USER_ID?.trim() || DEFAULT_USER_ID,
    model: env.CHATFLOW_MODEL?.trim() || DEFAULT_MODEL,
    responseMode: parseChoice(
      "CHATFLOW_RESPONSE_MODE",
      env.CHATFLOW_RESPONSE_MODE,
      ["streaming", "blocking"] as const,
      "streaming"
    ),
    timeoutMs: parsePositiveInt(env.CHATFLOW_TIMEOUT_MS, DEFAULT_TIMEOUT_MS),
    retryCount: parseNonNegativeInt(env.CHATFLOW_RETRY_COUNT, DEFAULT_RETRY_COUNT),
    retryDelayMs: parseNonNegativeInt(env.CHATFLOW_RETRY_DELAY_MS, DEFAULT_RETRY_DELAY_MS),
    retryPolicy: parseChoice(
      "CHATFLOW_RETRY_POLICY",
      env.CHATFLOW_RETRY_POLICY,
      ["classified", "all"] as const,
      "classified"
    ),
    turnDelayMs: parseNonNegativeInt(env.CHATFLOW_TURN_DELAY_MS, DEFAULT_TURN_DELAY_MS),
    logCapacity: parsePositiveInt(env.CHATFLOW_LOG_BUFFER, DEFAULT_LOG_BUFFER),
  };
}
