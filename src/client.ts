import { DeliveryError, errorMessage } from "./errors.js";
import type { Delivery } from "./delivery.js";
import type { CallOutcome, ExtraInputs, RetryPolicy } from "./types.js";

export interface RetryOptions {
  runId: string;
  timeoutMs: number;
  retryCount: number;
  retryDelayMs: number;
  retryPolicy: RetryPolicy;
}

export interface TurnRequest {
  sessionId: string | null;
  message: string;
  extraInputs: ExtraInputs;
  traceId: string;
}

/**
 * Called with the failed attempt's outcome before waiting for the next one.
 */
export type RetryListener = (outcome: CallOutcome, delayMs: number) => void;

export interface TurnExecutor {
  executeTurn(request: TurnRequest, onRetry?: RetryListener): Promise<CallOutcome>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Under "all" every failure is retried; under "classified" failures the
 * transport marks non-retryable (bad request, auth rejection) end the turn
 * immediately without using retry budget.
 */
export function isRetryable(err: unknown, policy: RetryPolicy): boolean {
  if (policy === "all") return true;
  return err instanceof DeliveryError ? err.retryable : true;
}

export class RetryingChatClient implements TurnExecutor {
  constructor(
    private readonly delivery: Delivery,
    private readonly options: RetryOptions,
    private readonly wait: (ms: number) => Promise<void> = sleep
  ) {}

  async executeTurn(request: TurnRequest, onRetry?: RetryListener): Promise<CallOutcome> {
    const maxAttempts = Math.max(0, this.options.retryCount) + 1;

    for (let attempt = 1; ; attempt++) {
      const startTime = performance.now();
      try {
        const result = await this.delivery.deliver({
          query: request.message,
          sessionId: request.sessionId,
          inputs: request.extraInputs,
          timeoutMs: this.options.timeoutMs,
          runId: this.options.runId,
          traceId: request.traceId,
        });
        return {
          status: "success",
          reply_text: result.replyText,
          session_id: result.sessionId ?? request.sessionId,
          latency_ms: performance.now() - startTime,
          error_detail: null,
          attempt_number: attempt,
        };
      } catch (err) {
        const outcome: CallOutcome = {
          status: "retryable_failure",
          reply_text: "",
          session_id: request.sessionId,
          latency_ms: performance.now() - startTime,
          error_detail: errorMessage(err),
          attempt_number: attempt,
        };

        if (attempt >= maxAttempts || !isRetryable(err, this.options.retryPolicy)) {
          return { ...outcome, status: "fatal_failure" };
        }

        onRetry?.(outcome, this.options.retryDelayMs);
        await this.wait(this.options.retryDelayMs);
      }
    }
  }
}
