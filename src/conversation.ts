import type { RetryListener, TurnExecutor } from "./client.js";
import type {
  CallOutcome,
  ConversationGroup,
  ConversationOutcome,
  FinalStatus,
  ResultRecord,
  TestCase,
} from "./types.js";

export interface RunGroupOptions {
  traceId: string;
  /** Checkpoint consulted between turns; false ends the group as cancelled. */
  shouldContinue: () => boolean;
  /** Invoked synchronously for each record before the next turn starts. */
  onTurnComplete: (record: ResultRecord) => void;
  onTurnStart?: (testCase: TestCase) => void;
  onRetry?: (testCase: TestCase, outcome: CallOutcome, delayMs: number) => void;
  /** Pacing between consecutive turns, awaited before the checkpoint. */
  beforeNextTurn?: () => Promise<void>;
}

function roundSeconds(ms: number): number {
  return Math.round(ms) / 1000;
}

export function buildResultRecord(
  testCase: TestCase,
  fields: {
    final_status: FinalStatus;
    actual_reply?: string;
    latency_ms?: number;
    error_detail?: string | null;
    attempts?: number;
    session_id?: string | null;
  }
): ResultRecord {
  return {
    group_id: testCase.group_id,
    turn_number: testCase.turn_number,
    user_message: testCase.user_message,
    expected_reply: testCase.expected_reply,
    extra_inputs: testCase.extra_inputs,
    actual_reply: fields.actual_reply ?? "",
    latency_seconds: roundSeconds(fields.latency_ms ?? 0),
    final_status: fields.final_status,
    error_detail: fields.error_detail ?? null,
    attempts: fields.attempts ?? 0,
    session_id: fields.session_id ?? null,
    completed_at: new Date().toISOString(),
  };
}

function closeRemaining(
  remaining: readonly TestCase[],
  finalStatus: "skipped_due_to_prior_failure" | "cancelled",
  detail: string,
  sessionId: string | null,
  options: RunGroupOptions,
  records: ResultRecord[]
): void {
  for (const testCase of remaining) {
    const record = buildResultRecord(testCase, {
      final_status: finalStatus,
      error_detail: detail,
      session_id: sessionId,
    });
    records.push(record);
    options.onTurnComplete(record);
  }
}

/**
 * Drive one conversation turn by turn. Turn 1 goes out without a session;
 * the session it returns is attached to every later turn. A fatal turn
 * failure skips the rest of the group, since the remote conversation can
 * no longer be continued in order.
 */
export async function runGroup(
  group: ConversationGroup,
  client: TurnExecutor,
  options: RunGroupOptions
): Promise<ConversationOutcome> {
  const records: ResultRecord[] = [];
  let sessionId: string | null = null;

  for (const [index, testCase] of group.cases.entries()) {
    if (index > 0) {
      await options.beforeNextTurn?.();
      if (!options.shouldContinue()) {
        closeRemaining(
          group.cases.slice(index),
          "cancelled",
          "run stopped before this turn",
          sessionId,
          options,
          records
        );
        return { group_id: group.group_id, status: "cancelled", session_id: sessionId, records };
      }
    }

    options.onTurnStart?.(testCase);

    const onRetry: RetryListener | undefined = options.onRetry
      ? (outcome, delayMs) => options.onRetry?.(testCase, outcome, delayMs)
      : undefined;

    const outcome = await client.executeTurn(
      {
        sessionId,
        message: testCase.user_message,
        extraInputs: testCase.extra_inputs,
        traceId: options.traceId,
      },
      onRetry
    );

    if (outcome.status === "success") {
      sessionId ??= outcome.session_id;
    }

    const record = buildResultRecord(testCase, {
      final_status: outcome.status === "success" ? "success" : "failed",
      actual_reply: outcome.reply_text,
      latency_ms: outcome.latency_ms,
      error_detail: outcome.error_detail,
      attempts: outcome.attempt_number,
      session_id: sessionId,
    });
    records.push(record);
    options.onTurnComplete(record);

    if (outcome.status !== "success") {
      closeRemaining(
        group.cases.slice(index + 1),
        "skipped_due_to_prior_failure",
        `turn ${testCase.turn_number} failed`,
        sessionId,
        options,
        records
      );
      return { group_id: group.group_id, status: "failed", session_id: sessionId, records };
    }
  }

  return { group_id: group.group_id, status: "completed", session_id: sessionId, records };
}
