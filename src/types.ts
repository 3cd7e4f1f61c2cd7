/**
 * Extra inputs forwarded to the chat service alongside a user message.
 */
export type ExtraInputs = Record<string, unknown>;

/**
 * One input row: a single turn of a conversation.
 */
export interface TestCase {
  group_id: string;
  turn_number: number;
  user_message: string;
  expected_reply: string | null; // informational only
  extra_inputs: ExtraInputs;
  row_index: number;
}

/**
 * Turns sharing a group_id, ordered 1..N.
 */
export interface ConversationGroup {
  group_id: string;
  cases: readonly TestCase[];
}

/**
 * Raw input row after column aliases are resolved, before validation.
 */
export interface CaseRow {
  row_index: number;
  group_id?: unknown;
  turn_number?: unknown;
  user_message?: unknown;
  expected_reply?: unknown;
  extra_inputs?: unknown;
}

export interface ValidationIssue {
  group_id: string | null;
  defects: string[];
}

export type ResponseMode = "streaming" | "blocking";
export type ProviderKind = "chat-messages" | "openai-responses";
export type RetryPolicy = "classified" | "all";

export type CallStatus = "success" | "retryable_failure" | "fatal_failure";

/**
 * Result of one attempt (or the final attempt) at executing a turn.
 */
export interface CallOutcome {
  status: CallStatus;
  reply_text: string;
  session_id: string | null;
  latency_ms: number;
  error_detail: string | null;
  attempt_number: number;
}

export type FinalStatus =
  | "success"
  | "failed"
  | "skipped_due_to_prior_failure"
  | "cancelled";

/**
 * Durable output for one test case, one line of runs/<run_id>/results.jsonl
 */
export interface ResultRecord {
  group_id: string;
  turn_number: number;
  user_message: string;
  expected_reply: string | null;
  extra_inputs: ExtraInputs;
  actual_reply: string;
  latency_seconds: number;
  final_status: FinalStatus;
  error_detail: string | null;
  attempts: number;
  session_id: string | null;
  completed_at: string;
}

export interface ConversationOutcome {
  group_id: string;
  status: "completed" | "failed" | "cancelled";
  session_id: string | null;
  records: ResultRecord[];
}

export type ExecutionPhase =
  | "idle"
  | "running"
  | "paused"
  | "stopping"
  | "stopped"
  | "completed"
  | "error";

export interface CurrentItem {
  group_id: string;
  turn_number: number;
  position: number;
  user_message: string;
}

export interface ExecutionProgress {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  cancelled: number;
  current: CurrentItem | null;
}

export interface ExecutionStatistics {
  min_latency_seconds: number | null;
  avg_latency_seconds: number | null;
  max_latency_seconds: number | null;
  success_rate: number;
}

export type LogLevel = "info" | "success" | "warning" | "error";

export interface LogEntry {
  id: string;
  timestamp: string;
  level: LogLevel;
  message: string;
}

/**
 * Run-wide state. Observers only ever receive copies.
 */
export interface ExecutionStatus {
  run_id: string | null;
  phase: ExecutionPhase;
  progress: ExecutionProgress;
  statistics: ExecutionStatistics;
  start_time: string | null;
  end_time: string | null;
  error: string | null;
  rejected_groups: ValidationIssue[];
  logs: LogEntry[];
}

export type ControlErrorCode =
  | "invalid_state"
  | "already_running"
  | "no_cases"
  | "export_failed";

export interface ControlFailure {
  ok: false;
  reason: ControlErrorCode;
  message: string;
}

export type ControlResult = { ok: true } | ControlFailure;
export type ControlValueResult<T> = { ok: true; value: T } | ControlFailure;

export type ExportScope = "all" | "success" | "failed";
export type ExportFormat = "json" | "jsonl" | "csv";

/**
 * Run manifest: written to runs/<run_id>/manifest.json
 */
export interface RunManifest {
  run_id: string;
  timestamp_utc: string;
  provider: ProviderKind;
  api_url: string;
  api_key: string; // masked
  model: string | null;
  response_mode: ResponseMode;
  timeout_ms: number;
  retry: {
    policy: RetryPolicy;
    count: number;
    delay_ms: number;
  };
  case_file: string;
  group_count: number;
  case_count: number;
  groups: Array<{ group_id: string; trace_id: string; turns: number }>;
  rejected_groups: ValidationIssue[];
}

/**
 * Run summary: written to runs/<run_id>/summary.json
 */
export interface RunSummary {
  run_id: string;
  phase: ExecutionPhase;
  start_time: string | null;
  end_time: string | null;
  error: string | null;
  progress: Omit<ExecutionProgress, "current">;
  statistics: ExecutionStatistics;
  rejected_groups: ValidationIssue[];
}
