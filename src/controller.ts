import { sleep } from "./client.js";
import type { TurnExecutor } from "./client.js";
import { runGroup } from "./conversation.js";
import { errorMessage } from "./errors.js";
import { countCases } from "./grouping.js";
import { filterByScope } from "./sink.js";
import type { ResultSink } from "./sink.js";
import { createIdleStatus, RunLog, snapshotStatus } from "./status.js";
import { createTraceId } from "./trace.js";
import type {
  ControlFailure,
  ControlResult,
  ControlValueResult,
  ConversationGroup,
  ConversationOutcome,
  ControlErrorCode,
  ExecutionPhase,
  ExecutionStatus,
  ExportScope,
  LogEntry,
  LogLevel,
  ResultRecord,
  ValidationIssue,
} from "./types.js";

const MESSAGE_PREVIEW_LEN = 50;

/**
 * Everything one run needs. The client and sink are per run so a restart
 * never writes into a previous run's store.
 */
export interface RunPlan {
  runId: string;
  groups: readonly ConversationGroup[];
  rejected?: readonly ValidationIssue[];
  client: TurnExecutor;
  sink: ResultSink;
}

export interface ControllerOptions {
  /** Entries kept in status snapshots; the full log is always exportable. */
  logCapacity?: number;
  /** Pause between consecutive turns and groups. */
  turnDelayMs?: number;
  onLog?: (entry: LogEntry) => void;
  sleep?: (ms: number) => Promise<void>;
}

function reject(reason: ControlErrorCode, message: string): ControlFailure {
  return { ok: false, reason, message };
}

function preview(text: string): string {
  return text.length <= MESSAGE_PREVIEW_LEN ? text : text.slice(0, MESSAGE_PREVIEW_LEN) + "...";
}

function isActive(phase: ExecutionPhase): boolean {
  return phase === "running" || phase === "paused" || phase === "stopping";
}

/**
 * Owns the single run-wide ExecutionStatus. Groups run strictly one after
 * another on one worker; pause, resume and stop only flip the phase and
 * are observed by the worker at group and turn boundaries, never during an
 * in-flight call.
 */
export class ExecutionController {
  private state: ExecutionStatus = createIdleStatus();
  private log: RunLog;
  private plan: RunPlan | null = null;
  private worker: Promise<void> | null = null;
  private resumeWaiter: (() => void) | null = null;
  private latency = { count: 0, sum: 0 };
  private readonly wait: (ms: number) => Promise<void>;

  constructor(private readonly options: ControllerOptions = {}) {
    this.log = new RunLog(options.logCapacity);
    this.wait = options.sleep ?? sleep;
  }

  status(): ExecutionStatus {
    return snapshotStatus(this.state, this.log);
  }

  exportLog(): LogEntry[] {
    return this.log.all();
  }

  /**
   * Resolves with the final snapshot once the current worker has finished.
   */
  async whenSettled(): Promise<ExecutionStatus> {
    if (this.worker) {
      await this.worker;
    }
    return this.status();
  }

  start(plan: RunPlan): ControlResult {
    const phase = this.state.phase;
    if (isActive(phase)) {
      return reject("already_running", `A run is already ${phase}`);
    }
    if (phase !== "idle") {
      return reject(
        "invalid_state",
        `Run ${this.state.run_id ?? ""} is ${phase}; restart or reset before starting another`
      );
    }
    if (plan.groups.length === 0) {
      return reject("no_cases", "No valid conversation groups to execute");
    }
    this.begin(plan);
    return { ok: true };
  }

  /**
   * Discard the finished run's status and start a new one.
   */
  restart(plan: RunPlan): ControlResult {
    if (isActive(this.state.phase)) {
      return reject("already_running", `A run is already ${this.state.phase}`);
    }
    if (plan.groups.length === 0) {
      return reject("no_cases", "No valid conversation groups to execute");
    }
    this.resetState();
    this.begin(plan);
    return { ok: true };
  }

  reset(): ControlResult {
    if (isActive(this.state.phase)) {
      return reject("already_running", `Cannot reset while a run is ${this.state.phase}`);
    }
    this.resetState();
    return { ok: true };
  }

  pause(): ControlResult {
    if (this.state.phase !== "running") {
      return reject("invalid_state", `Cannot pause while ${this.state.phase}`);
    }
    this.state.phase = "paused";
    this.appendLog("info", "Pause requested; takes effect after the current group");
    return { ok: true };
  }

  resume(): ControlResult {
    if (this.state.phase !== "paused") {
      return reject("invalid_state", `Cannot resume while ${this.state.phase}`);
    }
    this.state.phase = "running";
    this.appendLog("info", "Execution resumed");
    this.releaseWaiter();
    return { ok: true };
  }

  stop(): ControlResult {
    if (this.state.phase !== "running" && this.state.phase !== "paused") {
      return reject("invalid_state", `Cannot stop while ${this.state.phase}`);
    }
    this.state.phase = "stopping";
    this.appendLog("warning", "Stop requested; halting at the next checkpoint");
    this.releaseWaiter();
    return { ok: true };
  }

  /**
   * Read the current run's records from its durable store.
   */
  exportResults(scope: ExportScope = "all"): ControlValueResult<ResultRecord[]> {
    if (!this.plan) {
      return reject("invalid_state", "No run has been started");
    }
    try {
      return { ok: true, value: filterByScope(this.plan.sink.readAll(), scope) };
    } catch (err) {
      return reject("export_failed", errorMessage(err));
    }
  }

  private resetState(): void {
    this.state = createIdleStatus();
    this.log = new RunLog(this.options.logCapacity);
    this.latency = { count: 0, sum: 0 };
    this.plan = null;
    this.worker = null;
  }

  private begin(plan: RunPlan): void {
    this.plan = plan;
    this.state.run_id = plan.runId;
    this.state.phase = "running";
    this.state.start_time = new Date().toISOString();
    this.state.progress.total = countCases(plan.groups);
    this.state.rejected_groups = (plan.rejected ?? []).map((issue) => ({
      group_id: issue.group_id,
      defects: [...issue.defects],
    }));

    this.appendLog(
      "info",
      `Run ${plan.runId} started: ${plan.groups.length} groups, ${this.state.progress.total} turns`
    );
    for (const issue of this.state.rejected_groups) {
      this.appendLog(
        "warning",
        `Group ${issue.group_id ?? "(missing id)"} rejected: ${issue.defects.join("; ")}`
      );
    }

    this.worker = this.execute(plan);
  }

  private isStopping(): boolean {
    return this.state.phase === "stopping";
  }

  private isPaused(): boolean {
    return this.state.phase === "paused";
  }

  private releaseWaiter(): void {
    const waiter = this.resumeWaiter;
    this.resumeWaiter = null;
    waiter?.();
  }

  private async pace(): Promise<void> {
    const delayMs = this.options.turnDelayMs ?? 0;
    if (delayMs > 0) {
      await this.wait(delayMs);
    }
  }

  // Group boundary: block here for as long as the run is paused.
  private async checkpoint(): Promise<void> {
    if (!this.isPaused()) return;
    this.state.progress.current = null;
    this.appendLog("info", "Execution paused");
    while (this.isPaused()) {
      await new Promise<void>((resolve) => {
        this.resumeWaiter = resolve;
      });
    }
  }

  private async execute(plan: RunPlan): Promise<void> {
    try {
      for (const [index, group] of plan.groups.entries()) {
        if (index > 0) {
          await this.pace();
        }
        await this.checkpoint();
        if (this.isStopping()) break;

        const outcome = await this.executeGroup(plan, group, index);
        this.logGroupOutcome(outcome);
        this.state.progress.current = null;
      }

      await this.checkpoint();
      this.finish(this.isStopping() ? "stopped" : "completed");
    } catch (err) {
      this.fail(err);
    }
  }

  private executeGroup(
    plan: RunPlan,
    group: ConversationGroup,
    index: number
  ): Promise<ConversationOutcome> {
    this.appendLog(
      "info",
      `Group ${group.group_id} started (${index + 1}/${plan.groups.length}, ${group.cases.length} turns)`
    );

    return runGroup(group, plan.client, {
      traceId: createTraceId(group.group_id, index, plan.runId),
      shouldContinue: () => !this.isStopping(),
      beforeNextTurn: () => this.pace(),
      onTurnStart: (testCase) => {
        this.state.progress.current = {
          group_id: testCase.group_id,
          turn_number: testCase.turn_number,
          position: this.state.progress.completed + 1,
          user_message: preview(testCase.user_message),
        };
        this.appendLog(
          "info",
          `Group ${testCase.group_id} turn ${testCase.turn_number}: ${preview(testCase.user_message)}`
        );
      },
      onRetry: (testCase, outcome, delayMs) => {
        this.appendLog(
          "warning",
          `Group ${testCase.group_id} turn ${testCase.turn_number} attempt ${outcome.attempt_number} failed, retrying in ${delayMs}ms: ${outcome.error_detail ?? "unknown error"}`
        );
      },
      onTurnComplete: (record) => {
        plan.sink.append(record);
        this.recordProgress(record);
      },
    });
  }

  private recordProgress(record: ResultRecord): void {
    const progress = this.state.progress;
    progress.completed += 1;

    switch (record.final_status) {
      case "success":
        progress.succeeded += 1;
        this.recordLatency(record.latency_seconds);
        this.appendLog(
          "success",
          `Group ${record.group_id} turn ${record.turn_number} succeeded in ${record.latency_seconds.toFixed(2)}s`
        );
        break;
      case "failed":
        progress.failed += 1;
        this.appendLog(
          "error",
          `Group ${record.group_id} turn ${record.turn_number} failed after ${record.attempts} attempts: ${record.error_detail ?? "unknown error"}`
        );
        break;
      case "skipped_due_to_prior_failure":
        progress.skipped += 1;
        break;
      case "cancelled":
        progress.cancelled += 1;
        break;
    }

    this.state.statistics.success_rate =
      Math.round((progress.succeeded / progress.completed) * 10000) / 100;
  }

  private recordLatency(seconds: number): void {
    const stats = this.state.statistics;
    this.latency.count += 1;
    this.latency.sum += seconds;
    stats.min_latency_seconds =
      stats.min_latency_seconds === null ? seconds : Math.min(stats.min_latency_seconds, seconds);
    stats.max_latency_seconds =
      stats.max_latency_seconds === null ? seconds : Math.max(stats.max_latency_seconds, seconds);
    stats.avg_latency_seconds = Math.round((this.latency.sum / this.latency.count) * 1000) / 1000;
  }

  private logGroupOutcome(outcome: ConversationOutcome): void {
    const notRun = outcome.records.filter(
      (record) => record.final_status === "skipped_due_to_prior_failure" || record.final_status === "cancelled"
    ).length;

    switch (outcome.status) {
      case "completed":
        this.appendLog("success", `Group ${outcome.group_id} completed (${outcome.records.length} turns)`);
        break;
      case "failed":
        this.appendLog("error", `Group ${outcome.group_id} failed; ${notRun} remaining turns skipped`);
        break;
      case "cancelled":
        this.appendLog("warning", `Group ${outcome.group_id} cancelled; ${notRun} remaining turns not run`);
        break;
    }
  }

  private finish(phase: "stopped" | "completed"): void {
    const { succeeded, failed, skipped } = this.state.progress;
    this.state.phase = phase;
    this.state.end_time = new Date().toISOString();
    this.state.progress.current = null;
    this.appendLog(
      phase === "completed" ? "success" : "warning",
      `Run ${phase}: ${succeeded} succeeded, ${failed} failed, ${skipped} skipped`
    );
  }

  private fail(err: unknown): void {
    const message = errorMessage(err);
    this.state.phase = "error";
    this.state.error = message;
    this.state.end_time = new Date().toISOString();
    this.state.progress.current = null;
    this.appendLog("error", `Run aborted: ${message}`);
  }

  private appendLog(level: LogLevel, message: string): void {
    const entry = this.log.append(level, message);
    this.options.onLog?.(entry);
  }
}
