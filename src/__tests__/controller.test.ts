import test from "node:test";
import assert from "node:assert/strict";
import { ExecutionController } from "../controller.js";
import type { RunPlan } from "../controller.js";
import type { RetryListener, TurnExecutor, TurnRequest } from "../client.js";
import type { ResultSink } from "../sink.js";
import type { CallOutcome, ConversationGroup, LogEntry, ResultRecord } from "../types.js";

type Respond = (request: TurnRequest, call: number, onRetry?: RetryListener) => CallOutcome | Promise<CallOutcome>;

class StubExecutor implements TurnExecutor {
  readonly requests: TurnRequest[] = [];

  constructor(private readonly respond: Respond = () => success()) {}

  async executeTurn(request: TurnRequest, onRetry?: RetryListener): Promise<CallOutcome> {
    this.requests.push(request);
    return this.respond(request, this.requests.length - 1, onRetry);
  }
}

class MemorySink implements ResultSink {
  readonly records: ResultRecord[] = [];

  append(record: ResultRecord): void {
    this.records.push(record);
  }

  readAll(): ResultRecord[] {
    return [...this.records];
  }
}

function success(latencyMs = 1000, sessionId = "conv-1"): CallOutcome {
  return {
    status: "success",
    reply_text: "ok",
    session_id: sessionId,
    latency_ms: latencyMs,
    error_detail: null,
    attempt_number: 1,
  };
}

function fatal(detail: string, attempts = 3): CallOutcome {
  return {
    status: "fatal_failure",
    reply_text: "",
    session_id: null,
    latency_ms: 10,
    error_detail: detail,
    attempt_number: attempts,
  };
}

function group(groupId: string, turns: number): ConversationGroup {
  return {
    group_id: groupId,
    cases: Array.from({ length: turns }, (_, i) => ({
      group_id: groupId,
      turn_number: i + 1,
      user_message: `${groupId} turn ${i + 1}`,
      expected_reply: null,
      extra_inputs: {},
      row_index: i + 1,
    })),
  };
}

function plan(
  groups: ConversationGroup[],
  client: TurnExecutor = new StubExecutor(),
  sink: ResultSink = new MemorySink(),
  runId = "run-1"
): RunPlan {
  return { runId, groups, client, sink };
}

function gate(): { opened: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

async function waitFor(predicate: () => boolean): Promise<void> {
  for (let i = 0; i < 200; i++) {
    if (predicate()) return;
    await new Promise((resolve) => setImmediate(resolve));
  }
  assert.fail("condition was never reached");
}

function messages(entries: LogEntry[]): string[] {
  return entries.map((entry) => entry.message);
}

test("a run executes every group and logs each step", async () => {
  const seen: LogEntry[] = [];
  const sink = new MemorySink();
  const controller = new ExecutionController({ onLog: (entry) => seen.push(entry) });

  assert.deepEqual(controller.start(plan([group("g1", 1)], new StubExecutor(), sink)), { ok: true });
  const final = await controller.whenSettled();

  assert.equal(final.phase, "completed");
  assert.equal(final.run_id, "run-1");
  assert.ok(final.start_time);
  assert.ok(final.end_time);
  assert.equal(final.progress.current, null);
  assert.deepEqual(messages(controller.exportLog()), [
    "Run run-1 started: 1 groups, 1 turns",
    "Group g1 started (1/1, 1 turns)",
    "Group g1 turn 1: g1 turn 1",
    "Group g1 turn 1 succeeded in 1.00s",
    "Group g1 completed (1 turns)",
    "Run completed: 1 succeeded, 0 failed, 0 skipped",
  ]);
  assert.deepEqual(seen, controller.exportLog());
  assert.deepEqual(
    sink.records.map((record) => [record.group_id, record.turn_number, record.final_status]),
    [["g1", 1, "success"]]
  );
});

test("groups run in order with the session carried within each group", async () => {
  const executor = new StubExecutor((request) => success(1000, `conv-${request.message.slice(0, 2)}`));
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 2), group("g2", 2)], executor));
  await controller.whenSettled();

  assert.deepEqual(
    executor.requests.map((request) => [request.message, request.sessionId, request.traceId]),
    [
      ["g1 turn 1", null, "trace_g1_000_run_1"],
      ["g1 turn 2", "conv-g1", "trace_g1_000_run_1"],
      ["g2 turn 1", null, "trace_g2_001_run_1"],
      ["g2 turn 2", "conv-g2", "trace_g2_001_run_1"],
    ]
  );
});

test("progress and statistics count only successful latencies", async () => {
  const outcomes = [success(1000), success(3000), fatal("Chat API 500: boom")];
  const executor = new StubExecutor((_request, call) => outcomes[call] ?? success());
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 2), group("g2", 2)], executor));
  const final = await controller.whenSettled();

  assert.deepEqual(final.progress, {
    total: 4,
    completed: 4,
    succeeded: 2,
    failed: 1,
    skipped: 1,
    cancelled: 0,
    current: null,
  });
  assert.deepEqual(final.statistics, {
    min_latency_seconds: 1,
    avg_latency_seconds: 2,
    max_latency_seconds: 3,
    success_rate: 50,
  });
  const log = messages(controller.exportLog());
  assert.ok(log.includes("Group g2 turn 1 failed after 3 attempts: Chat API 500: boom"));
  assert.ok(log.includes("Group g2 failed; 1 remaining turns skipped"));
  assert.equal(log.at(-1), "Run completed: 2 succeeded, 1 failed, 1 skipped");
});

test("a failed group does not stop later groups", async () => {
  const executor = new StubExecutor((request) =>
    request.message.startsWith("g1") ? fatal("Chat API 401: invalid key", 1) : success()
  );
  const sink = new MemorySink();
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 3), group("g2", 1)], executor, sink));
  const final = await controller.whenSettled();

  assert.equal(final.phase, "completed");
  assert.equal(final.statistics.success_rate, 25);
  assert.deepEqual(
    sink.records.map((record) => `${record.group_id}:${record.turn_number}:${record.final_status}`),
    [
      "g1:1:failed",
      "g1:2:skipped_due_to_prior_failure",
      "g1:3:skipped_due_to_prior_failure",
      "g2:1:success",
    ]
  );
});

test("retries reported by the client are logged as warnings", async () => {
  const executor = new StubExecutor((_request, _call, onRetry) => {
    onRetry?.({ ...fatal("Request timed out after 500ms", 1), status: "retryable_failure" }, 100);
    return { ...success(), attempt_number: 2 };
  });
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 1)], executor));
  await controller.whenSettled();

  const warning = controller.exportLog().find((entry) => entry.level === "warning");
  assert.equal(warning?.message, "Group g1 turn 1 attempt 1 failed, retrying in 100ms: Request timed out after 500ms");
});

test("pause takes effect at the next group boundary and resume continues", async () => {
  const first = gate();
  const executor = new StubExecutor(async (_request, call) => {
    if (call === 0) await first.opened;
    return success();
  });
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 1), group("g2", 1)], executor));
  await waitFor(() => executor.requests.length === 1);

  assert.deepEqual(controller.pause(), { ok: true });
  assert.equal(controller.status().phase, "paused");

  first.open();
  await waitFor(() => messages(controller.exportLog()).includes("Execution paused"));

  const paused = controller.status();
  assert.equal(paused.phase, "paused");
  assert.equal(paused.progress.completed, 1);
  assert.equal(paused.progress.current, null);
  assert.equal(executor.requests.length, 1);

  assert.deepEqual(controller.resume(), { ok: true });
  const final = await controller.whenSettled();

  assert.equal(final.phase, "completed");
  assert.equal(executor.requests.length, 2);
});

test("stop lets the in-flight turn finish and cancels the rest of its group", async () => {
  const first = gate();
  const sink = new MemorySink();
  const executor = new StubExecutor(async (_request, call) => {
    if (call === 0) await first.opened;
    return success();
  });
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 3), group("g2", 1)], executor, sink));
  await waitFor(() => executor.requests.length === 1);

  assert.deepEqual(controller.stop(), { ok: true });
  assert.equal(controller.status().phase, "stopping");

  first.open();
  const final = await controller.whenSettled();

  assert.equal(final.phase, "stopped");
  assert.equal(executor.requests.length, 1);
  assert.deepEqual(
    sink.records.map((record) => `${record.group_id}:${record.turn_number}:${record.final_status}`),
    ["g1:1:success", "g1:2:cancelled", "g1:3:cancelled"]
  );
  assert.deepEqual(final.progress, {
    total: 4,
    completed: 3,
    succeeded: 1,
    failed: 0,
    skipped: 0,
    cancelled: 2,
    current: null,
  });
  const log = messages(controller.exportLog());
  assert.ok(log.includes("Group g1 cancelled; 2 remaining turns not run"));
  assert.equal(log.at(-1), "Run stopped: 1 succeeded, 0 failed, 0 skipped");
});

test("stop while paused ends the run without starting another group", async () => {
  const first = gate();
  const executor = new StubExecutor(async (_request, call) => {
    if (call === 0) await first.opened;
    return success();
  });
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 1), group("g2", 1)], executor));
  await waitFor(() => executor.requests.length === 1);
  controller.pause();
  first.open();
  await waitFor(() => messages(controller.exportLog()).includes("Execution paused"));

  assert.deepEqual(controller.stop(), { ok: true });
  const final = await controller.whenSettled();

  assert.equal(final.phase, "stopped");
  assert.equal(executor.requests.length, 1);
  assert.equal(final.progress.completed, 1);
});

test("control operations are rejected in the wrong phase", async () => {
  const controller = new ExecutionController();

  assert.deepEqual(controller.pause(), {
    ok: false,
    reason: "invalid_state",
    message: "Cannot pause while idle",
  });
  assert.deepEqual(controller.resume(), {
    ok: false,
    reason: "invalid_state",
    message: "Cannot resume while idle",
  });
  assert.deepEqual(controller.stop(), {
    ok: false,
    reason: "invalid_state",
    message: "Cannot stop while idle",
  });
  assert.deepEqual(controller.start(plan([])), {
    ok: false,
    reason: "no_cases",
    message: "No valid conversation groups to execute",
  });

  const first = gate();
  const executor = new StubExecutor(async () => {
    await first.opened;
    return success();
  });
  controller.start(plan([group("g1", 1)], executor));

  assert.deepEqual(controller.start(plan([group("g2", 1)])), {
    ok: false,
    reason: "already_running",
    message: "A run is already running",
  });
  assert.deepEqual(controller.resume(), {
    ok: false,
    reason: "invalid_state",
    message: "Cannot resume while running",
  });
  assert.equal(controller.reset().ok, false);

  first.open();
  await controller.whenSettled();

  assert.deepEqual(controller.pause(), {
    ok: false,
    reason: "invalid_state",
    message: "Cannot pause while completed",
  });
  assert.deepEqual(controller.start(plan([group("g2", 1)])), {
    ok: false,
    reason: "invalid_state",
    message: "Run run-1 is completed; restart or reset before starting another",
  });
});

test("restart replaces a finished run and reset returns to idle", async () => {
  const controller = new ExecutionController();
  controller.start(plan([group("g1", 1)]));
  await controller.whenSettled();

  const secondSink = new MemorySink();
  assert.deepEqual(controller.restart(plan([group("g2", 2)], new StubExecutor(), secondSink, "run-2")), { ok: true });
  const second = await controller.whenSettled();

  assert.equal(second.run_id, "run-2");
  assert.equal(second.phase, "completed");
  assert.equal(second.progress.total, 2);
  assert.equal(controller.exportLog()[0]?.message, "Run run-2 started: 1 groups, 2 turns");
  assert.equal(secondSink.records.length, 2);

  assert.deepEqual(controller.reset(), { ok: true });
  const idle = controller.status();
  assert.equal(idle.phase, "idle");
  assert.equal(idle.run_id, null);
  assert.deepEqual(idle.logs, []);
  assert.equal(controller.exportResults().ok, false);
});

test("an unexpected executor failure ends the run in error", async () => {
  const executor = new StubExecutor(() => {
    throw new Error("socket exploded");
  });
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 1)], executor));
  const final = await controller.whenSettled();

  assert.equal(final.phase, "error");
  assert.equal(final.error, "socket exploded");
  assert.equal(messages(controller.exportLog()).at(-1), "Run aborted: socket exploded");
});

test("a result store write failure ends the run in error", async () => {
  const sink = new MemorySink();
  const failing: ResultSink = {
    append: (record) => {
      if (sink.records.length >= 1) {
        throw new Error("results.jsonl: disk full");
      }
      sink.append(record);
    },
    readAll: () => sink.readAll(),
  };
  const executor = new StubExecutor();
  const controller = new ExecutionController();

  controller.start(plan([group("g1", 3), group("g2", 1)], executor, failing));
  const final = await controller.whenSettled();

  assert.equal(final.phase, "error");
  assert.equal(final.error, "results.jsonl: disk full");
  assert.equal(final.progress.completed, 1);
  assert.deepEqual(
    executor.requests.map((request) => request.message),
    ["g1 turn 1", "g1 turn 2"]
  );
  const log = messages(controller.exportLog());
  assert.ok(!log.some((message) => message.startsWith("Group g2")));
  assert.equal(log.at(-1), "Run aborted: results.jsonl: disk full");

  const exported = controller.exportResults();
  assert.ok(exported.ok);
  assert.deepEqual(
    exported.value.map((record) => `${record.group_id}:${record.turn_number}:${record.final_status}`),
    ["g1:1:success"]
  );
});

test("rejected groups are reported with the run", async () => {
  const controller = new ExecutionController();
  controller.start({
    ...plan([group("g1", 1)]),
    rejected: [{ group_id: "bad", defects: ["missing turn_number 2"] }],
  });
  const final = await controller.whenSettled();

  assert.deepEqual(final.rejected_groups, [{ group_id: "bad", defects: ["missing turn_number 2"] }]);
  assert.ok(messages(controller.exportLog()).includes("Group bad rejected: missing turn_number 2"));
});

test("pacing waits between turns and between groups", async () => {
  const waits: number[] = [];
  const controller = new ExecutionController({
    turnDelayMs: 50,
    sleep: async (ms) => void waits.push(ms),
  });

  controller.start(plan([group("g1", 2), group("g2", 1)]));
  await controller.whenSettled();

  assert.deepEqual(waits, [50, 50]);
});

test("status snapshots cap the log while export keeps everything", async () => {
  const controller = new ExecutionController({ logCapacity: 2 });
  controller.start(plan([group("g1", 1)]));
  const final = await controller.whenSettled();

  assert.deepEqual(messages(final.logs), [
    "Group g1 completed (1 turns)",
    "Run completed: 1 succeeded, 0 failed, 0 skipped",
  ]);
  assert.equal(controller.exportLog().length, 6);
});

test("exportResults filters the run's stored records", async () => {
  const executor = new StubExecutor((request) =>
    request.message === "g1 turn 2" ? fatal("Chat API 500: boom") : success()
  );
  const controller = new ExecutionController();
  assert.deepEqual(controller.exportResults(), {
    ok: false,
    reason: "invalid_state",
    message: "No run has been started",
  });

  controller.start(plan([group("g1", 3)], executor));
  await controller.whenSettled();

  const failed = controller.exportResults("failed");
  assert.ok(failed.ok);
  assert.deepEqual(
    failed.value.map((record) => record.final_status),
    ["failed", "skipped_due_to_prior_failure"]
  );

  const all = controller.exportResults();
  assert.ok(all.ok);
  assert.equal(all.value.length, 3);
});

test("exportResults reports an unreadable store", async () => {
  const broken: ResultSink = {
    append: () => undefined,
    readAll: () => {
      throw new Error("results.jsonl:1: Result record must be an object");
    },
  };
  const controller = new ExecutionController();
  controller.start(plan([group("g1", 1)], new StubExecutor(), broken));
  await controller.whenSettled();

  assert.deepEqual(controller.exportResults(), {
    ok: false,
    reason: "export_failed",
    message: "results.jsonl:1: Result record must be an object",
  });
});
