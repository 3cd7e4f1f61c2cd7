import crypto from "node:crypto";
import type { ExecutionStatus, LogEntry, LogLevel } from "./types.js";

export const DEFAULT_LOG_CAPACITY = 100;

/**
 * Run log: the most recent entries in a bounded ring for status snapshots,
 * plus the full history for export.
 */
export class RunLog {
  private readonly entries: LogEntry[] = [];
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_LOG_CAPACITY) {
    this.capacity = Math.max(1, Math.floor(capacity));
  }

  append(level: LogLevel, message: string, at: Date = new Date()): LogEntry {
    const entry: LogEntry = {
      id: crypto.randomUUID(),
      timestamp: at.toISOString(),
      level,
      message,
    };
    this.entries.push(entry);
    return entry;
  }

  recent(): LogEntry[] {
    return this.entries.slice(-this.capacity);
  }

  all(): LogEntry[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

export function createIdleStatus(): ExecutionStatus {
  return {
    run_id: null,
    phase: "idle",
    progress: {
      total: 0,
      completed: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      cancelled: 0,
      current: null,
    },
    statistics: {
      min_latency_seconds: null,
      avg_latency_seconds: null,
      max_latency_seconds: null,
      success_rate: 0,
    },
    start_time: null,
    end_time: null,
    error: null,
    rejected_groups: [],
    logs: [],
  };
}

/**
 * Detached copy of the live status with the capped log attached. Callers
 * may keep or mutate it freely.
 */
export function snapshotStatus(status: ExecutionStatus, log: RunLog): ExecutionStatus {
  return structuredClone({ ...status, logs: log.recent() });
}

function fmtSeconds(value: number | null): string {
  return value === null ? "-" : `${value.toFixed(2)}s`;
}

/**
 * One-line progress summary for terminal output.
 */
export function formatProgressLine(status: ExecutionStatus): string {
  const { progress, statistics } = status;
  const pct = progress.total > 0 ? (progress.completed / progress.total) * 100 : 0;
  const current = progress.current
    ? ` | ${progress.current.group_id} turn ${progress.current.turn_number}`
    : "";
  return (
    `[${status.phase}] ${progress.completed}/${progress.total} (${pct.toFixed(1)}%)` +
    ` ok=${progress.succeeded} failed=${progress.failed} skipped=${progress.skipped}` +
    ` cancelled=${progress.cancelled} avg=${fmtSeconds(statistics.avg_latency_seconds)}${current}`
  );
}
