import fs from "node:fs";
import path from "node:path";
import type { ExportFormat, ExportScope, FinalStatus, ResultRecord } from "./types.js";

/**
 * Append-only store for result records. `append` returns only once the
 * record is durable; nothing updates or deletes a written record.
 */
export interface ResultSink {
  append(record: ResultRecord): void;
  readAll(): ResultRecord[];
}

const FINAL_STATUSES: readonly FinalStatus[] = [
  "success",
  "failed",
  "skipped_due_to_prior_failure",
  "cancelled",
];

export const CSV_COLUMNS = [
  "group_id",
  "turn_number",
  "user_message",
  "expected_reply",
  "extra_inputs",
  "actual_reply",
  "latency_seconds",
  "final_status",
  "error_detail",
  "attempts",
  "session_id",
  "completed_at",
] as const satisfies ReadonlyArray<keyof ResultRecord>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNullableString(value: unknown): value is string | null {
  return value === null || typeof value === "string";
}

function readFinalStatus(value: unknown): FinalStatus | null {
  return FINAL_STATUSES.find((status) => status === value) ?? null;
}

/**
 * Validate a decoded JSON value as a ResultRecord.
 */
export function parseResultRecord(value: unknown): ResultRecord {
  if (!isRecord(value)) {
    throw new Error("Result record must be an object");
  }
  const finalStatus = readFinalStatus(value.final_status);
  const extraInputs = value.extra_inputs;
  if (
    typeof value.group_id !== "string" ||
    typeof value.turn_number !== "number" ||
    typeof value.user_message !== "string" ||
    !isNullableString(value.expected_reply) ||
    !isRecord(extraInputs) ||
    typeof value.actual_reply !== "string" ||
    typeof value.latency_seconds !== "number" ||
    finalStatus === null ||
    !isNullableString(value.error_detail) ||
    typeof value.attempts !== "number" ||
    !isNullableString(value.session_id) ||
    typeof value.completed_at !== "string"
  ) {
    throw new Error("Result record is missing required fields");
  }

  return {
    group_id: value.group_id,
    turn_number: value.turn_number,
    user_message: value.user_message,
    expected_reply: value.expected_reply,
    extra_inputs: extraInputs,
    actual_reply: value.actual_reply,
    latency_seconds: value.latency_seconds,
    final_status: finalStatus,
    error_detail: value.error_detail,
    attempts: value.attempts,
    session_id: value.session_id,
    completed_at: value.completed_at,
  };
}

function parseJsonLines(content: string, source: string): ResultRecord[] {
  const lines = content.split("\n");
  // A crash mid-append can leave one unterminated line; it was never acknowledged.
  lines.pop();

  return lines
    .map((line, index) => ({ line: line.trim(), lineNumber: index + 1 }))
    .filter(({ line }) => line.length > 0)
    .map(({ line, lineNumber }) => {
      try {
        return parseResultRecord(JSON.parse(line));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`${source}:${lineNumber}: ${reason}`);
      }
    });
}

/**
 * Read every acknowledged record from a results.jsonl file. Safe to call
 * while another writer is appending.
 */
export function readResultRecords(filePath: string): ResultRecord[] {
  if (!fs.existsSync(filePath)) {
    return [];
  }
  return parseJsonLines(fs.readFileSync(filePath, "utf8"), filePath);
}

/**
 * One JSON line per record, fsync'd before append returns.
 */
export class JsonlResultSink implements ResultSink {
  constructor(readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  append(record: ResultRecord): void {
    const line = Buffer.from(JSON.stringify(record) + "\n", "utf8");
    const fd = fs.openSync(this.filePath, "a");
    try {
      let offset = 0;
      while (offset < line.length) {
        offset += fs.writeSync(fd, line, offset, line.length - offset);
      }
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
  }

  readAll(): ResultRecord[] {
    return readResultRecords(this.filePath);
  }
}

export function filterByScope(records: readonly ResultRecord[], scope: ExportScope): ResultRecord[] {
  switch (scope) {
    case "success":
      return records.filter((record) => record.final_status === "success");
    case "failed":
      return records.filter((record) => record.final_status !== "success");
    default:
      return [...records];
  }
}

function csvCell(value: unknown): string {
  const text =
    value === null || value === undefined
      ? ""
      : typeof value === "object"
        ? JSON.stringify(value)
        : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatResults(
  records: readonly ResultRecord[],
  format: ExportFormat,
  exportedAt: Date = new Date()
): string {
  switch (format) {
    case "jsonl":
      return records.map((record) => JSON.stringify(record) + "\n").join("");
    case "csv": {
      const rows = records.map((record) => CSV_COLUMNS.map((column) => csvCell(record[column])).join(","));
      return [CSV_COLUMNS.join(","), ...rows].join("\n") + "\n";
    }
    default:
      return (
        JSON.stringify(
          {
            export_info: { exported_at: exportedAt.toISOString(), count: records.length },
            results: records,
          },
          null,
          2
        ) + "\n"
      );
  }
}

/**
 * Re-import an export produced by formatResults (json or jsonl).
 */
export function parseExportedResults(content: string, format: "json" | "jsonl"): ResultRecord[] {
  if (format === "jsonl") {
    return parseJsonLines(content.endsWith("\n") ? content : content + "\n", "export");
  }
  const data: unknown = JSON.parse(content);
  if (!isRecord(data) || !Array.isArray(data.results)) {
    throw new Error('Export must contain a "results" array');
  }
  return data.results.map((value: unknown) => parseResultRecord(value));
}
