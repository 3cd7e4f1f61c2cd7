import fs from "node:fs";
import type { CaseRow } from "./types.js";

const CASE_FIELDS = [
  "group_id",
  "turn_number",
  "user_message",
  "expected_reply",
  "extra_inputs",
] as const;

type CaseField = (typeof CASE_FIELDS)[number];

/**
 * Accepted column names per field: Latin names first, then the localized
 * labels used by the spreadsheet template.
 */
export const FIELD_ALIASES: Record<CaseField, readonly string[]> = {
  group_id: ["group_id", "conversation_id", "对话ID"],
  turn_number: ["turn_number", "round", "轮次"],
  user_message: ["user_message", "question", "用户问题"],
  expected_reply: ["expected_reply", "expected_answer", "期待回复"],
  extra_inputs: ["extra_inputs", "inputs", "额外输入"],
};

const ALIAS_LOOKUP = new Map<string, CaseField>(
  CASE_FIELDS.flatMap((field) => FIELD_ALIASES[field].map((alias) => [alias, field] as const))
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve column aliases on one raw row. Unknown columns are dropped.
 */
export function normalizeRow(raw: Record<string, unknown>, rowIndex: number): CaseRow {
  const row: CaseRow = { row_index: rowIndex };
  for (const [column, value] of Object.entries(raw)) {
    const field = ALIAS_LOOKUP.get(column.trim());
    if (field && row[field] === undefined) {
      row[field] = value;
    }
  }
  return row;
}

/**
 * Parse a case file: a JSON array of row objects, or { "cases": [...] }.
 * A row that is not an object keeps only its position, so grouping reports
 * it without dropping the rest of the file.
 */
export function parseCaseRows(content: string): CaseRow[] {
  const data: unknown = JSON.parse(content);
  const rows = isRecord(data) ? data.cases : data;

  if (!Array.isArray(rows)) {
    throw new Error('Case file must contain an array of rows or an object with a "cases" array');
  }

  return rows.map((raw: unknown, index) =>
    isRecord(raw) ? normalizeRow(raw, index + 1) : { row_index: index + 1 }
  );
}

/**
 * Load case rows from disk, optionally keeping only the given group IDs.
 */
export function loadCaseRows(filePath: string, filter?: string[]): CaseRow[] {
  const rows = parseCaseRows(fs.readFileSync(filePath, "utf-8"));

  if (filter && filter.length > 0) {
    return rows.filter((row) => filter.includes(String(row.group_id ?? "").trim()));
  }

  return rows;
}
