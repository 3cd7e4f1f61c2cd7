import type {
  CaseRow,
  ConversationGroup,
  ExtraInputs,
  TestCase,
  ValidationIssue,
} from "./types.js";

export interface GroupingResult {
  groups: ConversationGroup[];
  issues: ValidationIssue[];
}

type ParsedRow = { ok: true; testCase: TestCase } | { ok: false; defects: string[] };

function readGroupId(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }
  return null;
}

function readTurnNumber(value: unknown): number | null {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && /^\s*\d+\s*$/.test(value)
        ? Number(value)
        : Number.NaN;
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : null;
}

function isPlainObject(value: unknown): value is ExtraInputs {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readExtraInputs(value: unknown): ExtraInputs | null {
  if (value === undefined || value === null) return {};
  if (isPlainObject(value)) return { ...value };
  if (typeof value !== "string") return null;
  if (!value.trim()) return {};

  try {
    const parsed: unknown = JSON.parse(value);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function describeValue(value: unknown): string {
  return value === undefined ? "nothing" : JSON.stringify(value);
}

function parseRow(groupId: string, row: CaseRow): ParsedRow {
  const defects: string[] = [];
  const label = `row ${row.row_index}`;

  const turnNumber = readTurnNumber(row.turn_number);
  if (turnNumber === null) {
    defects.push(`${label}: turn_number must be a positive integer (got ${describeValue(row.turn_number)})`);
  }

  const userMessage =
    typeof row.user_message === "string" || typeof row.user_message === "number"
      ? String(row.user_message).trim()
      : "";
  if (!userMessage) {
    defects.push(`${label}: missing user_message`);
  }

  const extraInputs = readExtraInputs(row.extra_inputs);
  if (extraInputs === null) {
    defects.push(`${label}: extra_inputs must be a JSON object`);
  }

  if (turnNumber === null || extraInputs === null || defects.length > 0) {
    return { ok: false, defects };
  }

  const expected = row.expected_reply;
  return {
    ok: true,
    testCase: {
      group_id: groupId,
      turn_number: turnNumber,
      user_message: userMessage,
      expected_reply: expected === undefined || expected === null ? null : String(expected),
      extra_inputs: extraInputs,
      row_index: row.row_index,
    },
  };
}

/**
 * Turn numbers must run 1..N with no gaps and no duplicates.
 */
export function findContinuityDefects(turns: readonly number[]): string[] {
  const defects: string[] = [];
  const sorted = [...turns].sort((a, b) => a - b);
  let previous = 0;
  let reported: number | null = null;

  for (const turn of sorted) {
    if (turn === previous) {
      if (reported !== turn) {
        defects.push(`duplicate turn_number ${turn}`);
        reported = turn;
      }
      continue;
    }
    if (turn > previous + 1) {
      defects.push(describeGap(previous + 1, turn - 1));
    }
    previous = turn;
  }

  return defects;
}

function describeGap(first: number, last: number): string {
  return first === last ? `missing turn_number ${first}` : `missing turn_number ${first}..${last}`;
}

/**
 * Partition rows into conversation groups in first-seen order and validate
 * each one. A defect anywhere in a group excludes the whole group; other
 * groups are unaffected.
 */
export function groupCases(rows: readonly CaseRow[]): GroupingResult {
  const partitions = new Map<string, CaseRow[]>();
  const issues: ValidationIssue[] = [];

  for (const row of rows) {
    const groupId = readGroupId(row.group_id);
    if (groupId === null) {
      issues.push({ group_id: null, defects: [`row ${row.row_index}: missing group_id`] });
      continue;
    }
    const partition = partitions.get(groupId);
    if (partition) {
      partition.push(row);
    } else {
      partitions.set(groupId, [row]);
    }
  }

  const groups: ConversationGroup[] = [];

  for (const [groupId, partition] of partitions) {
    const cases: TestCase[] = [];
    let defects: string[] = [];

    for (const row of partition) {
      const parsed = parseRow(groupId, row);
      if (parsed.ok) {
        cases.push(parsed.testCase);
      } else {
        defects = defects.concat(parsed.defects);
      }
    }

    if (defects.length === 0) {
      cases.sort((a, b) => a.turn_number - b.turn_number);
      defects = findContinuityDefects(cases.map((c) => c.turn_number));
    }

    if (defects.length > 0) {
      issues.push({ group_id: groupId, defects });
      continue;
    }

    groups.push({ group_id: groupId, cases });
  }

  return { groups, issues };
}

export function countCases(groups: readonly ConversationGroup[]): number {
  return groups.reduce((sum, group) => sum + group.cases.length, 0);
}
