const TRACE_PREFIX = "trace";
const RUN_SCOPE_LEN = 16;

function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, 48);
}

function scopeRunId(runId: string): string {
  const scoped = slugify(runId);
  if (!scoped) {
    return "run";
  }
  const tail = scoped.slice(-RUN_SCOPE_LEN).replace(/^_+/, "");
  return tail || "run";
}

/**
 * Filesystem-safe run ID from a timestamp, e.g. 2026-02-07T02-11-12Z
 */
export function createRunId(at: Date = new Date()): string {
  return at.toISOString().replace(/[:.]/g, "-").slice(0, 19) + "Z";
}

/**
 * Build a deterministic per-group trace ID.
 */
export function createTraceId(groupId: string, index: number, runId: string): string {
  const safeGroup = slugify(groupId) || "group";
  const safeIndex = String(index).padStart(3, "0");
  const runScope = scopeRunId(runId);
  return `${TRACE_PREFIX}_${safeGroup}_${safeIndex}_${runScope}`;
}
