/**
 * packages/core/src/trace/matchTrace.ts — Bounded ring of match trace records.
 *
 * Usage:
 *   const trace = createMatchTrace({ capacity: 64, minSeverity: "info" });
 *   const off = trace.on("record", (r) => process.stderr.write(formatTraceRecord(r)));
 *   const matcher = createChordMatcher(table, { trace });
 */

import type {
  TraceConfig,
  TraceInput,
  TraceRecord,
  TraceRecordHandler,
  TraceSeverity,
  TraceStats,
} from "./types.js";

export const DEFAULT_TRACE_CAPACITY = 256;

const SEVERITY_RANK: Readonly<Record<TraceSeverity, number>> = Object.freeze({
  trace: 0,
  info: 1,
  error: 2,
});

export type MatchTrace = Readonly<{
  /** Append a record. Returns it, or null when filtered by severity. */
  record: (input: TraceInput) => TraceRecord | null;
  /** Oldest-first; with `limit`, only the newest `limit` records. */
  records: (limit?: number) => readonly TraceRecord[];
  /**
   * Subscribe to accepted records.
   * @returns Unsubscribe function
   */
  on: (event: "record", handler: TraceRecordHandler) => () => void;
  clear: () => void;
  stats: () => TraceStats;
}>;

function normalizeBound(value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value)) return fallback;
  if (!Number.isInteger(value)) return fallback;
  if (value <= 0) return fallback;
  return value;
}

export function severityOf(input: TraceInput): TraceSeverity {
  switch (input.kind) {
    case "action-error":
      return "error";
    case "cancel":
    case "expired":
      return "info";
    case "feed":
      return input.outcome === "pending" ? "trace" : "info";
  }
}

export function createMatchTrace(config?: TraceConfig): MatchTrace {
  const capacity = normalizeBound(config?.capacity, DEFAULT_TRACE_CAPACITY);
  const minRank = SEVERITY_RANK[config?.minSeverity ?? "trace"];
  const ring: TraceRecord[] = [];
  const handlers = new Set<TraceRecordHandler>();
  let seq = 0;
  let totalRecords = 0;
  let totalDropped = 0;
  let listenerErrors = 0;

  function deliver(record: TraceRecord): void {
    for (const handler of [...handlers]) {
      try {
        handler(record);
      } catch {
        // Counted in stats().listenerErrors
        listenerErrors++;
      }
    }
  }

  return Object.freeze({
    record: (input: TraceInput) => {
      const severity = severityOf(input);
      if (SEVERITY_RANK[severity] < minRank) return null;

      seq++;
      totalRecords++;
      const record: TraceRecord = Object.freeze({ ...input, seq, severity });
      ring.push(record);
      if (ring.length > capacity) {
        ring.shift();
        totalDropped++;
      }
      deliver(record);
      return record;
    },
    records: (limit?: number) => {
      if (limit === undefined || limit >= ring.length) return Object.freeze([...ring]);
      if (limit <= 0) return Object.freeze([]);
      return Object.freeze(ring.slice(ring.length - limit));
    },
    on: (_event: "record", handler: TraceRecordHandler) => {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    clear: () => {
      ring.length = 0;
      totalRecords = 0;
      totalDropped = 0;
      listenerErrors = 0;
    },
    stats: () =>
      Object.freeze({
        totalRecords,
        totalDropped,
        listenerErrors,
        currentUsage: ring.length,
        capacity,
      }),
  });
}

/**
 * One-line rendering of a record, newline-terminated, e.g.
 * `#3 feed shift+t pending="s a" -> matched "s a shift+t"`.
 */
export function formatTraceRecord(record: TraceRecord): string {
  const parts = [`#${String(record.seq)}`, record.kind];
  if (record.key !== undefined) parts.push(record.key);
  parts.push(`pending=${JSON.stringify(record.pending)}`);
  if (record.outcome !== undefined) {
    parts.push(`-> ${record.outcome}`);
  }
  if (record.chord !== undefined) parts.push(JSON.stringify(record.chord));
  if (record.error !== undefined) {
    const message = record.error instanceof Error ? record.error.message : String(record.error);
    parts.push(`error=${JSON.stringify(message)}`);
  }
  return `${parts.join(" ")}\n`;
}
