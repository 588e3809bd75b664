/**
 * packages/core/src/trace/types.ts — Match trace type definitions.
 *
 * Why: The library never writes to a console. Everything a host may want to
 * log is emitted as a structured record; the host decides how to render it.
 */

import type { OutcomeKind } from "../chords/types.js";

/**
 * Trace severity levels (low to high):
 *   - trace: every pending step
 *   - info: terminal outcomes, cancels, expiries
 *   - error: an action threw
 */
export type TraceSeverity = "trace" | "info" | "error";

/**
 * What happened:
 *   - feed: a key was fed; `outcome` says how it ended
 *   - cancel: cancel() discarded a pending sequence
 *   - expired: the idle timeout discarded a pending sequence
 *   - action-error: the matched action threw
 */
export type TraceKind = "feed" | "cancel" | "expired" | "action-error";

export type TraceRecord = Readonly<{
  /** Monotonic record counter, starting at 1. */
  seq: number;
  timeMs: number;
  kind: TraceKind;
  severity: TraceSeverity;
  /** Canonical text of the fed key ("shift+t"). */
  key?: string;
  outcome?: OutcomeKind;
  /** Pending keys before this event, canonical text; "" when idle. */
  pending: string;
  /** Chord of the matched binding. */
  chord?: string;
  error?: unknown;
}>;

/** Record as handed to MatchTrace.record(); seq and severity are assigned. */
export type TraceInput = Omit<TraceRecord, "seq" | "severity">;

export type TraceConfig = Readonly<{
  /** Max records kept (default 256). Older records are dropped first. */
  capacity?: number;
  /** Records below this severity are not kept or delivered. Default "trace". */
  minSeverity?: TraceSeverity;
}>;

export type TraceStats = Readonly<{
  /** Records accepted since creation or the last clear(). */
  totalRecords: number;
  /** Records evicted by ring overflow. */
  totalDropped: number;
  /** Listener invocations that threw. */
  listenerErrors: number;
  currentUsage: number;
  capacity: number;
}>;

export type TraceRecordHandler = (record: TraceRecord) => void;
