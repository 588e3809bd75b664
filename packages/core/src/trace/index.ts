export type {
  TraceConfig,
  TraceInput,
  TraceKind,
  TraceRecord,
  TraceRecordHandler,
  TraceSeverity,
  TraceStats,
} from "./types.js";

export {
  DEFAULT_TRACE_CAPACITY,
  type MatchTrace,
  createMatchTrace,
  formatTraceRecord,
  severityOf,
} from "./matchTrace.js";
