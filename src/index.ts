export { runSearch } from "./commands/search.ts";
export { runLocate } from "./commands/locate.ts";

export { searchContent } from "./core/content-search.ts";
export { bisectTimeline, findFirstMatchIndex, findLastMatchIndex } from "./core/bisect.ts";
export { buildCommitTimeline, toTimeline } from "./core/timeline.ts";
export { probeCommit } from "./core/probe.ts";
export { ProgressChannel } from "./core/progress.ts";
export { buildSummaryLines } from "./core/report.ts";
export { createAuditLog, createMemoryAuditLog } from "./core/audit-log.ts";
export { GitHistoryReader } from "./core/git.ts";
export {
  selectContentMatcher,
  spreadsheetContentMatcher,
  textContentMatcher,
} from "./core/matchers.ts";
export {
  ConfigurationError,
  EmptyRangeError,
  GitInvocationError,
  ProbeRetrievalError,
  RevisionNotFoundError,
  SearchCancelledError,
} from "./core/errors.ts";

export type { BisectOptions, ProbeFn } from "./core/bisect.ts";
export type { AuditLog } from "./core/audit-log.ts";
export type { ContentHandle, HistoryEntry, HistoryReader } from "./core/history.ts";
export type { ContentMatcher } from "./core/matchers.ts";
export type { ProgressSink } from "./core/progress.ts";
export type {
  Commit,
  CommitRange,
  CommitTimeline,
  ProbeEvent,
  ProbeOutcome,
  SearchOutcome,
  SearchReport,
  SearchRequest,
} from "./core/types.ts";
