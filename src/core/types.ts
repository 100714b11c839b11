import type { ProbeRetrievalError } from "./errors.ts";

export interface Commit {
  readonly hash: string;
  /** Path of the file at this commit; differs from the requested path after a rename in follow mode. */
  readonly path: string;
}

/** Oldest commit first. Built once per search and only indexed afterwards. */
export type CommitTimeline = readonly Commit[];

export interface CommitRange {
  earliest?: string;
  latest?: string;
}

export interface ProbeOutcome {
  found: boolean;
  error?: ProbeRetrievalError;
}

export interface SearchOutcome {
  firstMatchIndex?: number;
  lastMatchIndex?: number;
}

export type SearchPhase = "last-match" | "linear-fallback" | "first-match";

export interface ProbeEvent {
  /** 1-based count of probes performed in this search. */
  sequence: number;
  phase: SearchPhase;
  index: number;
  commit: Commit;
  outcome: ProbeOutcome;
}

export type SearchStatus = "completed" | "no-commits" | "inverted-range" | "cancelled";

export interface SearchReport {
  status: SearchStatus;
  query: string;
  timeline: CommitTimeline;
  outcome?: SearchOutcome;
  summary: string[];
  probes: number;
}

export interface SearchRequest {
  filePath: string;
  query: string;
  range?: CommitRange;
  follow?: boolean;
  linearFallback?: boolean;
}
