import type { CommitRange } from "./types.ts";

export interface HistoryEntry {
  hash: string;
  path: string;
}

/** A file materialized from history. `release` must be called once the content has been read. */
export interface ContentHandle {
  readonly path: string;
  release(): void;
}

export interface HistoryReader {
  /** Commits touching `path` within the inclusive range, newest first. */
  listCommits(range: CommitRange, path: string, followRenames: boolean): HistoryEntry[];
  /** Throws `RevisionNotFoundError` or `GitInvocationError`. */
  materialize(hash: string, path: string): ContentHandle;
  timestamp(hash: string): string;

  resolveRef?(ref: string): string | undefined;
  isAncestor?(ancestor: string, descendant: string): boolean;
  fileExists?(ref: string, path: string): boolean;
}
