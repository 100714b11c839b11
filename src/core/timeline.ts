import { ConfigurationError, EmptyRangeError } from "./errors.ts";
import type { HistoryEntry, HistoryReader } from "./history.ts";
import type { Commit, CommitRange, CommitTimeline } from "./types.ts";

export interface TimelineRequest {
  filePath: string;
  range?: CommitRange;
  follow?: boolean;
}

export type TimelineResult =
  | { kind: "ok"; timeline: CommitTimeline }
  | { kind: "no-commits"; error: EmptyRangeError }
  | { kind: "inverted-range"; error: ConfigurationError };

/** Reverses newest-first history into oldest-first order and drops repeated hashes. */
export function toTimeline(entries: readonly HistoryEntry[], fallbackPath: string): CommitTimeline {
  const seen = new Set<string>();
  const commits: Commit[] = [];

  for (let i = entries.length - 1; i >= 0; i -= 1) {
    const entry = entries[i];
    if (!entry || seen.has(entry.hash)) {
      continue;
    }

    seen.add(entry.hash);
    commits.push(Object.freeze({ hash: entry.hash, path: entry.path || fallbackPath }));
  }

  return Object.freeze(commits);
}

export function findCommitIndex(timeline: CommitTimeline, ref: string): number {
  const exact = timeline.findIndex((commit) => commit.hash === ref);
  if (exact !== -1) {
    return exact;
  }

  if (ref.length < 4) {
    return -1;
  }

  return timeline.findIndex((commit) => commit.hash.startsWith(ref));
}

function resolveRef(reader: HistoryReader, ref: string): string {
  return reader.resolveRef?.(ref) ?? ref;
}

function invertedRange(): ConfigurationError {
  return new ConfigurationError("The earliest commit is more recent than the latest commit.");
}

function isInverted(reader: HistoryReader, timeline: CommitTimeline, range: CommitRange): boolean {
  if (!range.earliest || !range.latest) {
    return false;
  }

  const earliest = resolveRef(reader, range.earliest);
  const latest = resolveRef(reader, range.latest);

  const earliestIndex = findCommitIndex(timeline, earliest);
  const latestIndex = findCommitIndex(timeline, latest);
  if (earliestIndex !== -1 && latestIndex !== -1) {
    return earliestIndex > latestIndex;
  }

  if (earliest === latest || !reader.isAncestor) {
    return false;
  }

  return reader.isAncestor(latest, earliest) && !reader.isAncestor(earliest, latest);
}

export function buildCommitTimeline(reader: HistoryReader, request: TimelineRequest): TimelineResult {
  const range = request.range ?? {};
  const entries = reader.listCommits(range, request.filePath, request.follow ?? false);
  const timeline = toTimeline(entries, request.filePath);

  if (isInverted(reader, timeline, range)) {
    return { kind: "inverted-range", error: invertedRange() };
  }

  if (timeline.length === 0) {
    return { kind: "no-commits", error: new EmptyRangeError() };
  }

  return { kind: "ok", timeline };
}
