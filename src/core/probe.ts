import { ProbeRetrievalError } from "./errors.ts";
import type { ContentHandle, HistoryReader } from "./history.ts";
import type { ContentMatcher } from "./matchers.ts";
import type { Commit, ProbeOutcome } from "./types.ts";

export interface ProbeDependencies {
  reader: HistoryReader;
  matcher: ContentMatcher;
  query: string;
}

/**
 * Materializes the file at `commit`, tests it for the query and releases the copy.
 * Failures are returned as a negative outcome carrying the error; this never throws.
 */
export async function probeCommit(commit: Commit, deps: ProbeDependencies): Promise<ProbeOutcome> {
  let handle: ContentHandle | undefined;
  try {
    handle = deps.reader.materialize(commit.hash, commit.path);
    const found = await deps.matcher.contains(handle, deps.query);
    return { found };
  } catch (error) {
    return { found: false, error: new ProbeRetrievalError(commit.hash, error) };
  } finally {
    handle?.release();
  }
}

export function createProbe(deps: ProbeDependencies): (commit: Commit) => Promise<ProbeOutcome> {
  return (commit) => probeCommit(commit, deps);
}
