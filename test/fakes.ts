import { RevisionNotFoundError } from "../src/core/errors.ts";
import type { ContentHandle, HistoryEntry, HistoryReader } from "../src/core/history.ts";
import type { ContentMatcher } from "../src/core/matchers.ts";
import type { Commit, CommitRange, CommitTimeline } from "../src/core/types.ts";

/** Commits c0..c{n-1}, oldest first. */
export function makeTimeline(count: number, filePath = "data.txt"): CommitTimeline {
  return Array.from({ length: count }, (_, i) => ({ hash: `c${i}`, path: filePath }));
}

export function presenceProbe(present: ReadonlySet<string>) {
  const probed: string[] = [];
  const probe = async (commit: Commit) => {
    probed.push(commit.hash);
    return { found: present.has(commit.hash) };
  };
  return { probe, probed };
}

export interface FakeReaderOptions {
  failing?: string[];
  timestamps?: Record<string, string>;
  ancestry?: Array<[string, string]>;
  existsAtHead?: boolean;
}

/** In-memory history. Handles point at the commit hash instead of a real file. */
export class FakeHistoryReader implements HistoryReader {
  readonly materialized: string[] = [];
  readonly released: string[] = [];
  readonly listCalls: Array<{ range: CommitRange; path: string; follow: boolean }> = [];
  private readonly failing: Set<string>;

  constructor(
    private readonly newestFirst: HistoryEntry[],
    private readonly options: FakeReaderOptions = {},
  ) {
    this.failing = new Set(options.failing ?? []);
  }

  static linear(count: number, filePath = "data.txt", options: FakeReaderOptions = {}): FakeHistoryReader {
    const entries = makeTimeline(count, filePath).map((commit) => ({ ...commit }));
    return new FakeHistoryReader(entries.reverse(), options);
  }

  listCommits(range: CommitRange, path: string, followRenames: boolean): HistoryEntry[] {
    this.listCalls.push({ range, path, follow: followRenames });
    return this.newestFirst;
  }

  materialize(hash: string, path: string): ContentHandle {
    this.materialized.push(hash);
    if (this.failing.has(hash)) {
      throw new RevisionNotFoundError(hash, path);
    }
    return {
      path: hash,
      release: () => {
        this.released.push(hash);
      },
    };
  }

  timestamp(hash: string): string {
    const value = this.options.timestamps?.[hash];
    if (value === undefined) {
      throw new Error(`no timestamp for ${hash}`);
    }
    return value;
  }

  isAncestor(ancestor: string, descendant: string): boolean {
    return (this.options.ancestry ?? []).some(([a, d]) => a === ancestor && d === descendant);
  }

  fileExists(): boolean {
    return this.options.existsAtHead ?? true;
  }
}

/** Matches when the handle (a commit hash from FakeHistoryReader) is in `present`. */
export function presenceMatcher(present: ReadonlySet<string>): ContentMatcher {
  return {
    name: "presence",
    extensions: [],
    contains: (handle) => present.has(handle.path),
  };
}
