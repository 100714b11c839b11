import { SearchCancelledError } from "./errors.ts";
import {
  FIRST_MATCH_SPAN,
  LAST_MATCH_SPAN,
  type ProgressChannel,
  expectedProbeCount,
  interpolate,
  phaseProgress,
} from "./progress.ts";
import type {
  Commit,
  CommitTimeline,
  ProbeEvent,
  ProbeOutcome,
  SearchOutcome,
  SearchPhase,
} from "./types.ts";

export type ProbeFn = (commit: Commit) => Promise<ProbeOutcome>;

export interface BisectOptions {
  probe: ProbeFn;
  progress: ProgressChannel;
  onProbe?: (event: ProbeEvent) => void;
  /** Defaults to true. */
  linearFallback?: boolean;
  signal?: AbortSignal;
}

/** Counts probes across the phases of one search and emits a ProbeEvent for each. */
class ProbeRunner {
  private sequence = 0;

  constructor(
    private readonly timeline: CommitTimeline,
    private readonly options: BisectOptions,
  ) {}

  get count(): number {
    return this.sequence;
  }

  async run(index: number, phase: SearchPhase): Promise<boolean> {
    if (this.options.signal?.aborted) {
      throw new SearchCancelledError();
    }

    const commit = this.timeline[index];
    if (!commit) {
      throw new RangeError(`Probe index ${index} is outside the timeline (0..${this.timeline.length - 1}).`);
    }

    const outcome = await this.options.probe(commit);
    this.sequence += 1;
    this.options.onProbe?.({
      sequence: this.sequence,
      phase,
      index,
      commit,
      outcome,
    });
    return outcome.found;
  }
}

/**
 * Scans `from..to` newest first and returns the first index whose probe is positive.
 * Progress fills `progressFrom..progressTo` as the scan advances.
 */
async function linearScanDescending(
  runner: ProbeRunner,
  from: number,
  to: number,
  progress: ProgressChannel,
  progressFrom: number,
  progressTo: number,
): Promise<number | undefined> {
  const total = to - from + 1;
  let done = 0;

  for (let index = to; index >= from; index -= 1) {
    const found = await runner.run(index, "linear-fallback");
    done += 1;
    progress.report(interpolate(progressFrom, progressTo, done, total));
    if (found) {
      return index;
    }
  }

  return undefined;
}

async function lastMatch(
  runner: ProbeRunner,
  timeline: CommitTimeline,
  searchStartIndex: number,
  options: BisectOptions,
): Promise<number | undefined> {
  const { progress } = options;
  const fallback = options.linearFallback ?? true;

  let left = Math.max(0, searchStartIndex);
  let right = timeline.length - 1;
  let lastMatchIndex: number | undefined;

  const expected = expectedProbeCount(right - left + 1);
  let done = 0;

  while (left <= right) {
    const mid = left + Math.floor((right - left) / 2);
    const found = await runner.run(mid, "last-match");
    const before = phaseProgress(LAST_MATCH_SPAN, done, expected);
    done += 1;
    const after = phaseProgress(LAST_MATCH_SPAN, done, expected);

    if (found) {
      lastMatchIndex = mid;
      left = mid + 1;
      progress.report(after);
      continue;
    }

    if (fallback && mid + 1 <= right) {
      const recovered = await linearScanDescending(runner, mid + 1, right, progress, before, after);
      if (recovered !== undefined) {
        progress.report(LAST_MATCH_SPAN.end);
        return recovered;
      }
    }

    right = mid - 1;
    progress.report(after);
  }

  return lastMatchIndex;
}

async function firstMatch(
  runner: ProbeRunner,
  upperBound: number,
  options: BisectOptions,
): Promise<number | undefined> {
  const { progress } = options;

  let left = 0;
  let right = upperBound;
  let firstMatchIndex: number | undefined;

  const expected = expectedProbeCount(right - left + 1);
  let done = 0;

  while (left <= right) {
    const mid = left + Math.floor((right - left) / 2);
    const found = await runner.run(mid, "first-match");
    done += 1;
    progress.report(phaseProgress(FIRST_MATCH_SPAN, done, expected));

    if (found) {
      firstMatchIndex = mid;
      right = mid - 1;
    } else {
      left = mid + 1;
    }
  }

  return firstMatchIndex;
}

/**
 * Latest index whose probe is positive, assuming positives form one contiguous run.
 * A negative probe triggers a descending scan of the unexplored right side unless
 * `linearFallback` is false; a hit there ends the search.
 */
export async function findLastMatchIndex(
  timeline: CommitTimeline,
  searchStartIndex: number,
  options: BisectOptions,
): Promise<number | undefined> {
  return lastMatch(new ProbeRunner(timeline, options), timeline, searchStartIndex, options);
}

/** Earliest positive index in `[0, upperBound]`. Plain binary search, no fallback. */
export async function findFirstMatchIndex(
  timeline: CommitTimeline,
  upperBound: number,
  options: BisectOptions,
): Promise<number | undefined> {
  const bound = Math.min(upperBound, timeline.length - 1);
  return firstMatch(new ProbeRunner(timeline, options), bound, options);
}

export interface BisectResult {
  outcome: SearchOutcome;
  probes: number;
}

/**
 * Runs the last-match phase, then the first-match phase bounded above by its result
 * (or by the end of the timeline when nothing was found).
 *
 * Only correct when the string's presence is a single contiguous run of commits; with
 * disjoint runs the fallback covers the case where a probe lands just outside a run
 * boundary and nothing more.
 */
export async function bisectTimeline(
  timeline: CommitTimeline,
  options: BisectOptions,
): Promise<BisectResult> {
  const runner = new ProbeRunner(timeline, options);

  const lastMatchIndex = await lastMatch(runner, timeline, 0, options);
  options.progress.report(LAST_MATCH_SPAN.end);

  const upperBound = lastMatchIndex ?? timeline.length - 1;
  const firstMatchIndex = await firstMatch(runner, upperBound, options);

  const outcome: SearchOutcome = {};
  if (firstMatchIndex !== undefined) {
    outcome.firstMatchIndex = firstMatchIndex;
  }
  if (lastMatchIndex !== undefined) {
    outcome.lastMatchIndex = lastMatchIndex;
  }

  return { outcome, probes: runner.count };
}
