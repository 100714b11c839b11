import {
  PROGRESS_COMPLETE,
  PROGRESS_LAST_MATCH_DONE,
  PROGRESS_TIMELINE_RESOLVED,
} from "./constants.ts";

export type ProgressSink = (fraction: number) => void;

export interface PhaseSpan {
  start: number;
  end: number;
}

export const LAST_MATCH_SPAN: PhaseSpan = {
  start: PROGRESS_TIMELINE_RESOLVED,
  end: PROGRESS_LAST_MATCH_DONE,
};

export const FIRST_MATCH_SPAN: PhaseSpan = {
  start: PROGRESS_LAST_MATCH_DONE,
  end: PROGRESS_COMPLETE,
};

/**
 * Per-search progress state. Values that would move backwards are dropped and the
 * sink sees 1.0 exactly once, whichever exit path the search takes.
 */
export class ProgressChannel {
  private current = 0;
  private completed = false;

  constructor(private readonly sink?: ProgressSink) {}

  get value(): number {
    return this.current;
  }

  get isComplete(): boolean {
    return this.completed;
  }

  report(fraction: number): void {
    if (this.completed) {
      return;
    }

    const clamped = Math.min(PROGRESS_COMPLETE, Math.max(0, fraction));
    if (clamped <= this.current) {
      return;
    }

    this.current = clamped;
    if (clamped >= PROGRESS_COMPLETE) {
      this.completed = true;
    }
    this.sink?.(clamped);
  }

  complete(): void {
    this.report(PROGRESS_COMPLETE);
  }
}

/** Binary search over `windowSize` items is expected to take about ceil(log2(n)) probes. */
export function expectedProbeCount(windowSize: number): number {
  return Math.max(1, Math.ceil(Math.log2(Math.max(1, windowSize))));
}

export function phaseProgress(span: PhaseSpan, done: number, expected: number): number {
  const ratio = Math.min(1, done / Math.max(1, expected));
  return span.start + ratio * (span.end - span.start);
}

export function interpolate(from: number, to: number, done: number, total: number): number {
  if (total <= 0) {
    return to;
  }
  return from + (Math.min(done, total) / total) * (to - from);
}
