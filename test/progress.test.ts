import { describe, expect, it } from "vitest";
import {
  FIRST_MATCH_SPAN,
  LAST_MATCH_SPAN,
  ProgressChannel,
  expectedProbeCount,
  interpolate,
  phaseProgress,
} from "../src/core/progress.ts";

describe("ProgressChannel", () => {
  it("drops values that would move backwards", () => {
    const seen: number[] = [];
    const channel = new ProgressChannel((value) => seen.push(value));

    channel.report(0.25);
    channel.report(0.1);
    channel.report(0.25);
    channel.report(0.4);

    expect(seen).toEqual([0.25, 0.4]);
    expect(channel.value).toBe(0.4);
  });

  it("emits 1.0 exactly once", () => {
    const seen: number[] = [];
    const channel = new ProgressChannel((value) => seen.push(value));

    channel.report(1);
    channel.complete();
    channel.report(1.5);
    channel.complete();

    expect(seen).toEqual([1]);
    expect(channel.isComplete).toBe(true);
  });

  it("clamps values outside [0, 1]", () => {
    const seen: number[] = [];
    const channel = new ProgressChannel((value) => seen.push(value));

    channel.report(-0.5);
    channel.report(3);

    expect(seen).toEqual([1]);
  });

  it("works without a sink", () => {
    const channel = new ProgressChannel();
    channel.report(0.3);
    channel.complete();
    expect(channel.value).toBe(1);
  });
});

describe("phase helpers", () => {
  it("expects ceil(log2(n)) probes with a floor of one", () => {
    expect(expectedProbeCount(0)).toBe(1);
    expect(expectedProbeCount(1)).toBe(1);
    expect(expectedProbeCount(2)).toBe(1);
    expect(expectedProbeCount(5)).toBe(3);
    expect(expectedProbeCount(1024)).toBe(10);
  });

  it("fills each phase span linearly and stops at its end", () => {
    expect(phaseProgress(LAST_MATCH_SPAN, 0, 4)).toBe(0.25);
    expect(phaseProgress(LAST_MATCH_SPAN, 2, 4)).toBeCloseTo(0.4375);
    expect(phaseProgress(LAST_MATCH_SPAN, 9, 4)).toBe(0.625);
    expect(phaseProgress(FIRST_MATCH_SPAN, 1, 2)).toBeCloseTo(0.8125);
    expect(phaseProgress(FIRST_MATCH_SPAN, 2, 2)).toBe(1);
  });

  it("interpolates between two values", () => {
    expect(interpolate(0.25, 0.375, 1, 2)).toBeCloseTo(0.3125);
    expect(interpolate(0.25, 0.375, 5, 2)).toBe(0.375);
    expect(interpolate(0.25, 0.375, 0, 0)).toBe(0.375);
  });
});
