import { describe, expect, it } from "vitest";
import { buildSummaryLines } from "../src/core/report.ts";
import { makeTimeline } from "./fakes.ts";

describe("buildSummaryLines", () => {
  const timeline = makeTimeline(4);

  it("omits the disappearing commit when the string is still present at the end", () => {
    expect(buildSummaryLines("x", { firstMatchIndex: 1, lastMatchIndex: 3 }, timeline)).toEqual([
      'Search string "x" first appears in commit c1.',
      'Search string "x" last appears in commit c3.',
    ]);
  });

  it("names the commit after the last match", () => {
    expect(buildSummaryLines("x", { firstMatchIndex: 0, lastMatchIndex: 0 }, timeline)).toEqual([
      'Search string "x" first appears in commit c0.',
      'Search string "x" last appears in commit c0.',
      'Search string "x" disappeared in commit c1.',
    ]);
  });

  it("prints only the first appearance when no last match was found", () => {
    expect(buildSummaryLines("x", { firstMatchIndex: 2 }, timeline)).toEqual([
      'Search string "x" first appears in commit c2.',
    ]);
  });

  it("reports absence", () => {
    expect(buildSummaryLines("x", {}, timeline)).toEqual([
      'Search string "x" does not appear in any of the checked commits.',
    ]);
  });
});
