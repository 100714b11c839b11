import type { CommitTimeline, SearchOutcome } from "./types.ts";

export function buildSummaryLines(
  query: string,
  outcome: SearchOutcome,
  timeline: CommitTimeline,
): string[] {
  const subject = `Search string "${query}"`;
  const first = outcome.firstMatchIndex !== undefined ? timeline[outcome.firstMatchIndex] : undefined;
  if (!first) {
    return [`${subject} does not appear in any of the checked commits.`];
  }

  const lines = [`${subject} first appears in commit ${first.hash}.`];

  const lastIndex = outcome.lastMatchIndex;
  const last = lastIndex !== undefined ? timeline[lastIndex] : undefined;
  if (lastIndex === undefined || !last) {
    return lines;
  }

  lines.push(`${subject} last appears in commit ${last.hash}.`);

  const next = timeline[lastIndex + 1];
  if (next) {
    lines.push(`${subject} disappeared in commit ${next.hash}.`);
  }

  return lines;
}
