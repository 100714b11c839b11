import { type AuditLog, createProbeLogger } from "./audit-log.ts";
import { type BisectOptions, bisectTimeline } from "./bisect.ts";
import { PROGRESS_STARTED, PROGRESS_TIMELINE_RESOLVED } from "./constants.ts";
import { SearchCancelledError } from "./errors.ts";
import type { HistoryReader } from "./history.ts";
import type { ContentMatcher } from "./matchers.ts";
import { createProbe } from "./probe.ts";
import { ProgressChannel, type ProgressSink } from "./progress.ts";
import { buildSummaryLines } from "./report.ts";
import { buildCommitTimeline } from "./timeline.ts";
import type {
  CommitTimeline,
  ProbeEvent,
  SearchReport,
  SearchRequest,
  SearchStatus,
} from "./types.ts";

export interface ContentSearchDependencies {
  reader: HistoryReader;
  matcher: ContentMatcher;
  log: AuditLog;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
}

function warnIfMissingAtHead(reader: HistoryReader, filePath: string, log: AuditLog): void {
  if (!reader.fileExists || reader.fileExists("HEAD", filePath)) {
    return;
  }

  log.write(`Warning: The file '${filePath}' does not exist in the current commit.`);
  log.write("The search will not include commits where the file path was not found.");
  log.write("Please enter a file path that exists in the latest commit for accurate results.");
  log.write("");
}

function earlyExit(
  status: SearchStatus,
  request: SearchRequest,
  timeline: CommitTimeline,
  summary: string[],
): SearchReport {
  return { status, query: request.query, timeline, summary, probes: 0 };
}

/**
 * Finds the commits where `request.query` first and last appears in `request.filePath`.
 * Early exits (no commits, inverted range, cancellation) are returned as a report
 * status; progress always ends at 1.0.
 */
export async function searchContent(
  request: SearchRequest,
  deps: ContentSearchDependencies,
): Promise<SearchReport> {
  const { reader, matcher, log } = deps;
  const progress = new ProgressChannel(deps.onProgress);
  progress.report(PROGRESS_STARTED);

  let probes = 0;
  const logProbe = createProbeLogger(log, reader);

  try {
    warnIfMissingAtHead(reader, request.filePath, log);

    const resolved = buildCommitTimeline(reader, {
      filePath: request.filePath,
      ...(request.range ? { range: request.range } : {}),
      follow: request.follow ?? false,
    });

    if (resolved.kind === "no-commits") {
      log.write(resolved.error.message);
      return earlyExit("no-commits", request, [], [resolved.error.message]);
    }

    if (resolved.kind === "inverted-range") {
      const message = `Error: ${resolved.error.message}`;
      log.write(message);
      return earlyExit("inverted-range", request, [], [message]);
    }

    const { timeline } = resolved;
    progress.report(PROGRESS_TIMELINE_RESOLVED);

    const bisectOptions: BisectOptions = {
      probe: createProbe({ reader, matcher, query: request.query }),
      progress,
      onProbe: (event: ProbeEvent) => {
        probes = event.sequence;
        logProbe(event);
      },
      linearFallback: request.linearFallback ?? true,
      ...(deps.signal ? { signal: deps.signal } : {}),
    };

    try {
      const { outcome } = await bisectTimeline(timeline, bisectOptions);
      const summary = buildSummaryLines(request.query, outcome, timeline);
      for (const line of summary) {
        log.write(line);
      }

      return { status: "completed", query: request.query, timeline, outcome, summary, probes };
    } catch (error) {
      if (!(error instanceof SearchCancelledError)) {
        throw error;
      }

      const message = `${error.message} ${probes} commit(s) were checked before it stopped.`;
      log.write(message);
      return { status: "cancelled", query: request.query, timeline, summary: [message], probes };
    }
  } finally {
    progress.complete();
  }
}
