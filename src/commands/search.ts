import path from "node:path";
import {
  createAuditLog,
  writeSessionFooter,
  writeSessionHeader,
} from "../core/audit-log.ts";
import { loadGcbConfig } from "../core/config.ts";
import { searchContent } from "../core/content-search.ts";
import { GitHistoryReader, getRepoRoot } from "../core/git.ts";
import { selectContentMatcher } from "../core/matchers.ts";
import { ensureWorkspaceDirectories, resolveWorkspacePaths } from "../core/paths.ts";
import type { PluginRegistry } from "../core/plugin-registry.ts";
import type { ProgressSink } from "../core/progress.ts";
import type { CommitRange, SearchReport } from "../core/types.ts";

export interface SearchOptions {
  earliestCommit?: string;
  latestCommit?: string;
  workingDirectory?: string;
  logDirectory?: string;
  follow?: boolean;
  linearFallback?: boolean;
  progress?: boolean;
}

export interface RunSearchContext {
  registry?: PluginRegistry | undefined;
  signal?: AbortSignal;
}

function progressPrinter(): ProgressSink {
  return (fraction) => {
    process.stderr.write(`\rProgress: ${(fraction * 100).toFixed(1).padStart(5)}%`);
    if (fraction >= 1) {
      process.stderr.write("\n");
    }
  };
}

function commitRange(options: SearchOptions): CommitRange {
  const range: CommitRange = {};
  if (options.earliestCommit) {
    range.earliest = options.earliestCommit;
  }
  if (options.latestCommit) {
    range.latest = options.latestCommit;
  }
  return range;
}

export async function runSearch(
  filePath: string,
  query: string,
  options: SearchOptions = {},
  context: RunSearchContext = {},
): Promise<SearchReport> {
  const { registry } = context;
  const cwd = path.resolve(options.workingDirectory || process.cwd());
  const config = loadGcbConfig(getRepoRoot(cwd));
  const paths = resolveWorkspacePaths(cwd, options.logDirectory ?? config.logDirectory);
  ensureWorkspaceDirectories(paths);

  const log = createAuditLog({ filePath: paths.auditLogPath });
  writeSessionHeader(log, {
    workingDirectory: paths.workingDirectory,
    logDirectory: paths.logDirectory,
  });

  const reader = new GitHistoryReader({ cwd: paths.workingDirectory, tempDirectory: paths.tempDirectory });
  const matcher = registry ? registry.matcherFor(filePath) : selectContentMatcher(filePath);

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  const onOuterAbort = () => controller.abort();
  context.signal?.addEventListener("abort", onOuterAbort, { once: true });

  try {
    const report = await searchContent(
      {
        filePath,
        query,
        range: commitRange(options),
        follow: options.follow ?? config.follow ?? false,
        linearFallback: options.linearFallback ?? config.linearFallback ?? true,
      },
      {
        reader,
        matcher,
        log,
        signal: controller.signal,
        ...(options.progress ? { onProgress: progressPrinter() } : {}),
      },
    );

    if (report.status === "inverted-range") {
      process.exitCode = 1;
    }

    return report;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    context.signal?.removeEventListener("abort", onOuterAbort);
    writeSessionFooter(log);
  }
}
