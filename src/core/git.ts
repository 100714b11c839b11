import { spawnSync } from "node:child_process";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { GitInvocationError, RevisionNotFoundError } from "./errors.ts";
import type { ContentHandle, HistoryEntry, HistoryReader } from "./history.ts";
import type { CommitRange } from "./types.ts";

const RECORD_SEPARATOR = "\x1e";
const MISSING_PATH_PATTERN = /does not exist in|exists on disk, but not in|invalid object name/i;

interface GitResult {
  status: number | null;
  stdout: Buffer;
  stderr: string;
}

function spawnGit(args: string[], cwd: string): GitResult {
  const out = spawnSync("git", args, {
    cwd,
    maxBuffer: 1024 * 1024 * 512,
  });

  if (out.error) {
    throw new GitInvocationError(args, null, out.error.message);
  }

  return {
    status: out.status,
    stdout: out.stdout,
    stderr: out.stderr.toString("utf8"),
  };
}

function runGit(args: string[], cwd: string): string {
  const result = spawnGit(args, cwd);
  if (result.status !== 0) {
    throw new GitInvocationError(args, result.status, result.stderr);
  }
  return result.stdout.toString("utf8");
}

function gitSucceeds(args: string[], cwd: string): boolean {
  try {
    return spawnGit(args, cwd).status === 0;
  } catch {
    return false;
  }
}

function normaliseGitPath(file: string): string {
  return file.replace(/\\/g, "/");
}

/**
 * Parses `git log --format=%x1e%H --name-only` output into newest-first entries.
 * Records without a file line (merge commits) take the path of the nearest older
 * entry, or `requestedPath` when there is none.
 */
export function parseFileLogOutput(raw: string, requestedPath: string): HistoryEntry[] {
  const records: Array<{ hash: string; path?: string }> = [];

  for (const chunk of raw.split(RECORD_SEPARATOR)) {
    const lines = chunk
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);

    const [hash, file] = lines;
    if (!hash) {
      continue;
    }

    records.push(file ? { hash, path: normaliseGitPath(file) } : { hash });
  }

  const oldestFirst: HistoryEntry[] = [];
  let carried = normaliseGitPath(requestedPath);
  for (const record of [...records].reverse()) {
    carried = record.path ?? carried;
    oldestFirst.push({ hash: record.hash, path: carried });
  }

  return oldestFirst.reverse();
}

export function parseNameOnlyOutput(raw: string): string[] {
  const paths = new Set<string>();
  for (const line of raw.split("\n")) {
    const trimmed = line.trim();
    if (trimmed) {
      paths.add(normaliseGitPath(trimmed));
    }
  }
  return [...paths].sort();
}

export function getRepoRoot(cwd: string): string {
  return path.resolve(runGit(["rev-parse", "--show-toplevel"], cwd).trim());
}

export function commitExists(cwd: string, hash: string): boolean {
  return gitSucceeds(["cat-file", "-e", `${hash}^{commit}`], cwd);
}

export function isAncestorCommit(cwd: string, ancestorHash: string, headRef = "HEAD"): boolean {
  return gitSucceeds(["merge-base", "--is-ancestor", ancestorHash, headRef], cwd);
}

/** Every path that appears in the history of any ref. */
export function listHistoricalPaths(cwd: string): string[] {
  return parseNameOnlyOutput(runGit(["log", "--all", "--pretty=format:", "--name-only"], cwd));
}

export function tempFileName(directory: string, hash: string, filePath: string): string {
  return path.join(directory, `${hash}_${path.basename(filePath)}`);
}

export interface GitHistoryReaderOptions {
  cwd: string;
  /** Directory that materialized revisions are written to. */
  tempDirectory: string;
}

export class GitHistoryReader implements HistoryReader {
  private readonly cwd: string;
  private readonly tempDirectory: string;

  constructor(options: GitHistoryReaderOptions) {
    this.cwd = options.cwd;
    this.tempDirectory = options.tempDirectory;
  }

  private revisionRange(range: CommitRange): string {
    const latest = range.latest || "HEAD";
    if (!range.earliest) {
      return latest;
    }

    // A root commit has no parent to exclude; its whole ancestry is the range.
    if (!gitSucceeds(["rev-parse", "--verify", "--quiet", `${range.earliest}^`], this.cwd)) {
      return latest;
    }

    return `${range.earliest}^..${latest}`;
  }

  listCommits(range: CommitRange, filePath: string, followRenames: boolean): HistoryEntry[] {
    const args = ["log", `--format=${RECORD_SEPARATOR}%H`, "--name-only"];
    if (followRenames) {
      args.push("--follow");
    }
    args.push(this.revisionRange(range), "--", filePath);

    const result = spawnGit(args, this.cwd);
    if (result.status !== 0) {
      // An unknown revision or path outside the repository lists nothing.
      if (MISSING_PATH_PATTERN.test(result.stderr) || /unknown revision|bad revision/i.test(result.stderr)) {
        return [];
      }
      throw new GitInvocationError(args, result.status, result.stderr);
    }

    return parseFileLogOutput(result.stdout.toString("utf8"), filePath);
  }

  materialize(hash: string, filePath: string): ContentHandle {
    const args = ["show", `${hash}:${normaliseGitPath(filePath)}`];
    const result = spawnGit(args, this.cwd);
    if (result.status !== 0) {
      if (MISSING_PATH_PATTERN.test(result.stderr)) {
        throw new RevisionNotFoundError(hash, filePath);
      }
      throw new GitInvocationError(args, result.status, result.stderr);
    }

    mkdirSync(this.tempDirectory, { recursive: true });
    const target = tempFileName(this.tempDirectory, hash, filePath);
    writeFileSync(target, result.stdout);

    return {
      path: target,
      release() {
        rmSync(target, { force: true });
      },
    };
  }

  timestamp(hash: string): string {
    return runGit(["show", "-s", "--format=%ci", hash], this.cwd).trim();
  }

  resolveRef(ref: string): string | undefined {
    const result = spawnGit(["rev-parse", "--verify", "--quiet", `${ref}^{commit}`], this.cwd);
    if (result.status !== 0) {
      return undefined;
    }
    return result.stdout.toString("utf8").trim() || undefined;
  }

  isAncestor(ancestor: string, descendant: string): boolean {
    return isAncestorCommit(this.cwd, ancestor, descendant);
  }

  fileExists(ref: string, filePath: string): boolean {
    return gitSucceeds(["cat-file", "-e", `${ref}:./${normaliseGitPath(filePath)}`], this.cwd);
  }
}
