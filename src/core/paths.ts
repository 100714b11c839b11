import { mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { AUDIT_LOG_FILENAME, TOOL_NAME } from "./constants.ts";
import { getRepoRoot } from "./git.ts";

export interface WorkspacePaths {
  workingDirectory: string;
  repoRoot: string;
  /** Holds the audit log and the materialized revisions. */
  logDirectory: string;
  auditLogPath: string;
  tempDirectory: string;
}

export function defaultLogDirectory(): string {
  return path.join(tmpdir(), TOOL_NAME);
}

export function resolveWorkspacePaths(
  workingDirectory: string = process.cwd(),
  logDirectory?: string,
): WorkspacePaths {
  const cwd = path.resolve(workingDirectory);
  const logDir = path.resolve(cwd, logDirectory || defaultLogDirectory());

  return {
    workingDirectory: cwd,
    repoRoot: getRepoRoot(cwd),
    logDirectory: logDir,
    auditLogPath: path.join(logDir, AUDIT_LOG_FILENAME),
    tempDirectory: path.join(logDir, "revisions"),
  };
}

export function ensureWorkspaceDirectories(paths: WorkspacePaths): void {
  mkdirSync(paths.logDirectory, { recursive: true });
  mkdirSync(paths.tempDirectory, { recursive: true });
}
