import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import { SESSION_RULE, TOOL_NAME, UNKNOWN_TIME } from "./constants.ts";
import { errorMessage } from "./errors.ts";
import type { HistoryReader } from "./history.ts";
import type { ProbeEvent } from "./types.ts";

export interface AuditLog {
  write(line: string): void;
}

export interface AuditLogOptions {
  /** Appended to, one synchronous write per line. */
  filePath?: string;
  /** Also print each line to stdout. */
  echo?: boolean;
}

export function createAuditLog(options: AuditLogOptions): AuditLog {
  const { filePath, echo = true } = options;
  if (filePath) {
    mkdirSync(path.dirname(filePath), { recursive: true });
  }

  return {
    write(line: string) {
      if (echo) {
        console.log(line);
      }
      if (filePath) {
        appendFileSync(filePath, `${line}\n`, "utf8");
      }
    },
  };
}

export function createMemoryAuditLog(): AuditLog & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    write(line: string) {
      lines.push(line);
    },
  };
}

export function formatProbeLine(hash: string, time: string, found: boolean): string {
  return `Checked commit: ${hash} at ${time}, found: ${found}`;
}

function commitTime(log: AuditLog, reader: HistoryReader, hash: string): string {
  try {
    return reader.timestamp(hash) || UNKNOWN_TIME;
  } catch (error) {
    log.write(`Error retrieving commit time for ${hash}: ${errorMessage(error)}`);
    return UNKNOWN_TIME;
  }
}

/** Turns probe events into audit lines. Timestamps are looked up only here. */
export function createProbeLogger(log: AuditLog, reader: HistoryReader): (event: ProbeEvent) => void {
  return (event) => {
    const { commit, outcome } = event;
    if (outcome.error) {
      log.write(`Error retrieving file at commit ${commit.hash}: ${outcome.error.message}`);
    }
    log.write(formatProbeLine(commit.hash, commitTime(log, reader, commit.hash), outcome.found));
  };
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as `yyyy-MM-dd HH:mm:ss`. */
export function formatLocalTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export interface SessionInfo {
  workingDirectory: string;
  logDirectory: string;
}

export function writeSessionHeader(log: AuditLog, info: SessionInfo, now = new Date()): void {
  log.write(SESSION_RULE);
  log.write(`${TOOL_NAME} started at ${formatLocalTimestamp(now)}`);
  log.write(`Working Directory (Git Repo): ${info.workingDirectory}`);
  log.write(`Logs and temporary files will be created in: ${info.logDirectory}`);
  log.write(SESSION_RULE);
}

export function writeSessionFooter(log: AuditLog, now = new Date()): void {
  log.write(`${TOOL_NAME} completed at ${formatLocalTimestamp(now)}`);
  log.write(SESSION_RULE);
}
