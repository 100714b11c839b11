import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createAuditLog,
  createMemoryAuditLog,
  createProbeLogger,
  formatLocalTimestamp,
  formatProbeLine,
  writeSessionFooter,
  writeSessionHeader,
} from "../src/core/audit-log.ts";
import { ProbeRetrievalError } from "../src/core/errors.ts";
import { FakeHistoryReader } from "./fakes.ts";

const RULE = "=".repeat(50);

describe("audit log", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "gcb-audit-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("appends every line to the log file", () => {
    const filePath = path.join(dir, "nested", "search_log.txt");
    const first = createAuditLog({ filePath, echo: false });
    first.write("one");
    const second = createAuditLog({ filePath, echo: false });
    second.write("two");

    expect(readFileSync(filePath, "utf8")).toBe("one\ntwo\n");
  });

  it("formats probe lines", () => {
    expect(formatProbeLine("abc123", "2024-05-01 12:00:00 +0200", true)).toBe(
      "Checked commit: abc123 at 2024-05-01 12:00:00 +0200, found: true",
    );
  });

  it("falls back to unknown time when the timestamp lookup fails", () => {
    const log = createMemoryAuditLog();
    const logProbe = createProbeLogger(log, FakeHistoryReader.linear(1));

    logProbe({
      sequence: 1,
      phase: "last-match",
      index: 0,
      commit: { hash: "c0", path: "data.txt" },
      outcome: { found: false, error: new ProbeRetrievalError("c0", new Error("bad object")) },
    });

    expect(log.lines).toEqual([
      "Error retrieving file at commit c0: bad object",
      "Error retrieving commit time for c0: no timestamp for c0",
      "Checked commit: c0 at unknown time, found: false",
    ]);
  });

  it("frames a session with a header and footer", () => {
    const log = createMemoryAuditLog();
    const start = new Date(2024, 2, 7, 9, 5, 3);
    const end = new Date(2024, 11, 31, 23, 59, 59);

    writeSessionHeader(log, { workingDirectory: "/repo", logDirectory: "/logs" }, start);
    writeSessionFooter(log, end);

    expect(log.lines).toEqual([
      RULE,
      "git-content-bisect started at 2024-03-07 09:05:03",
      "Working Directory (Git Repo): /repo",
      "Logs and temporary files will be created in: /logs",
      RULE,
      "git-content-bisect completed at 2024-12-31 23:59:59",
      RULE,
    ]);
  });

  it("formats local timestamps with zero padding", () => {
    expect(formatLocalTimestamp(new Date(2023, 0, 2, 3, 4, 5))).toBe("2023-01-02 03:04:05");
  });
});
