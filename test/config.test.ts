import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadGcbConfig } from "../src/core/config.ts";

describe("loadGcbConfig", () => {
  let root: string;
  let repo: string;
  let home: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "gcb-config-"));
    repo = path.join(root, "repo");
    home = path.join(root, "home");
    mkdirSync(repo);
    mkdirSync(home);
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    delete process.env.GCB_TEST_LOGS;
  });

  function writeConfig(dir: string, value: unknown): void {
    writeFileSync(path.join(dir, ".gcbrc.json"), JSON.stringify(value));
  }

  it("returns an empty config when no file exists", () => {
    expect(loadGcbConfig(repo, home)).toEqual({});
  });

  it("lets repo values override global ones", () => {
    writeConfig(home, { follow: true, linearFallback: false, logDirectory: "/global" });
    writeConfig(repo, { logDirectory: "/repo-logs" });

    expect(loadGcbConfig(repo, home)).toEqual({
      follow: true,
      linearFallback: false,
      logDirectory: "/repo-logs",
    });
  });

  it("merges plugin config per plugin and per key", () => {
    writeConfig(home, { pluginConfig: { "csv-cells": { caseSensitive: true, delimiter: ";" } } });
    writeConfig(repo, { pluginConfig: { "csv-cells": { caseSensitive: false }, other: { a: 1 } } });

    expect(loadGcbConfig(repo, home).pluginConfig).toEqual({
      "csv-cells": { caseSensitive: false, delimiter: ";" },
      other: { a: 1 },
    });
  });

  it("interpolates environment variables and keeps escaped dollars", () => {
    process.env.GCB_TEST_LOGS = "/var/tmp/gcb";
    writeConfig(repo, {
      logDirectory: "${GCB_TEST_LOGS}/runs",
      pluginConfig: { example: { token: "$GCB_TEST_LOGS", price: "$$5" } },
    });

    const config = loadGcbConfig(repo, home);
    expect(config.logDirectory).toBe("/var/tmp/gcb/runs");
    expect(config.pluginConfig).toEqual({ example: { token: "/var/tmp/gcb", price: "$5" } });
  });

  it("ignores invalid JSON and fields of the wrong type", () => {
    writeFileSync(path.join(home, ".gcbrc.json"), "{ not json");
    writeConfig(repo, { follow: "yes", plugins: ["./a.ts", 3], linearFallback: true });

    expect(loadGcbConfig(repo, home)).toEqual({ plugins: ["./a.ts"], linearFallback: true });
  });
});
