import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import ExcelJS from "exceljs";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import {
  type ContentMatcher,
  fileExtension,
  selectContentMatcher,
  spreadsheetContentMatcher,
  textContentMatcher,
} from "../src/core/matchers.ts";

function handle(filePath: string) {
  return { path: filePath, release() {} };
}

describe("content matchers", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(path.join(tmpdir(), "gcb-matchers-"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("finds a substring in a text file", () => {
    const file = path.join(dir, "notes.txt");
    writeFileSync(file, "alpha\nbeta gamma\n");

    expect(textContentMatcher.contains(handle(file), "beta gam")).toBe(true);
    expect(textContentMatcher.contains(handle(file), "Beta")).toBe(false);
  });

  it("finds a string in any worksheet cell", async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet("Summary").addRow(["Region", "Total"]);
    const detail = workbook.addWorksheet("Detail");
    detail.addRow(["north", 120]);
    detail.addRow(["south", "invoice INV-0042"]);
    const file = path.join(dir, "book.xlsx");
    await workbook.xlsx.writeFile(file);

    await expect(spreadsheetContentMatcher.contains(handle(file), "INV-0042")).resolves.toBe(true);
    await expect(spreadsheetContentMatcher.contains(handle(file), "120")).resolves.toBe(true);
    await expect(spreadsheetContentMatcher.contains(handle(file), "east")).resolves.toBe(false);
  });

  it("rejects a file that is not a workbook", async () => {
    const file = path.join(dir, "broken.xlsx");
    writeFileSync(file, "not a zip");

    await expect(spreadsheetContentMatcher.contains(handle(file), "x")).rejects.toThrow();
  });
});

describe("selectContentMatcher", () => {
  it("picks by lower-cased extension and falls back to text", () => {
    expect(fileExtension("Data/Book.XLSX")).toBe(".xlsx");
    expect(selectContentMatcher("Book.XLSX").name).toBe("spreadsheet");
    expect(selectContentMatcher("legacy.xls").name).toBe("text");
    expect(selectContentMatcher("Makefile").name).toBe("text");
  });

  it("prefers extra matchers over the built-in ones", () => {
    const custom: ContentMatcher = {
      name: "custom-xlsx",
      extensions: [".xlsx"],
      contains: () => true,
    };

    expect(selectContentMatcher("book.xlsx", [custom]).name).toBe("custom-xlsx");
  });
});
