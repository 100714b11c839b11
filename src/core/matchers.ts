import { readFileSync } from "node:fs";
import path from "node:path";
import ExcelJS from "exceljs";
import type { ContentHandle } from "./history.ts";

export interface ContentMatcher {
  readonly name: string;
  /** Lower-case extensions including the dot, e.g. ".xlsx". Empty for the catch-all matcher. */
  readonly extensions: readonly string[];
  contains(handle: ContentHandle, query: string): Promise<boolean> | boolean;
}

export const textContentMatcher: ContentMatcher = {
  name: "text",
  extensions: [],
  contains(handle, query) {
    return readFileSync(handle.path, "utf8").includes(query);
  },
};

export const spreadsheetContentMatcher: ContentMatcher = {
  name: "spreadsheet",
  extensions: [".xlsx"],
  async contains(handle, query) {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(handle.path);

    for (const worksheet of workbook.worksheets) {
      let found = false;
      worksheet.eachRow((row) => {
        if (found) {
          return;
        }
        row.eachCell((cell) => {
          if (!found && cell.text.includes(query)) {
            found = true;
          }
        });
      });
      if (found) {
        return true;
      }
    }

    return false;
  },
};

export const builtinContentMatchers: readonly ContentMatcher[] = [spreadsheetContentMatcher];

export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Picks the matcher for `filePath` by extension: `extra` (plugin matchers) first, then the
 * built-in ones, falling back to plain text.
 */
export function selectContentMatcher(
  filePath: string,
  extra: readonly ContentMatcher[] = [],
): ContentMatcher {
  const extension = fileExtension(filePath);
  if (extension) {
    for (const matcher of [...extra, ...builtinContentMatchers]) {
      if (matcher.extensions.includes(extension)) {
        return matcher;
      }
    }
  }

  return textContentMatcher;
}
