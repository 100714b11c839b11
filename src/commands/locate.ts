import path from "node:path";
import { listHistoricalPaths } from "../core/git.ts";
import { matchPathsByFileName } from "../core/locate.ts";

export interface LocateOptions {
  workingDirectory?: string;
}

export async function runLocate(fileName: string, options: LocateOptions = {}): Promise<string[]> {
  const cwd = path.resolve(options.workingDirectory || process.cwd());
  const matches = matchPathsByFileName(listHistoricalPaths(cwd), fileName);

  if (matches.length === 0) {
    console.log(`File '${fileName}' was not found in the history of any branch.`);
    return matches;
  }

  console.log(`Found ${matches.length} path(s) matching '${fileName}':`);
  for (const match of matches) {
    console.log(`  ${match}`);
  }
  return matches;
}
