/**
 * Example gcb plugin adding a CSV content matcher.
 *
 * To use: copy this file to `.gcb/plugins/gcb-plugin-example.ts` in your repo,
 * or list it under "plugins" in `.gcbrc.json`.
 *
 * The matcher compares the query against individual cell values, so quoting and
 * field separators in the raw file do not affect matching. Set
 * `pluginConfig["csv-cells"].caseSensitive` to false for case-insensitive matching.
 */
import { readFileSync } from "node:fs";
import type { ContentMatcher, GcbPlugin } from "../src/plugin-export.ts";

let caseSensitive = true;

export function parseCsvCells(raw: string): string[] {
	const cells: string[] = [];
	let current = "";
	let quoted = false;

	for (let i = 0; i < raw.length; i += 1) {
		const char = raw[i];
		if (quoted) {
			if (char === '"' && raw[i + 1] === '"') {
				current += '"';
				i += 1;
			} else if (char === '"') {
				quoted = false;
			} else {
				current += char;
			}
			continue;
		}

		if (char === '"') {
			quoted = true;
		} else if (char === "," || char === "\n") {
			cells.push(current.replace(/\r$/, ""));
			current = "";
		} else {
			current += char;
		}
	}

	if (current.length > 0) {
		cells.push(current.replace(/\r$/, ""));
	}

	return cells;
}

const csvCellMatcher: ContentMatcher = {
	name: "csv-cells",
	extensions: [".csv"],
	contains(handle, query) {
		const needle = caseSensitive ? query : query.toLowerCase();
		return parseCsvCells(readFileSync(handle.path, "utf8")).some((cell) =>
			(caseSensitive ? cell : cell.toLowerCase()).includes(needle),
		);
	},
};

const plugin: GcbPlugin = {
	meta: {
		name: "csv-cells",
		version: "0.1.0",
		description: "Matches search strings against CSV cell values",
	},

	activate(context) {
		caseSensitive = context.config.caseSensitive !== false;
		context.logger.info(`CSV matcher active (case-sensitive: ${caseSensitive})`);
	},

	contentMatchers: [csvCellMatcher],
};

export default plugin;
