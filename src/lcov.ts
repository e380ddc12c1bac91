import {
	isAbsolute,
	resolve,
} from "node:path";

import type {
	LineMarker,
	RawCoverage,
} from "./types.js";

export const MAX_LINE_NUMBER = 1_000_000;

/**
 * Parse an LCOV report into per-line markers.
 *
 * LCOV record structure:
 *   SF:<source file>
 *   DA:<line number>,<execution count>[,<checksum>]
 *   end_of_record
 *
 * Only DA lines matter here. A line without a DA entry is left as a hole in
 * the marker array, which reads as not executable. Relative SF paths resolve
 * against `baseDir`, and several records for the same file add up.
 */
export function parseLcov(content: string, baseDir: string): RawCoverage {
	const coverage: RawCoverage = {};
	const records = content.split("end_of_record");

	for (const record of records) {
		const trimmed = record.trim();
		if (!trimmed) continue;

		const lines = trimmed.split("\n").map((l) => l.trim());

		let file: string | null = null;
		const hits: Array<[number, number]> = [];

		for (const line of lines) {
			if (line.startsWith("SF:")) {
				const sf = line.slice(3).trim();
				file = isAbsolute(sf) ? resolve(sf) : resolve(baseDir, sf);
			} else if (line.startsWith("DA:")) {
				const parts = line.slice(3).split(",");
				if (parts.length < 2) continue;
				const lineno = parseInt(parts[0], 10);
				const count = parseInt(parts[1], 10);
				if (isNaN(lineno) || lineno < 1 || isNaN(count)) continue;
				hits.push([lineno, count]);
			}
		}

		if (!file) continue;

		const markers: LineMarker[] = coverage[file] ?? [];
		for (const [lineno, count] of hits) {
			if (lineno > MAX_LINE_NUMBER) {
				throw new Error(`LCOV record for ${file} has line ${lineno}, above ${MAX_LINE_NUMBER}`);
			}
			if (count < 0) {
				throw new Error(`LCOV record for ${file} has a negative count on line ${lineno}`);
			}
			markers[lineno - 1] = (markers[lineno - 1] ?? 0) + count;
		}
		coverage[file] = markers;
	}

	return coverage;
}
