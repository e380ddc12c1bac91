import {
	existsSync,
	readFileSync,
} from "node:fs";

import { parseLcov } from "./lcov.js";
import type {
	CoverageFormat,
	LineMarker,
	RawCoverage,
} from "./types.js";

function isMarker(value: unknown): value is LineMarker {
	return value === null || (typeof value === "number" && Number.isFinite(value) && value >= 0);
}

/**
 * Parse a line coverage document: an object mapping absolute source paths to
 * arrays of per-line markers, e.g. `{ "/repo/lib/x.ts": [1, 0, null, 3] }`.
 */
export function parseLineCoverageJson(content: string): RawCoverage {
	const doc: unknown = JSON.parse(content);
	if (typeof doc !== "object" || doc === null || Array.isArray(doc)) {
		throw new Error("Line coverage must be a JSON object keyed by source path");
	}

	const coverage: RawCoverage = {};
	for (const [file, markers] of Object.entries(doc)) {
		if (!Array.isArray(markers)) {
			throw new Error(`Line coverage for "${file}" is not an array`);
		}
		const checked: LineMarker[] = [];
		for (const marker of markers) {
			if (!isMarker(marker)) {
				throw new Error(`Line coverage for "${file}" has an invalid marker: ${JSON.stringify(marker)}`);
			}
			checked.push(marker);
		}
		coverage[file] = checked;
	}
	return coverage;
}

export function isCoverageFormat(value: string): value is CoverageFormat {
	return value === "json" || value === "lcov";
}

/** Read a coverage artifact from disk. Relative LCOV paths resolve against `baseDir`. */
export function readCoverageFile(
	filePath: string,
	format: CoverageFormat,
	baseDir: string,
): RawCoverage {
	if (!existsSync(filePath)) {
		throw new Error(`Coverage file not found: ${filePath}`);
	}

	const content = readFileSync(filePath, "utf-8");
	if (!content.trim()) {
		throw new Error(`Coverage file is empty: ${filePath}`);
	}

	switch (format) {
		case "json":
			return parseLineCoverageJson(content);
		case "lcov":
			return parseLcov(content, baseDir);
	}
}
