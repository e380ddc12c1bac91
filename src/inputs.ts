import type {
	ChangedLine,
	CoverageInput,
} from "./types.js";

function splitEntries(raw: string): string[] {
	return raw
		.split(/[\n,]+/)
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Parse `<test>:<coverage file>` entries. The first colon separates the two,
 * so the coverage path may itself contain colons.
 */
export function parseCoverageInputs(raw: string): CoverageInput[] {
	return splitEntries(raw).map((entry) => {
		const colonIdx = entry.indexOf(":");
		if (colonIdx === -1) {
			throw new Error(
				`Invalid coverage entry "${entry}". Expected format: <test>:<path> (e.g. test/a.test.ts:coverage/a.json)`,
			);
		}
		return {
			test: entry.slice(0, colonIdx).trim(),
			path: entry.slice(colonIdx + 1).trim(),
		};
	});
}

/**
 * Parse `<file>:<line>` entries. The last colon separates the two. Files are
 * given a leading `/` so they match the root-relative keys of the mapping.
 */
export function parseChangedLines(raw: string): ChangedLine[] {
	return splitEntries(raw).map((entry) => {
		const colonIdx = entry.lastIndexOf(":");
		const lineStr = colonIdx === -1 ? "" : entry.slice(colonIdx + 1).trim();
		if (!/^\d+$/.test(lineStr) || parseInt(lineStr, 10) < 1) {
			throw new Error(
				`Invalid changed line "${entry}". Expected format: <file>:<line> (e.g. src/app.ts:42)`,
			);
		}
		const file = entry.slice(0, colonIdx).trim();
		return {
			file: file.startsWith("/") ? file : `/${file}`,
			lineno: parseInt(lineStr, 10),
		};
	});
}
