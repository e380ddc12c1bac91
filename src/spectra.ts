import {
	isProjectFile,
	toRootRelative,
} from "./paths.js";
import type {
	RawCoverage,
	Spectra,
} from "./types.js";

/**
 * Collect, per file, the 1-based line numbers that were hit at least once.
 *
 * Positions are scanned in order, so every resulting array is ascending
 * without a sort. Files with no hit line get no entry.
 */
export function spectraFromCoverage(coverage: RawCoverage): Spectra {
	const entries: Array<[string, number[]]> = [];

	for (const [file, markers] of Object.entries(coverage)) {
		const lines: number[] = [];
		markers.forEach((marker, i) => {
			if (marker === null || marker === 0) return;
			lines.push(i + 1);
		});
		if (lines.length > 0) {
			entries.push([file, lines]);
		}
	}

	return Object.fromEntries(entries);
}

/** Drop files outside the project root (dependencies, runtime internals). */
export function selectProjectFiles(root: string, spectra: Spectra): Spectra {
	return Object.fromEntries(
		Object.entries(spectra).filter(([file]) => isProjectFile(root, file)),
	);
}

/** Rewrite every key of `spectra` as a root-relative path. */
export function normalizeSpectraPaths(root: string, spectra: Spectra): Spectra {
	return Object.fromEntries(
		Object.entries(spectra).map(([file, lines]): [string, number[]] => [toRootRelative(root, file), lines]),
	);
}

/**
 * Exact membership of `lineno` in an ascending line list. Finds the first
 * element >= lineno by binary search, then compares for equality.
 */
export function containsLine(lines: readonly number[], lineno: number): boolean {
	let lo = 0;
	let hi = lines.length;

	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		if (lines[mid] < lineno) {
			lo = mid + 1;
		} else {
			hi = mid;
		}
	}

	return lo < lines.length && lines[lo] === lineno;
}
