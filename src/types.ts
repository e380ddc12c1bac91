/**
 * Per-line execution signal from coverage instrumentation: `null` for a line
 * that is not executable, `0` for executable but not hit, otherwise the hit
 * count.
 */
export type LineMarker = number | null;

/**
 * Absolute source path to per-line markers; index `i` is line `i + 1`.
 * Arrays may be sparse; a hole reads like `null`.
 */
export type RawCoverage = Record<string, LineMarker[]>;

/**
 * Executed lines per file for a single test run.
 *
 * Keys are root-relative paths (`/lib/foo.ts`), values strictly ascending
 * 1-based line numbers.
 */
export type Spectra = Record<string, number[]>;

/** Test identifier to the spectra recorded when that test last ran. */
export type Mapping = Record<string, Spectra>;

export type CoverageFormat = "json" | "lcov";

/** Parsed `<test>:<path>` input entry. */
export interface CoverageInput {
	test: string;
	path: string;
}

/** Parsed `<file>:<line>` input entry. */
export interface ChangedLine {
	/** Root-relative path with a leading `/`. */
	file: string;
	lineno: number;
}
