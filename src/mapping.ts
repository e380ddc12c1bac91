import * as core from "@actions/core";
import {
	existsSync,
	mkdirSync,
	readFileSync,
	renameSync,
	rmSync,
	writeFileSync,
} from "node:fs";
import { join } from "node:path";

import { resolveRoot } from "./paths.js";
import {
	containsLine,
	normalizeSpectraPaths,
	selectProjectFiles,
	spectraFromCoverage,
} from "./spectra.js";
import type {
	Mapping,
	RawCoverage,
	Spectra,
} from "./types.js";

export const STORAGE_DIR = ".test-impact";
export const MAPPING_FILE = "test_to_code_mapping.json";
export const COMMIT_MARKER_FILE = "commit.txt";

/** The store was created without a usable project root. */
export class ProjectRootError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ProjectRootError";
	}
}

/** The persisted mapping could not be parsed or has the wrong shape. */
export class MappingCorruptError extends Error {
	readonly file: string;

	constructor(file: string, reason: string) {
		super(`Corrupt test-to-code mapping at ${file}: ${reason}`);
		this.name = "MappingCorruptError";
		this.file = file;
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isLineList(value: unknown): value is number[] {
	if (!Array.isArray(value)) return false;
	let prev = 0;
	for (const n of value) {
		if (typeof n !== "number" || !Number.isInteger(n) || n <= prev) return false;
		prev = n;
	}
	return true;
}

/** Validate a parsed document, naming the first offending key. */
function toMapping(file: string, doc: unknown): Mapping {
	if (!isRecord(doc)) {
		throw new MappingCorruptError(file, "top level is not an object");
	}

	const entries: Array<[string, Spectra]> = [];
	for (const [test, spectra] of Object.entries(doc)) {
		if (!isRecord(spectra)) {
			throw new MappingCorruptError(file, `entry for "${test}" is not an object`);
		}
		const checked: Array<[string, number[]]> = [];
		for (const [source, lines] of Object.entries(spectra)) {
			if (!isLineList(lines)) {
				throw new MappingCorruptError(
					file,
					`lines for "${source}" in "${test}" are not ascending positive integers`,
				);
			}
			checked.push([source, lines]);
		}
		entries.push([test, Object.fromEntries(checked)]);
	}
	// fromEntries defines own keys, so ids such as "__proto__" stay entries
	return Object.fromEntries(entries);
}

/**
 * Mapping from test file to the code it executed (coverage without counts).
 *
 * Everything lives in a hidden directory under the project root:
 * the mapping as one JSON document and the commit it was computed against
 * as a plain text marker.
 */
export class TestToCodeMapping {
	readonly projectRoot: string;

	constructor(projectRoot: string) {
		if (typeof projectRoot !== "string" || !projectRoot.trim()) {
			throw new ProjectRootError("A project root is required to locate the test-to-code mapping");
		}
		this.projectRoot = resolveRoot(projectRoot);
	}

	get storageDir(): string {
		return join(this.projectRoot, STORAGE_DIR);
	}

	get mappingFile(): string {
		return join(this.storageDir, MAPPING_FILE);
	}

	get commitMarkerFile(): string {
		return join(this.storageDir, COMMIT_MARKER_FILE);
	}

	/**
	 * Store the lines `test` executed, replacing whatever was recorded for it
	 * before. Files outside the project root are dropped and the rest keyed by
	 * their root-relative path.
	 */
	recordCoverage(test: string, coverage: RawCoverage): void {
		const spectra = normalizeSpectraPaths(
			this.projectRoot,
			selectProjectFiles(this.projectRoot, spectraFromCoverage(coverage)),
		);
		core.debug(`Recording ${Object.keys(spectra).length} project files for ${test}`);

		const entries: Array<[string, Spectra]> = [
			...Object.entries(this.readMapping()),
			[test, spectra],
		];
		this.write(this.mappingFile, JSON.stringify(Object.fromEntries(entries)));
	}

	/** The persisted mapping, or an empty one when nothing was recorded yet. */
	readMapping(): Mapping {
		const file = this.mappingFile;
		if (!existsSync(file)) return {};

		const raw = readFileSync(file, "utf-8");
		let doc: unknown;
		try {
			doc = JSON.parse(raw);
		} catch (err: unknown) {
			throw new MappingCorruptError(file, err instanceof Error ? err.message : String(err));
		}
		return toMapping(file, doc);
	}

	/**
	 * Tests whose recorded run executed exactly line `lineno` of `file`.
	 *
	 * @param file root-relative path, as stored (`/lib/foo.ts`)
	 */
	getAffectedTests(file: string, lineno: number): Set<string> {
		const tests = new Set<string>();
		for (const [test, spectra] of Object.entries(this.readMapping())) {
			if (!Object.hasOwn(spectra, file)) continue;
			if (containsLine(spectra[file], lineno)) {
				tests.add(test);
			}
		}
		return tests;
	}

	saveCommitMarker(commitId: string): void {
		this.write(this.commitMarkerFile, commitId);
	}

	/** Commit the mapping was last computed against, `null` if never saved. */
	readCommitMarker(): string | null {
		const file = this.commitMarkerFile;
		if (!existsSync(file)) return null;
		return readFileSync(file, "utf-8");
	}

	// Replace through a sibling temp file so readers never see a partial write.
	private write(path: string, content: string): void {
		if (!existsSync(this.storageDir)) {
			mkdirSync(this.storageDir, { recursive: true });
		}
		const tmp = `${path}.${process.pid}.tmp`;
		try {
			writeFileSync(tmp, content);
			renameSync(tmp, path);
		} catch (err: unknown) {
			if (existsSync(tmp)) rmSync(tmp);
			throw err;
		}
	}
}
