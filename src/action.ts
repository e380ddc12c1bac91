import * as core from "@actions/core";
import { resolve } from "node:path";

import { readCoverageFile } from "./coverage.js";
import type { TestToCodeMapping } from "./mapping.js";
import type {
	ChangedLine,
	CoverageFormat,
	CoverageInput,
} from "./types.js";

/**
 * Record every `<test>:<path>` pair in input order, then stamp the mapping
 * with the commit it was computed against. Coverage paths resolve against
 * the project root.
 */
export function recordAll(
	store: TestToCodeMapping,
	inputs: CoverageInput[],
	format: CoverageFormat,
	commitSha: string,
): number {
	for (const input of inputs) {
		const path = resolve(store.projectRoot, input.path);
		core.info(`Recording ${input.test} from ${path}`);
		store.recordCoverage(input.test, readCoverageFile(path, format, store.projectRoot));
	}
	store.saveCommitMarker(commitSha);
	return inputs.length;
}

/** Union of the tests affected by each changed line, sorted. */
export function collectAffectedTests(
	store: TestToCodeMapping,
	changes: ChangedLine[],
): string[] {
	const affected = new Set<string>();
	for (const { file, lineno } of changes) {
		const tests = store.getAffectedTests(file, lineno);
		core.debug(`${file}:${lineno} -> ${tests.size} tests`);
		for (const test of tests) affected.add(test);
	}
	return [...affected].sort();
}

/**
 * Compare the stored commit marker with the head commit. Returns a warning
 * when the mapping is missing its marker or was computed for another commit.
 */
export function stalenessWarning(storedSha: string | null, headSha: string): string | null {
	if (storedSha === null) {
		return "No commit marker found; the test-to-code mapping may be missing or incomplete.";
	}
	if (storedSha !== headSha) {
		return `Test-to-code mapping was computed at ${storedSha}, head is ${headSha}.`;
	}
	return null;
}
