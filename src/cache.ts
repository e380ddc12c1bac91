import * as cache from "@actions/cache";
import * as core from "@actions/core";

import type { TestToCodeMapping } from "./mapping.js";

function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Restore the mapping directory from a previous run on `branch`, falling back
 * to the newest mapping saved under the prefix on any branch.
 */
export async function restoreMapping(
	store: TestToCodeMapping,
	keyPrefix: string,
	branch: string,
): Promise<string | null> {
	const key = `${keyPrefix}-${branch}`;
	const restoreKeys = [`${keyPrefix}-${branch}-`, `${keyPrefix}-`];

	try {
		const hit = await cache.restoreCache([store.storageDir], key, restoreKeys);
		if (hit) {
			core.info(`Restored test-to-code mapping (key=${hit})`);
			return hit;
		}
		core.info("No cached test-to-code mapping found");
	} catch (err: unknown) {
		core.warning(`Failed to restore mapping cache: ${errorMessage(err)}`);
	}
	return null;
}

/** Save the mapping directory keyed by branch and commit. */
export async function saveMapping(
	store: TestToCodeMapping,
	keyPrefix: string,
	branch: string,
	commitSha: string,
): Promise<string> {
	const key = `${keyPrefix}-${branch}-${commitSha}`;
	try {
		await cache.saveCache([store.storageDir], key);
		core.info(`Saved test-to-code mapping (key=${key})`);
	} catch (err: unknown) {
		// An existing key for the same commit is expected on re-runs
		core.warning(`Mapping cache save (non-fatal): ${errorMessage(err)}`);
	}
	return key;
}
