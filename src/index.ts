import * as core from "@actions/core";

import {
	collectAffectedTests,
	recordAll,
	stalenessWarning,
} from "./action.js";
import {
	restoreMapping,
	saveMapping,
} from "./cache.js";
import {
	resolveBranch,
	resolveHeadSha,
	resolveProjectRoot,
} from "./context.js";
import { isCoverageFormat } from "./coverage.js";
import {
	parseChangedLines,
	parseCoverageInputs,
} from "./inputs.js";
import { TestToCodeMapping } from "./mapping.js";

async function run(): Promise<void> {
	try {
		// Read inputs
		const mode = core.getInput("mode", { required: true });
		const projectRoot = resolveProjectRoot(core.getInput("project-root"));
		const format = core.getInput("coverage-format") || "json";
		const cacheKeyPrefix = core.getInput("cache-key") || "test-impact";
		const useCache = core.getInput("use-cache") !== "off";

		if (mode !== "record" && mode !== "query") {
			throw new Error(`Unknown mode "${mode}". Supported: record, query.`);
		}

		const store = new TestToCodeMapping(projectRoot);
		const headSha = resolveHeadSha();
		const branch = resolveBranch();

		if (useCache) {
			await restoreMapping(store, cacheKeyPrefix, branch);
		}

		if (mode === "record") {
			if (!isCoverageFormat(format)) {
				throw new Error(`Unknown coverage format "${format}". Supported: json, lcov.`);
			}
			const inputs = parseCoverageInputs(core.getInput("coverage-paths", { required: true }));
			if (inputs.length === 0) {
				core.warning("No coverage files given.");
			}

			const count = recordAll(store, inputs, format, headSha);
			core.setOutput("recorded-tests", count.toString());
			core.setOutput("mapping-commit", headSha);

			if (useCache && count > 0) {
				await saveMapping(store, cacheKeyPrefix, branch, headSha);
			}
			core.info(`Recorded ${count} tests at ${headSha}.`);
			return;
		}

		const changes = parseChangedLines(core.getInput("changed-lines"));
		const storedSha = store.readCommitMarker();
		const warning = stalenessWarning(storedSha, headSha);
		if (warning) {
			core.warning(warning);
		}

		const affected = collectAffectedTests(store, changes);
		core.setOutput("affected-tests", JSON.stringify(affected));
		core.setOutput("mapping-commit", storedSha ?? "");

		core.info(`${affected.length} tests affected by ${changes.length} changed lines.`);
		for (const test of affected) {
			core.info(`  ${test}`);
		}
	} catch (error: unknown) {
		core.setFailed(`Test impact map failed: ${error instanceof Error ? error.message : String(error)}`);
	}
}

void run();
