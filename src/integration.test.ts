/**
 * Integration tests: feed LCOV reports for two tests through recording and
 * look up affected tests the way the action's query mode does.
 *
 * Fixture files live in src/fixtures/. Their SF paths are relative, so they
 * resolve against a temporary project root created per suite.
 */
import {
	mkdtempSync,
	rmSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
	afterAll,
	beforeAll,
	describe,
	expect,
	test,
	vi,
} from "vitest";

import {
	collectAffectedTests,
	recordAll,
} from "./action.js";
import { parseChangedLines } from "./inputs.js";
import { TestToCodeMapping } from "./mapping.js";

vi.mock("@actions/core", () => ({
	debug: vi.fn(),
	info: vi.fn(),
	warning: vi.fn(),
}));

const FIXTURES = fileURLToPath(new URL("./fixtures", import.meta.url));

describe("LCOV record and query", () => {
	let root: string;
	let store: TestToCodeMapping;

	beforeAll(() => {
		root = mkdtempSync(join(tmpdir(), "test-impact-int-"));
		store = new TestToCodeMapping(root);
		recordAll(
			store,
			[
				{ test: "test/math.test.ts", path: join(FIXTURES, "math-test.lcov") },
				{ test: "test/format.test.ts", path: join(FIXTURES, "format-test.lcov") },
			],
			"lcov",
			"abc123",
		);
	});

	afterAll(() => {
		rmSync(root, { recursive: true, force: true });
	});

	// ── Recording ───────────────────────────────────────────────────

	test("stores hit lines per test with root-relative paths", () => {
		expect(store.readMapping()).toEqual({
			"test/math.test.ts": {
				"/src/math.ts": [1, 2, 5],
				"/src/format.ts": [1],
			},
			"test/format.test.ts": {
				"/src/format.ts": [1, 2, 3],
				"/src/math.ts": [1],
			},
		});
	});

	test("drops runtime files outside the project", () => {
		const spectra = store.readMapping()["test/math.test.ts"];
		expect(Object.keys(spectra).sort()).toEqual(["/src/format.ts", "/src/math.ts"]);
	});

	test("stamps the commit marker", () => {
		expect(store.readCommitMarker()).toBe("abc123");
	});

	// ── Querying ────────────────────────────────────────────────────

	test("line executed by both tests affects both", () => {
		expect(store.getAffectedTests("/src/math.ts", 1)).toEqual(
			new Set(["test/math.test.ts", "test/format.test.ts"]),
		);
	});

	test("line executed by one test affects only that test", () => {
		expect(store.getAffectedTests("/src/math.ts", 2)).toEqual(new Set(["test/math.test.ts"]));
		expect(store.getAffectedTests("/src/format.ts", 2)).toEqual(
			new Set(["test/format.test.ts"]),
		);
	});

	test("zero-hit and non-executable lines affect nothing", () => {
		expect(store.getAffectedTests("/src/math.ts", 3)).toEqual(new Set());
		expect(store.getAffectedTests("/src/math.ts", 4)).toEqual(new Set());
	});

	test("changed-lines input resolves to the sorted union", () => {
		const changes = parseChangedLines("src/math.ts:5\nsrc/format.ts:3");
		expect(collectAffectedTests(store, changes)).toEqual([
			"test/format.test.ts",
			"test/math.test.ts",
		]);
	});

	// ── Re-recording ────────────────────────────────────────────────

	test("re-recording a test replaces its lines", () => {
		recordAll(
			store,
			[{ test: "test/math.test.ts", path: join(FIXTURES, "format-test.lcov") }],
			"lcov",
			"def456",
		);

		expect(store.readMapping()["test/math.test.ts"]).toEqual({
			"/src/format.ts": [1, 2, 3],
			"/src/math.ts": [1],
		});
		expect(store.getAffectedTests("/src/math.ts", 2)).toEqual(new Set());
		expect(store.readCommitMarker()).toBe("def456");
	});
});
