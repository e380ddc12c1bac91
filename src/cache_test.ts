import * as cache from "@actions/cache";
import * as core from "@actions/core";
import {
	beforeEach,
	describe,
	expect,
	test,
	vi,
} from "vitest";

import {
	restoreMapping,
	saveMapping,
} from "./cache.js";
import { TestToCodeMapping } from "./mapping.js";

vi.mock("@actions/cache", () => ({
	restoreCache: vi.fn(),
	saveCache: vi.fn(),
}));

vi.mock("@actions/core", () => ({
	debug: vi.fn(),
	info: vi.fn(),
	warning: vi.fn(),
}));

const store = new TestToCodeMapping("/work/repo");

beforeEach(() => {
	vi.clearAllMocks();
});

describe("restoreMapping", () => {
	test("restores the storage directory scoped by branch", async () => {
		vi.mocked(cache.restoreCache).mockResolvedValue("test-impact-main-abc");

		const hit = await restoreMapping(store, "test-impact", "main");

		expect(hit).toBe("test-impact-main-abc");
		expect(cache.restoreCache).toHaveBeenCalledWith(
			["/work/repo/.test-impact"],
			"test-impact-main",
			["test-impact-main-", "test-impact-"],
		);
	});

	test("returns null on a miss", async () => {
		vi.mocked(cache.restoreCache).mockResolvedValue(undefined);

		expect(await restoreMapping(store, "test-impact", "main")).toBeNull();
		expect(core.warning).not.toHaveBeenCalled();
	});

	test("downgrades cache service errors to warnings", async () => {
		vi.mocked(cache.restoreCache).mockRejectedValue(new Error("service unavailable"));

		expect(await restoreMapping(store, "test-impact", "main")).toBeNull();
		expect(core.warning).toHaveBeenCalledWith(
			"Failed to restore mapping cache: service unavailable",
		);
	});
});

describe("saveMapping", () => {
	test("saves under a branch and commit key", async () => {
		vi.mocked(cache.saveCache).mockResolvedValue(1);

		const key = await saveMapping(store, "test-impact", "feature", "abc123");

		expect(key).toBe("test-impact-feature-abc123");
		expect(cache.saveCache).toHaveBeenCalledWith(
			["/work/repo/.test-impact"],
			"test-impact-feature-abc123",
		);
	});

	test("treats a save failure as non-fatal", async () => {
		vi.mocked(cache.saveCache).mockRejectedValue(new Error("key exists"));

		await expect(saveMapping(store, "test-impact", "main", "abc")).resolves.toBe(
			"test-impact-main-abc",
		);
		expect(core.warning).toHaveBeenCalledWith("Mapping cache save (non-fatal): key exists");
	});
});
