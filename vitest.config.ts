import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*_test.ts", "src/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
	},
});
