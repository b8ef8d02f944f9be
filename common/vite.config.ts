import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		coverage: {
			all: true,
			exclude: ["**/index.ts", "src/tenant/**"],
			include: ["src/**/*.ts"],
			reporter: ["html", "json", "lcov", "text"],
			thresholds: {
				"100": true,
			},
		},
		env: {
			DISABLE_LOGGING: "true",
		},
		globals: true,
		pool: process.platform === "linux" ? "vmForks" : "vmThreads",
		restoreMocks: true,
	},
});
