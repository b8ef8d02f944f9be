import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		setupFiles: ["./src/test/setup.ts"],
		coverage: {
			all: true,
			exclude: [
				"**/*.mock.ts",
				"src/cli/ReconcileTenants.ts", // CLI entry point - just runs TenantReconciliation functions
				"src/index.ts",
				"src/model/*.ts",
				"src/util/ModelDef.ts",
			],
			include: ["src/**"],
			reporter: ["html", "json", "lcov", "text"],
			thresholds: {
				lines: 97,
				statements: 97,
				branches: 97,
				functions: 97,
			},
		},
		env: {
			DISABLE_LOGGING: "true",
			TOKEN_SECRET: "test-token-secret",
		},
		globals: true,
		pool: "threads",
		restoreMocks: true,
	},
});
