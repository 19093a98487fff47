import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["src/**/*.test.ts"],
		environment: "node",
		// Tests call process.chdir, which worker threads do not allow
		pool: "forks",
		testTimeout: 30000,
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			exclude: ["**/*.test.ts", "**/Types.ts", "src/bin.ts", "vitest.config.ts", "vite.config.ts"],
			thresholds: {
				lines: 80,
				functions: 80,
				branches: 75,
				statements: 80,
			},
		},
	},
});
