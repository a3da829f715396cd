import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
		testTimeout: 30000,
		hookTimeout: 10000,
		env: {
			LOG_LEVEL: "silent",
			CHRONICLE_OUTPUT: "agent",
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "html", "json-summary"],
			include: ["src/**/*.ts"],
			exclude: ["src/__tests__/**", "src/index.ts", "src/cli.ts"],
		},
	},
});
