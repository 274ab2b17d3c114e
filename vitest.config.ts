// CHANGE: Vitest configuration
// WHY: Tests import describe/it/expect explicitly and restore spies after each test
// REF: n/a
// SOURCE: https://vitest.dev/config/
// PURITY: SHELL (configuration only)
// INVARIANT: tests are independent; mocks and spies are restored after each test

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect, vi } from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
				global: {
					branches: 60,
					functions: 60,
					lines: 60,
					statements: 60,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
