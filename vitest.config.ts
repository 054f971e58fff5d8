// CHANGE: Vitest configuration for CORE/SHELL/APP test suites
// PURITY: SHELL (configuration only)
// INVARIANT: Tests live under test/ mirroring src/ and import vitest APIs explicitly
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// Prevent test contamination between cases
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
