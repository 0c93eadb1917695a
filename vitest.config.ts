import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],

    coverage: {
      provider: "v8",

      // Source files to measure
      include: ["src/**/*.ts"],

      exclude: [
        "src/index.ts", // Re-export barrel
        "src/cli/main.ts",
      ],

      thresholds: {
        branches: 65,
        functions: 85,
        lines: 80,
        statements: 80,
      },

      // Generate reports for CI and local review
      reporter: ["text", "html", "json"],
    },

    // Tests change process.exitCode and write temp folders
    pool: "forks",

    // Timeout for async operations
    testTimeout: 30000,
  },
});
