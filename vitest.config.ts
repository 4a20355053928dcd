import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Deterministic config: tests that need overrides pass their own env object.
    env: {
      PLANSYNC_LOG_LEVEL: "",
      PLANSYNC_DEBUG: "",
      PLANSYNC_DB_PATH: "",
    },
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      reporter: ["text", "text-summary", "lcov"],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70,
        perFile: false,
      },
    },
    // Each file opens its own throw-away SQLite database; forks keep module state apart.
    pool: "forks",
    testTimeout: 10000,
  },
});
