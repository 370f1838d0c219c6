import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Test environment
    environment: "node",

    // Global test setup
    globals: true,

    // Setup files - run before all tests
    setupFiles: ["./tests/setup.ts"],

    include: ["tests/**/*.test.ts"],

    // Coverage configuration
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/index.ts", "src/types/**"],
    },

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock options
    mockReset: true,
    restoreMocks: true,
    clearMocks: true,
  },
});
