import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      exclude: ["**/node_modules/**", "**/dist/**", "**/*.config.ts"],
      thresholds: {
        statements: 90,
        branches: 90,
        functions: 95,
        lines: 90,
      },
    },
  },
});
