import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "coverage",
      include: ["src/**/*.ts"],
      thresholds: {
        lines: 75,
        statements: 75,
        branches: 65,
        functions: 75,
      },
      exclude: ["src/index.ts", "src/ports/**", "src/domain/types.ts"],
    },
  },
});
