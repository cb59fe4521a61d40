import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "backend",
          include: [
            "apps/**/__tests__/**/*.test.ts",
            "packages/**/__tests__/**/*.test.ts",
          ],
          environment: "node",
        },
      },
    ],
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary", "lcov"],
      reportsDirectory: "coverage",
      include: ["apps/*/src/**", "packages/*/src/**"],
      exclude: [
        "node_modules",
        "dist",
        "**/*.test.ts",
        "**/__tests__/**",
      ],
    },
  },
});
