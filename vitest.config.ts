/// <reference types="vitest" />
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      enabled: true,
      exclude: ["src/index.ts", "src/devices/index.ts", "src/scheduler/index.ts"],
      include: ["src/**"],
      provider: "v8",
      reporter: ["text", "text-summary", "html", "json", "lcov"],
      reportsDirectory: "./coverage",
      thresholds: {
        branches: 80,
        functions: 85,
        lines: 85,
        statements: 85,
      },
    },
    environment: "node",
    include: ["test/**/*.test.ts"],
  },
});
