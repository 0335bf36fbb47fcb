import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "lcov", "html"],
      reportsDirectory: "./coverage",

      thresholds: {
        branches: 60,
        functions: 60,
        lines: 60,
        statements: 60,

        "src/modules/templates/**": {
          branches: 80,
          functions: 80,
          lines: 80,
          statements: 80,
        },
        "src/modules/whatsapp/**": {
          branches: 80,
          functions: 80,
          lines: 80,
          statements: 80,
        },
        "src/modules/messages/**": {
          branches: 80,
          functions: 80,
          lines: 80,
          statements: 80,
        },
        "src/jobs/**": {
          branches: 80,
          functions: 80,
          lines: 80,
          statements: 80,
        },
      },

      exclude: [
        "node_modules/**",
        "**/*.test.ts",
        "**/index.ts",
        "src/server.ts",
        "src/testing/**",
      ],

      include: ["src/**/*.ts"],
    },
  },
});
