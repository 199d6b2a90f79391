import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // CLI tests
      {
        extends: true,
        test: {
          name: "cli",
          include: ["tests/**/*.test.ts"],
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
  },
});
