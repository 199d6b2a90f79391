import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@erasure-primer/inspect",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
