import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@erasure-primer/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
