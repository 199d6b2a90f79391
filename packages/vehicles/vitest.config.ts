import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@erasure-primer/vehicles",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
