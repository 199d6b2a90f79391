import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    cli: "src/cli/index.ts",
  },
  format: ["esm"],
  sourcemap: true,
  // tsc writes dist/ as well
  clean: false,
  splitting: false,
  external: ["typescript", "cosmiconfig"],
  // Workspace packages point at TypeScript sources, so they are bundled in
  noExternal: [/^@erasure-primer\//],
  shims: true,
});
