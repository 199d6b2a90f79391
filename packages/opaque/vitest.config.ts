import ts from "typescript";
import { defineConfig, type Plugin } from "vitest/config";

// esbuild renames a nested class that shadows an outer one (Thermometer ->
// Thermometer2) and Vite forces keepNames off, while the tests compare
// constructor names. Transpile with TypeScript, which keeps names as written.
const typescriptTransform: Plugin = {
  name: "typescript-transpile",
  enforce: "pre",
  transform(code, id) {
    if (!/\.m?ts$/.test(id.split("?")[0] ?? id)) return undefined;
    const result = ts.transpileModule(code, {
      fileName: id,
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        module: ts.ModuleKind.ESNext,
        sourceMap: true,
        inlineSources: true,
      },
    });
    return { code: result.outputText, map: result.sourceMapText };
  },
};

export default defineConfig({
  esbuild: false,
  plugins: [typescriptTransform],
  test: {
    name: "@erasure-primer/opaque",
    include: ["src/__tests__/**/*.test.ts"],
  },
});
