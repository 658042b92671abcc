import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    // Main entry point (codes, coders, tagged errors, built-in coders)
    index: "src/index.ts",
    // Granular entry points
    http: "src/http-entry.ts",
    context: "src/context-entry.ts",
    fs: "src/fs-entry.ts",
  },
  format: ["cjs", "esm"],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
