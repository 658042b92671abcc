import { defineConfig } from "vitest/config";

// Workspace packages resolve to their TypeScript sources through the
// "source" export condition, so tests need no build first.
const conditions = ["source"];

export default defineConfig({
  resolve: {
    conditions,
  },
  ssr: {
    resolve: {
      conditions,
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
  },
});
