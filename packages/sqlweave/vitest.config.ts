import { defineConfig } from "vitest/config";

export default defineConfig({
  // workspace packages resolve to their TypeScript sources
  resolve: {
    conditions: ["source"],
  },
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules"],
  },
});
