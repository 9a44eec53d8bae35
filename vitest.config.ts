import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
    pool: "threads",
    hookTimeout: 30000,
    benchmark: {
      include: ["packages/*/src/**/*.bench.ts"],
    },
  },
});
