import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    // Each macro test builds a program over the real lib files
    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
