import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      // Root-level tests (CLI and umbrella exports)
      {
        extends: true,
        test: {
          name: "root",
          include: ["tests/**/*.test.ts"],
          globals: true,
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    pool: "forks",

    typecheck: {
      enabled: false,
    },

    testTimeout: 30000,
    hookTimeout: 15000,
  },
});
