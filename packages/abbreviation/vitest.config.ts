import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@tagweave/abbreviation",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
