import { defineConfig, type Options } from "tsup";

/**
 * The published bin. The workspace packages export their TypeScript
 * sources, so they are bundled in; registry dependencies stay external.
 */
export const cliBuild = {
  entry: {
    cli: "src/cli/bin.ts",
  },
  format: ["esm"],
  platform: "node",
  target: "node20",
  outDir: "dist",
  noExternal: [/^@tagweave\//],
  sourcemap: true,
  clean: true,
  splitting: false,
} satisfies Options;

export default defineConfig(cliBuild);
