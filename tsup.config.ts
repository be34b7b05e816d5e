import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    cli: "src/cli/index.ts",
  },
  format: ["esm"],
  sourcemap: true,
  clean: true,
  splitting: false,
  // Workspace packages export their TypeScript sources, so they are inlined
  noExternal: [/^@splicer\//],
  external: ["typescript", "magic-string", "cosmiconfig"],
});
