import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    projects: [
      {
        test: {
          name: "splicer",
          include: ["tests/**/*.test.ts"],
          globals: true,
          environment: "node",
        },
      },
      // Package tests
      "packages/*/vitest.config.ts",
    ],

    exclude: ["**/node_modules/**", "**/dist/**"],

    typecheck: {
      enabled: false,
    },

    coverage: {
      provider: "v8",
      reporter: ["text", "html"],
      include: ["packages/*/src/**/*.ts", "src/**/*.ts"],
      exclude: ["**/*.d.ts", "**/*.test.ts"],
    },
  },
});
