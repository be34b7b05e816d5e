import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@splicer/core",
    globals: true,
    environment: "node",
  },
});
