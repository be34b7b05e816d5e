import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@splicer/preprocessor",
    globals: true,
    environment: "node",
  },
});
