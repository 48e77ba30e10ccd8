import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@altgen/core",
    globals: true,
    environment: "node",
  },
});
