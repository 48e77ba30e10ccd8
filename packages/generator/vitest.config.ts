import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@altgen/generator",
    globals: true,
    environment: "node",
  },
});
