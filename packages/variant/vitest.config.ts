import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@altgen/variant",
    globals: true,
    environment: "node",
  },
});
