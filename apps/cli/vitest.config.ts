import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@stockrecon/cli",
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
    testTimeout: 30000,
  },
});
