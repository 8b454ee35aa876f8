import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@stockrecon/connectors",
    environment: "node",
    include: [
      "tests/unit/**/*.test.ts",
    ],
    testTimeout: 30000,
  },
});
