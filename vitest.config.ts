import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "jsdom",
    include: ["app/**/*.test.{ts,tsx}"],
    setupFiles: ["./tests/setup-test-env.ts"],
    coverage: {
      reporter: ["text", "lcov"],
      include: ["app/utils/**/*.ts", "app/routes/**/*.server.ts"],
      exclude: ["**/__tests__/**"]
    }
  },
  resolve: {
    alias: {
      "~": fileURLToPath(new URL("./app", import.meta.url))
    }
  }
});
