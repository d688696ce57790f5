import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      // Keep a developer's ~/.ledgerline/config.json out of test runs
      LEDGERLINE_CONFIG: "tests/fixtures/config.json",
    },
  },
});
