import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["compiler/tests/**/*.test.ts"],
    // The CLI tests start a child process per case.
    testTimeout: 20_000,
  },
});
