import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Tests spawn child processes and wait on them
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
