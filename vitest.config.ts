import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "test/integration/**/*.integration.test.ts"],
    testTimeout: 10000,
  },
});
