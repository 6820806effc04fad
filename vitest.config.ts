import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "test-config/**/*.test.ts"],
    environment: "node",
    testTimeout: 10000,
  },
});
