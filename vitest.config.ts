import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    mockReset: true,
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
