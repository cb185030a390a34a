import { defineConfig } from "vitest/config";

export default defineConfig({
  define: {
    __VERSION__: JSON.stringify("0.0.0-test"),
  },
  test: {
    globals: true,
    include: ["tests/**/*.test.ts"],
    testTimeout: 10000,
  },
});
