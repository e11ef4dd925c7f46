import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["extensions/**/src/__tests__/**/*.test.ts"],
    environment: "node",
    testTimeout: 15000,
  },
});
