import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    clearMocks: true,
    restoreMocks: true,
    setupFiles: ["tests/setup.ts"],
    testTimeout: 5000,
  },
});
