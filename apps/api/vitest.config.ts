import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    setupFiles: ["./src/__tests__/helpers/setup.ts"],
    testTimeout: 30000,
  },
});
