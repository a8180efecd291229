import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "node",
    environment: "node",
    include: ["src/**/*.test.ts"],
    testTimeout: 30000,
    maxWorkers: 3,
  },
});
