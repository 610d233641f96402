import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["services/orchestrator/src/**/*.spec.ts"],
    testTimeout: 10000
  }
});
