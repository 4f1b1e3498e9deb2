import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["orchestrator/tests/**/*.test.ts", "apps/ui-server/tests/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
