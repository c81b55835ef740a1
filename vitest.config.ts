import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: [
      "packages/lib/src/**/*.test.ts",
      "packages/cli/src/**/*.test.ts",
      "packages/cli/test/**/*.test.ts",
    ],
    environment: "node",
    env: { NO_COLOR: "1" },
    testTimeout: 15_000,
  },
});
