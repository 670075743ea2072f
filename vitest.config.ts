import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["hydrant-service/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 20_000
  }
});
