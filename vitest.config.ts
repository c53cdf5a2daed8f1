import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // tests share temp directories and the catalog singleton
    fileParallelism: false,
    testTimeout: 20000,
  },
});
