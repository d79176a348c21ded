import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // file tests share tmp/ and process-wide console spies
    fileParallelism: false,
  },
});
