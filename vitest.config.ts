import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: false,
    environment: "node",
    include: ["src/**/*.test.ts"],
    // Integration tests bind real listeners on 127.0.0.1:0.
    testTimeout: 10_000,
  },
  resolve: {
    extensions: [".ts", ".js", ".mjs", ".json"],
  },
});
