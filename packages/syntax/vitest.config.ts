import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "syntax",
    include: ["test/**/*.test.ts"],
    exclude: ["dist/**", "node_modules/**"],
    environment: "node",
    testTimeout: 20000,
    globals: true,
    env: { REPOGRAPH_LOG_LEVEL: "silent" },
  },
});
