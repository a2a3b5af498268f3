import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["packages/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10000,
  },
});
