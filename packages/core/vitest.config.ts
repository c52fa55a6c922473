import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@branchwork/core",
    include: ["tests/**/*.test.ts"],
    globals: true,
    environment: "node",
  },
});
