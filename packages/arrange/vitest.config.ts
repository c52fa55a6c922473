import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@branchwork/arrange",
    include: ["src/**/*.test.ts"],
    globals: true,
    environment: "node",
  },
});
