import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@graphfold/graph",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
