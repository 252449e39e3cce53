import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@graphfold/std",
    include: ["src/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
