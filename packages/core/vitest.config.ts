import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@graphfold/core",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
