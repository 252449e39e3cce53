import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@graphfold/collections",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
