import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@quotient/core",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
