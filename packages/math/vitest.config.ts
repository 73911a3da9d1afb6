import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@quotient/math",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
