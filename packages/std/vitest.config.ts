import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@quotient/std",
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
