import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hostmark/syntax",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
