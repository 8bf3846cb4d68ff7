import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hostmark/runtime",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
