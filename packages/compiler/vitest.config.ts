import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@hostmark/compiler",
    include: ["tests/**/*.test.ts"],
    environment: "node",
  },
});
