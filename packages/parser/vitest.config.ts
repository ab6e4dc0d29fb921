import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@cutparse/parser",
    globals: true,
    environment: "node",
  },
});
