import { defineConfig } from "vitest/config";

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    environment: "node",
    include: ["src/__tests__/**/*.test.{ts,tsx}"],
    globals: false,
  },
});
