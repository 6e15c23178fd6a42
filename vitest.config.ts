import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // PGlite boots a WASM Postgres per suite
    testTimeout: 60_000,
    hookTimeout: 60_000,
  },
});
