import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    // PGlite boots a full Postgres in WASM for every test database
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
