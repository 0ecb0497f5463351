/**
 * Vitest Configuration — @arbor/engine
 *
 * Unit tests for the engine. Everything runs in process: the in-memory
 * store backs the engine tests and the PostgreSQL code is exercised
 * against a mocked client.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
