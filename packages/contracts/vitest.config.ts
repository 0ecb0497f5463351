/**
 * Vitest Configuration — @arbor/contracts
 *
 * Pure TypeScript tests. No database, no network.
 * These tests validate permission encoding, agent keys and Zod schemas.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
