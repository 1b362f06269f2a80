/**
 * Vitest Configuration — @tierline/platform
 *
 * Unit tests for the entitlement engine. Storage-backed behaviour runs
 * against the in-process store; nothing here needs a database.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
