/**
 * Vitest Configuration: @arbor/platform
 *
 * Unit tests for the authorization engine.
 * Nothing here needs a real database; the Postgres store is covered
 * through its row mapping and DDL.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
