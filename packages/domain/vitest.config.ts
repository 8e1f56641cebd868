/**
 * Vitest Configuration: @arbor/domain
 *
 * Tests for the map models and role templates.
 * Validates that they conform to the contracts.
 */

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts"],
  },
});
