/**
 * Migration Script
 *
 * Creates the role storage tables without starting the server.
 *
 * Usage: npm run db:migrate -w @arbor/api
 *
 * This is useful for:
 *   - Setting up a fresh database
 *   - Running migrations in CI/CD pipelines
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

import { closeDatabase, createLogger, initDatabase, loadConfig, runMigrations } from "@arbor/platform";

const logger = createLogger("migrate");

async function migrate() {
  const config = loadConfig({ ...process.env, ROLE_STORE: "postgres" });
  logger.info("Starting database migration", {
    database: config.database.url?.replace(/\/\/.*@/, "//***@"),
  });

  initDatabase(config);
  try {
    await runMigrations();
    logger.info("Migration complete");
  } finally {
    await closeDatabase();
  }
}

migrate().catch((err: unknown) => {
  logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
