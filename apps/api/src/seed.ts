/**
 * Seed Script
 *
 * Creates the demo instance in the configured Postgres role store.
 * Run with: npm run db:seed -w @arbor/api
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { createLogger, loadConfig } from "@arbor/platform";
import { bootstrap } from "./bootstrap.js";
import { DEMO_INSTANCE, seedDemoInstance } from "./demo.js";

const logger = createLogger("seed");

async function seed() {
  const config = loadConfig({ ...process.env, ROLE_STORE: "postgres" });
  const { admin, store } = await bootstrap({ config });

  try {
    if (await store.findInstance(DEMO_INSTANCE.id)) {
      logger.info("Demo instance already exists, nothing to do", { urlName: DEMO_INSTANCE.urlName });
      return;
    }
    const { roleIds } = await seedDemoInstance(admin);
    logger.info("Seeded demo instance", { urlName: DEMO_INSTANCE.urlName, roles: Object.keys(roleIds) });
  } finally {
    await store.close();
  }
}

seed().catch((err: unknown) => {
  logger.error("Seed failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
