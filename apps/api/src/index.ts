/**
 * Arbor API Server
 *
 * Fastify entry point. Boots the platform, registers routes, starts listening.
 */

import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { captureException, createLogger, flushObservability } from "@arbor/platform";
import { bootstrap } from "./bootstrap.js";
import { buildApp } from "./app.js";
import { seedDemoInstance } from "./demo.js";

const logger = createLogger("server");

async function main() {
  // 1. Bootstrap platform + domain
  const context = await bootstrap();
  const { config } = context;

  // 2. An in-memory store starts empty; give it something to answer from
  if (config.roleStore === "memory") {
    const { instance } = await seedDemoInstance(context.admin);
    logger.info("Seeded demo instance", { urlName: instance.urlName });
  }

  // 3. Build the HTTP app and start listening
  const app = await buildApp(context);
  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });
  logger.info("Arbor API listening", { url: `http://localhost:${config.api.port}` });

  // 4. Graceful shutdown
  const shutdown = async () => {
    logger.info("Shutting down");
    await app.close();
    await flushObservability(2000);
    await context.store.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch(async (err: unknown) => {
  logger.error("Fatal error", { error: err instanceof Error ? err.message : String(err) });
  captureException(err instanceof Error ? err : new Error(String(err)));
  await flushObservability(2000);
  process.exit(1);
});
