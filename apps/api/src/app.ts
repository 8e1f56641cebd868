/**
 * HTTP App
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * the health check and the permission routes. Does not listen, so tests
 * can drive it with inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerPermissionRoutes } from "@arbor/platform";
import type { AppContext } from "./bootstrap.js";

export interface BuildAppOptions {
  env?: NodeJS.ProcessEnv;
}

export async function buildApp(
  context: AppContext,
  options: BuildAppOptions = {}
): Promise<FastifyInstance> {
  const env = options.env ?? process.env;
  const isProd = env.NODE_ENV === "production";

  const app = Fastify({
    logger: false, // We use our own structured logging
    // Behind a reverse proxy, rate limiting needs the real client IP
    trustProxy: isProd,
  });

  await app.register(helmet, {
    contentSecurityPolicy: isProd,
  });

  // Health checks get a much higher ceiling than permission queries.
  const publicPaths = new Set(["/api/health", "/health"]);
  await app.register(rateLimit, {
    max: (req) => {
      if (publicPaths.has(req.url)) return 10_000;
      return Number(env.RATE_LIMIT_MAX ?? (isProd ? 100 : 1_000));
    },
    timeWindow: Number(env.RATE_LIMIT_WINDOW_MS ?? 60_000),
  });

  // In production, only the configured origins; anything in development.
  const corsOrigin = env.CORS_ORIGIN;
  await app.register(cors, {
    origin: corsOrigin ? corsOrigin.split(",").map((o) => o.trim()) : true,
    credentials: true,
    methods: ["GET", "POST", "OPTIONS"],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  await registerPermissionRoutes(app, { registry: context.registry });

  return app;
}
