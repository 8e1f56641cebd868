/**
 * Fastify Authentication Middleware
 *
 * Identifies the caller of each request. Extracts the Bearer token from
 * the Authorization header, verifies it through the configured
 * AuthProvider, and attaches the User to the request. A request without
 * a token is passed on as anonymous when the provider allows it; what an
 * anonymous user may do is up to the instance's roles.
 *
 * Public routes (health check, auth config) are exempt.
 *
 * Usage: Register this as a Fastify preHandler hook during bootstrap.
 */

import type { FastifyRequest, FastifyReply } from "fastify";
import type { User } from "@arbor/contracts";
import { getAuthProvider } from "../../auth/index.js";

/**
 * Routes that do NOT identify the caller.
 */
const PUBLIC_ROUTES = new Set(["/health", "/api/health", "/api/auth/config"]);

declare module "fastify" {
  interface FastifyRequest {
    user?: User;
  }
}

type BearerToken =
  | { kind: "none" }
  | { kind: "malformed" }
  | { kind: "token"; value: string };

function extractBearerToken(request: FastifyRequest): BearerToken {
  const header = request.headers.authorization;
  if (!header) return { kind: "none" };

  const [scheme, value, ...rest] = header.split(" ");
  if (rest.length > 0 || !value || scheme?.toLowerCase() !== "bearer") {
    return { kind: "malformed" };
  }
  return { kind: "token", value };
}

/**
 * Fastify preHandler hook.
 *
 * For protected routes:
 *   1. Extracts the Bearer token (none → empty string)
 *   2. Verifies it through the AuthProvider
 *   3. Attaches the User to request.user
 *   4. Answers 401 if the header is malformed or the provider rejects it,
 *      returning the reply so Fastify stops there
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | void> {
  // Preflight requests never carry credentials; @fastify/cors answers them.
  if (request.method === "OPTIONS") {
    return;
  }

  const path = request.url.split("?")[0];
  if (path !== undefined && PUBLIC_ROUTES.has(path)) {
    return;
  }

  const token = extractBearerToken(request);
  if (token.kind === "malformed") {
    return reply.status(401).send({
      success: false,
      error: "Malformed Authorization header. Expected \"Bearer <token>\".",
    });
  }

  const user = await getAuthProvider().verifyToken(token.kind === "token" ? token.value : "");
  if (!user) {
    return reply.status(401).send({
      success: false,
      error:
        token.kind === "token"
          ? "Invalid or expired authentication token."
          : "Authentication required. Provide a Bearer token in the Authorization header.",
    });
  }

  request.user = user;
}
