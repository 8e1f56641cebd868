/**
 * REST Adapter
 *
 * A thin HTTP face over the authorization engine. Every route resolves
 * the caller's PermissionContext once and answers from it:
 *
 *   GET  /api/instances/:urlName/permissions/:model
 *        the caller's level on a model and on each of its fields
 *
 *   POST /api/instances/:urlName/decisions
 *        decides { action, object, fields? }; with ?enforce=true a
 *        refusal is answered with 403 and the structured denial
 *
 *   GET  /api/instances/:urlName/fields/:identifier
 *        field descriptor for an object about to be created
 *
 * Errors map to status codes through one table; anything unexpected is
 * captured and answered with a generic 500.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type {
  AuthorizableObject,
  ModelAction,
  PermissionContext,
  PermissionDecision,
  User,
} from "@arbor/contracts";
import { ANONYMOUS, MODEL_ACTIONS, isDenied, userIdOf } from "@arbor/contracts";
import { getAuthProvider } from "../../auth/index.js";
import { authMiddleware } from "./auth-middleware.js";
import { resolvePermissionContext } from "../../core/authz/context.js";
import { decide, modelPermission } from "../../core/authz/object-permission.js";
import { checkFieldWrites, fieldPermissions } from "../../core/authz/field-permission.js";
import { denialFor, enforce, enforceFieldWrites } from "../../core/authz/reporter.js";
import { describeNewField } from "../../core/authz/field-descriptor.js";
import type { RoleRegistry } from "../../core/authz/role-registry.js";
import { parseFieldIdentifier, resolveModelType, toFieldErrors } from "../../core/models/identifiers.js";
import { captureException } from "../../core/observability/index.js";
import { createLogger } from "../../core/logging/index.js";
import {
  ConfigurationInvariantViolation,
  NotFoundError,
  PermissionDeniedError,
  ValidationError,
} from "../../core/errors.js";

const logger = createLogger("rest");

export interface PermissionRouteOptions {
  registry: RoleRegistry;
}

// ---------------------------------------------------------------
// Error mapping
// ---------------------------------------------------------------

/**
 * Maps engine errors to HTTP status codes:
 *   validation → 400, not found → 404, denied → 403, invariant → 422
 */
const ERROR_STATUS: ReadonlyArray<[new (...args: never[]) => Error, number]> = [
  [ValidationError, 400],
  [NotFoundError, 404],
  [PermissionDeniedError, 403],
  [ConfigurationInvariantViolation, 422],
];

export function statusForError(error: unknown): number {
  for (const [errorClass, status] of ERROR_STATUS) {
    if (error instanceof errorClass) return status;
  }
  return 500;
}

function errorBody(error: Error): Record<string, unknown> {
  if (error instanceof PermissionDeniedError) {
    return { success: false, error: error.message, denial: error.denial };
  }
  if (error instanceof ValidationError) {
    return { success: false, error: error.message, fieldErrors: error.fieldErrors };
  }
  if (error instanceof ConfigurationInvariantViolation) {
    return { success: false, error: error.message, violations: error.violations };
  }
  return { success: false, error: error.message };
}

function sendError(request: FastifyRequest, reply: FastifyReply, error: FastifyError | Error): void {
  const status = statusForError(error);
  if (status !== 500) {
    reply.status(status).send(errorBody(error));
    return;
  }

  // Fastify's own client errors (malformed JSON, oversized body) carry a 4xx statusCode
  if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
    reply.status(error.statusCode).send({ success: false, error: error.message });
    return;
  }

  captureException(error, { userId: request.user ? userIdOf(request.user) : null, url: request.url });
  logger.error("Unhandled error", { url: request.url, error: error.message });
  reply.status(500).send({ success: false, error: "An unexpected error occurred." });
}

// ---------------------------------------------------------------
// Input schemas
// ---------------------------------------------------------------

const decisionBodySchema = z.object({
  action: z.enum(MODEL_ACTIONS),
  object: z.object({
    modelType: z.string().min(1),
    id: z.string().min(1).optional(),
    instanceId: z.string().min(1).optional(),
    ownerId: z.string().min(1).nullable().optional(),
    fields: z.record(z.unknown()).optional(),
    udfs: z.record(z.unknown()).optional(),
  }),
  /** Field names about to be written; only meaningful for create and update */
  fields: z.array(z.string().min(1)).optional(),
});

const enforceQuerySchema = z.object({
  enforce: z.enum(["true", "false"]).optional(),
});

function parse<T>(schema: z.ZodType<T>, value: unknown, what: string): T {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const problems: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.join(".") || what;
    problems[key] = [...(problems[key] ?? []), issue.message];
  }
  throw new ValidationError(`Invalid ${what}`, toFieldErrors(problems, "invalid_input"));
}

// ---------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------

function decideWithFields(
  context: PermissionContext,
  action: ModelAction,
  object: AuthorizableObject,
  fields: readonly string[]
): PermissionDecision {
  const decision = decide(context, action, object);
  if (isDenied(decision) || fields.length === 0) return decision;
  if (action !== "create" && action !== "update") return decision;
  return checkFieldWrites(context, object, fields);
}

/**
 * Registers the permission routes on the Fastify instance.
 */
export async function registerPermissionRoutes(
  app: FastifyInstance,
  options: PermissionRouteOptions
): Promise<void> {
  const { registry } = options;

  app.addHook("preHandler", authMiddleware);
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    sendError(request, reply, error);
  });

  const contextFor = (request: FastifyRequest, urlName: string): Promise<PermissionContext> => {
    const user: User = request.user ?? ANONYMOUS;
    return resolvePermissionContext(registry, user, { urlName });
  };

  /** Auth configuration: tells clients how to authenticate */
  app.get("/api/auth/config", async () => {
    return getAuthProvider().getPublicConfig();
  });

  // ---------------------------------------------------------------
  // Model and field levels
  // ---------------------------------------------------------------

  app.get<{ Params: { urlName: string; model: string } }>(
    "/api/instances/:urlName/permissions/:model",
    async (request) => {
      const modelType = resolveModelType(request.params.model);
      const context = await contextFor(request, request.params.urlName);

      return {
        success: true,
        data: {
          instanceId: context.instance.id,
          modelType,
          level: modelPermission(context, modelType),
          fields: fieldPermissions(context, modelType),
        },
      };
    }
  );

  // ---------------------------------------------------------------
  // Decisions
  // ---------------------------------------------------------------

  app.post<{ Params: { urlName: string }; Querystring: Record<string, string> }>(
    "/api/instances/:urlName/decisions",
    async (request) => {
      const body = parse(decisionBodySchema, request.body, "decision request");
      const query = parse(enforceQuerySchema, request.query, "query");
      const context = await contextFor(request, request.params.urlName);

      const object: AuthorizableObject = {
        ...body.object,
        modelType: resolveModelType(body.object.modelType),
        instanceId: body.object.instanceId ?? context.instance.id,
      };
      const fields = body.fields ?? [];

      if (query.enforce === "true") {
        if (fields.length > 0 && (body.action === "create" || body.action === "update")) {
          enforceFieldWrites(context, object, fields);
          return { success: true, data: { decision: { allowed: true, via: "field-grant" } } };
        }
        return { success: true, data: { decision: enforce(context, body.action, object) } };
      }

      const decision = decideWithFields(context, body.action, object, fields);
      return {
        success: true,
        data: { decision, denial: denialFor(context, body.action, object, decision) },
      };
    }
  );

  // ---------------------------------------------------------------
  // Field descriptors
  // ---------------------------------------------------------------

  app.get<{ Params: { urlName: string; identifier: string }; Querystring: { label?: string } }>(
    "/api/instances/:urlName/fields/:identifier",
    async (request) => {
      const context = await contextFor(request, request.params.urlName);
      const { identifier } = request.params;
      const { modelType } = parseFieldIdentifier(identifier);

      return {
        success: true,
        data: describeNewField(context, modelType, identifier, { label: request.query.label }),
      };
    }
  );
}
