/**
 * Permission Denied Reporter
 *
 * Turns a negative decision into the structured PermissionDenial the
 * calling layer renders. The enforce helpers are the only place in the
 * engine where a refusal becomes an exception, and the only place
 * decisions are logged.
 */

import type {
  AuthorizableObject,
  DenialReason,
  ModelAction,
  PermissionContext,
  PermissionDecision,
  PermissionDenial,
} from "@arbor/contracts";
import { isDenied, userIdOf } from "@arbor/contracts";
import { decide } from "./object-permission.js";
import { checkFieldWrites } from "./field-permission.js";
import { PermissionDeniedError } from "../errors.js";
import { logDecision } from "../logging/index.js";

/** What was being acted on: an object, or a model type when there is none. */
export type DenialTarget = AuthorizableObject | { modelType: string; id?: string };

export interface DenialInput {
  action: ModelAction;
  target: DenialTarget;
  context: PermissionContext;
  reason: DenialReason;
  /** Field identifiers, for insufficient-field-grant */
  fields?: string[];
}

/** "TreePhoto" → "tree photo" */
function humanize(modelType: string): string {
  return modelType.replace(/([a-z0-9])([A-Z])/g, "$1 $2").toLowerCase();
}

function messageFor(input: DenialInput): string {
  const noun = humanize(input.target.modelType);
  switch (input.reason) {
    case "cross-instance":
      return `This ${noun} belongs to a different instance.`;
    case "insufficient-model-grant":
      return input.action === "create"
        ? `You do not have permission to create a ${noun}.`
        : `You do not have permission to ${input.action} this ${noun}.`;
    case "insufficient-field-grant":
      return `You do not have permission to edit: ${(input.fields ?? []).join(", ")}.`;
    case "not-owner":
      return `You can only ${input.action} a ${noun} you added.`;
    case "feature-disabled":
      return `Changes to ${noun} records are disabled in this instance.`;
  }
}

export function reportDenial(input: DenialInput): PermissionDenial {
  const denial: PermissionDenial = {
    status: 403,
    code: "permission_denied",
    reason: input.reason,
    action: input.action,
    modelType: input.target.modelType,
    instanceId: input.context.instance.id,
    userId: userIdOf(input.context.user),
    message: messageFor(input),
  };
  if (input.target.id !== undefined) denial.objectId = input.target.id;
  if (input.fields && input.fields.length > 0) denial.fields = input.fields;
  return denial;
}

/**
 * The denial for a decision, or null when it was allowed.
 * Useful for annotating list items without throwing.
 */
export function denialFor(
  context: PermissionContext,
  action: ModelAction,
  object: AuthorizableObject,
  decision: PermissionDecision = decide(context, action, object)
): PermissionDenial | null {
  if (!isDenied(decision)) return null;
  return reportDenial({ action, target: object, context, reason: decision.reason, fields: decision.fields });
}

function record(
  context: PermissionContext,
  action: ModelAction,
  object: AuthorizableObject,
  decision: PermissionDecision
): void {
  logDecision({
    instanceId: context.instance.id,
    userId: userIdOf(context.user),
    action,
    modelType: object.modelType,
    objectId: object.id,
    allowed: decision.allowed,
    ...(decision.allowed ? { via: decision.via } : { reason: decision.reason }),
  });
}

/**
 * Decides and logs; throws PermissionDeniedError on refusal.
 * Returns the allowing decision otherwise.
 */
export function enforce(
  context: PermissionContext,
  action: ModelAction,
  object: AuthorizableObject
): Extract<PermissionDecision, { allowed: true }> {
  const decision = decide(context, action, object);
  record(context, action, object, decision);
  if (isDenied(decision)) {
    throw new PermissionDeniedError(
      reportDenial({ action, target: object, context, reason: decision.reason })
    );
  }
  return decision;
}

/**
 * Enforces the object-level action, then every named field write.
 * An object without an id is being created; otherwise it is an update.
 */
export function enforceFieldWrites(
  context: PermissionContext,
  object: AuthorizableObject,
  fieldNames: readonly string[]
): void {
  const action: ModelAction = object.id === undefined ? "create" : "update";
  enforce(context, action, object);

  const decision = checkFieldWrites(context, object, fieldNames);
  if (isDenied(decision)) {
    record(context, action, object, decision);
    throw new PermissionDeniedError(
      reportDenial({ action, target: object, context, reason: decision.reason, fields: decision.fields })
    );
  }
}
