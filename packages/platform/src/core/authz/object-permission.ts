/**
 * Object Permission Checker
 *
 * Decides create/read/update/delete on one concrete object. Checks run in
 * a fixed order and the first failing one names the denial reason:
 *
 *   1. cross-instance            object.instanceId ≠ context instance
 *   2. insufficient-model-grant  unknown model type
 *   3. feature-disabled          mutations of a model whose feature is off
 *   4. model grant               read needs ≥ read, mutations need write
 *                                (super admins satisfy read)
 *   5. not-owner                 only the owner-scoped level would suffice,
 *                                and the user does not own the object
 *   6. insufficient-model-grant  otherwise
 *
 * Pure: no I/O, no logging, no exceptions for a refusal.
 */

import type {
  AuthorizableObject,
  DenialReason,
  GrantSource,
  ModelAction,
  PermissionContext,
  PermissionDecision,
  PermissionLevel,
} from "@arbor/contracts";
import { levelSatisfies, maxLevel, requiredLevelFor } from "@arbor/contracts";
import { featureEnabled, getModel } from "../models/model-registry.js";
import { findModelGrant, modelLevel, ownsObject } from "./role.js";

function allow(via: GrantSource): PermissionDecision {
  return { allowed: true, via };
}

function deny(reason: DenialReason): PermissionDecision {
  return { allowed: false, reason };
}

export function decide(
  context: PermissionContext,
  action: ModelAction,
  object: AuthorizableObject
): PermissionDecision {
  if (object.instanceId !== context.instance.id) {
    return deny("cross-instance");
  }

  const model = getModel(object.modelType);
  if (!model) {
    return deny("insufficient-model-grant");
  }

  if (action !== "read" && !featureEnabled(context.instance, model.name)) {
    return deny("feature-disabled");
  }

  const required = requiredLevelFor(action);
  const grant = findModelGrant(context.role, model.name);

  if (levelSatisfies(grant?.level ?? "none", required)) {
    return allow("model-grant");
  }

  const { user } = context;
  if (required === "read" && user.kind === "user" && user.isSuperAdmin) {
    return allow("super-admin");
  }

  if (model.ownership && grant?.ownedLevel && levelSatisfies(grant.ownedLevel, required)) {
    return ownsObject(user, object, action === "create") ? allow("ownership") : deny("not-owner");
  }

  return deny("insufficient-model-grant");
}

export function canPerform(
  context: PermissionContext,
  action: ModelAction,
  object: AuthorizableObject
): boolean {
  return decide(context, action, object).allowed;
}

/** The objects the context may perform `action` on, in their original order. */
export function filterPermitted<T extends AuthorizableObject>(
  context: PermissionContext,
  action: ModelAction,
  objects: readonly T[]
): T[] {
  return objects.filter((object) => canPerform(context, action, object));
}

/**
 * The context's level on a model with no particular object in mind:
 * the model grant, raised to read for super admins. Owner-scoped
 * escalation is not included, since it depends on the object.
 */
export function modelPermission(context: PermissionContext, modelType: string): PermissionLevel {
  if (!getModel(modelType)) return "none";
  const level = modelLevel(context.role, modelType);
  const { user } = context;
  return user.kind === "user" && user.isSuperAdmin ? maxLevel(level, "read") : level;
}
