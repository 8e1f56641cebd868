/**
 * Field Permission Resolver
 *
 * Answers "what level does this context have on field F of model M".
 *
 *   1. An object of another instance, an unknown model, or a field the
 *      model (and instance) does not know → none
 *   2. Start from the role's model grant (owner escalation applies when an
 *      object is given and the user owns it)
 *   3. A field grant narrows it: min(field, model). No field grant inherits
 *   4. Super admins read every known field
 *
 * A field grant can never lift a field above its model grant. Editability
 * also requires the model's instance feature, as object mutations do.
 */

import type {
  AuthorizableObject,
  PermissionContext,
  PermissionDecision,
  PermissionLevel,
} from "@arbor/contracts";
import { UDF_PREFIX, levelSatisfies, maxLevel, minLevel } from "@arbor/contracts";
import {
  featureEnabled,
  findField,
  knownFields,
  supportsOwnership,
} from "../models/model-registry.js";
import { toFieldIdentifier } from "../models/identifiers.js";
import { findFieldGrant, findModelGrant, ownsObject } from "./role.js";

/**
 * The model-level ceiling for field resolution. With an object, an
 * owner-scoped grant counts when the user owns it.
 */
function modelCeiling(
  context: PermissionContext,
  modelType: string,
  object?: AuthorizableObject
): PermissionLevel {
  const grant = findModelGrant(context.role, modelType);
  if (!grant) return "none";

  const owned =
    object !== undefined &&
    grant.ownedLevel !== undefined &&
    supportsOwnership(modelType) &&
    ownsObject(context.user, object, object.id === undefined);

  return owned && grant.ownedLevel ? maxLevel(grant.level, grant.ownedLevel) : grant.level;
}

export function fieldPermission(
  context: PermissionContext,
  modelType: string,
  fieldName: string,
  object?: AuthorizableObject
): PermissionLevel {
  if (object !== undefined && object.instanceId !== context.instance.id) {
    return "none";
  }
  if (!findField(context.instance, modelType, fieldName)) {
    return "none";
  }

  const ceiling = modelCeiling(context, modelType, object);
  const fieldGrant = findFieldGrant(context.role, modelType, fieldName);
  const level = fieldGrant ? minLevel(fieldGrant.level, ceiling) : ceiling;

  if (context.user.kind === "user" && context.user.isSuperAdmin) {
    return maxLevel(level, "read");
  }
  return level;
}

/** Level for every field of the model known to the context's instance. */
export function fieldPermissions(
  context: PermissionContext,
  modelType: string,
  object?: AuthorizableObject
): Record<string, PermissionLevel> {
  const levels: Record<string, PermissionLevel> = {};
  for (const field of knownFields(context.instance, modelType)) {
    levels[field.name] = fieldPermission(context, modelType, field.name, object);
  }
  return levels;
}

export function isFieldVisible(
  context: PermissionContext,
  modelType: string,
  fieldName: string,
  object?: AuthorizableObject
): boolean {
  return levelSatisfies(fieldPermission(context, modelType, fieldName, object), "read");
}

export function isFieldEditable(
  context: PermissionContext,
  modelType: string,
  fieldName: string,
  object?: AuthorizableObject
): boolean {
  return (
    featureEnabled(context.instance, modelType) &&
    fieldPermission(context, modelType, fieldName, object) === "write"
  );
}

export function readableFields(
  context: PermissionContext,
  modelType: string,
  object?: AuthorizableObject
): string[] {
  return knownFields(context.instance, modelType)
    .map((field) => field.name)
    .filter((name) => isFieldVisible(context, modelType, name, object));
}

export function writableFields(
  context: PermissionContext,
  modelType: string,
  object?: AuthorizableObject
): string[] {
  return knownFields(context.instance, modelType)
    .map((field) => field.name)
    .filter((name) => isFieldEditable(context, modelType, name, object));
}

/**
 * A copy of the object carrying only the fields the context may read.
 * User-defined values are keyed by bare name, and resolved as `udf:<name>`.
 * Nothing of an object from another instance is readable.
 */
export function redactObject(
  context: PermissionContext,
  object: AuthorizableObject
): AuthorizableObject {
  const visible = (fieldName: string) =>
    isFieldVisible(context, object.modelType, fieldName, object);

  const redacted: AuthorizableObject = { ...object };
  if (object.fields) {
    redacted.fields = Object.fromEntries(
      Object.entries(object.fields).filter(([name]) => visible(name))
    );
  }
  if (object.udfs) {
    redacted.udfs = Object.fromEntries(
      Object.entries(object.udfs).filter(([name]) => visible(`${UDF_PREFIX}${name}`))
    );
  }
  return redacted;
}

/**
 * Decides whether every named field of the object may be written.
 * A denial lists each refused field as "object.field", in the order given.
 */
export function checkFieldWrites(
  context: PermissionContext,
  object: AuthorizableObject,
  fieldNames: readonly string[]
): PermissionDecision {
  if (object.instanceId !== context.instance.id) {
    return { allowed: false, reason: "cross-instance" };
  }
  if (!featureEnabled(context.instance, object.modelType)) {
    return { allowed: false, reason: "feature-disabled" };
  }

  const refused = fieldNames.filter(
    (name) => !isFieldEditable(context, object.modelType, name, object)
  );
  if (refused.length > 0) {
    return {
      allowed: false,
      reason: "insufficient-field-grant",
      fields: refused.map((name) => toFieldIdentifier(object.modelType, name)),
    };
  }
  return { allowed: true, via: "field-grant" };
}
