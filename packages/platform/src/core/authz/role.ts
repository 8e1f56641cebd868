/**
 * Role Helpers
 *
 * Grant lookup over the immutable Role records the registry hands out,
 * the two synthetic roles the registry can fall back to, and ownership.
 */

import type {
  AuthorizableObject,
  PermissionLevel,
  Role,
  RoleGrant,
  User,
} from "@arbor/contracts";
import { grantKey, minLevel } from "@arbor/contracts";

/** Lookup index per role object; roles are frozen, so the index never goes stale */
const grantIndex = new WeakMap<Role, Map<string, RoleGrant>>();

function indexFor(role: Role): Map<string, RoleGrant> {
  let index = grantIndex.get(role);
  if (!index) {
    index = new Map();
    for (const grant of role.grants) {
      index.set(grantKey(grant.modelType, grant.fieldName), grant);
    }
    grantIndex.set(role, index);
  }
  return index;
}

/** The role's model-level grant for `modelType`, if it has one. */
export function findModelGrant(role: Role, modelType: string): RoleGrant | undefined {
  return indexFor(role).get(grantKey(modelType));
}

/** The role's grant for one field of `modelType`, if it has one. */
export function findFieldGrant(
  role: Role,
  modelType: string,
  fieldName: string
): RoleGrant | undefined {
  return indexFor(role).get(grantKey(modelType, fieldName));
}

/** Model-level permission level; "none" when the role has no grant. */
export function modelLevel(role: Role, modelType: string): PermissionLevel {
  return findModelGrant(role, modelType)?.level ?? "none";
}

/**
 * Deep-freezes a role so that the same object can be shared by every
 * concurrent reader of a registry snapshot.
 */
export function freezeRole(role: Role): Role {
  return Object.freeze({
    ...role,
    grants: Object.freeze(role.grants.map((grant) => Object.freeze({ ...grant }))),
  });
}

function sameGrant(a: RoleGrant, b: RoleGrant): boolean {
  return (
    a.modelType === b.modelType &&
    a.fieldName === b.fieldName &&
    a.level === b.level &&
    a.ownedLevel === b.ownedLevel
  );
}

/** Structural equality of two role records, grants compared in order. */
export function sameRole(a: Role, b: Role): boolean {
  return (
    a.id === b.id &&
    a.instanceId === b.instanceId &&
    a.name === b.name &&
    a.isDefault === b.isDefault &&
    a.grants.length === b.grants.length &&
    a.grants.every((grant, i) => sameGrant(grant, b.grants[i]))
  );
}

/** Id prefix of the synthetic zero-grant role. */
export const IMPLICIT_ROLE_PREFIX = "implicit:";

/**
 * The role used when a user has no assignment and the instance has no
 * default role. It grants nothing; checks against it return "denied".
 */
export function zeroGrantRole(instanceId: string): Role {
  return freezeRole({
    id: `${IMPLICIT_ROLE_PREFIX}${instanceId}`,
    instanceId,
    name: "No permissions",
    isDefault: false,
    grants: [],
  });
}

/** Id prefix of the role derived for anonymous visitors. */
export const ANONYMOUS_ROLE_PREFIX = "anonymous:";

/**
 * The role anonymous visitors get: the instance's default role with every
 * level clamped to read and owner escalation removed (nobody anonymous
 * owns anything).
 */
export function anonymousRole(defaultRole: Role): Role {
  return freezeRole({
    id: `${ANONYMOUS_ROLE_PREFIX}${defaultRole.id}`,
    instanceId: defaultRole.instanceId,
    name: `${defaultRole.name} (anonymous)`,
    isDefault: false,
    grants: defaultRole.grants.map((grant) => ({
      modelType: grant.modelType,
      fieldName: grant.fieldName,
      level: minLevel(grant.level, "read"),
    })),
  });
}

/**
 * True when `user` owns `object`. For an object being created the owner is
 * not set yet; the requester becomes the owner, so it counts as theirs.
 * Anonymous users own nothing.
 */
export function ownsObject(user: User, object: AuthorizableObject, creating: boolean): boolean {
  if (user.kind !== "user") return false;
  if (object.ownerId === user.id) return true;
  return creating && (object.ownerId === undefined || object.ownerId === null);
}
