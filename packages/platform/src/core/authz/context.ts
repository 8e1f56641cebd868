/**
 * Permission Context Resolution
 *
 * Builds the (user, instance, role) triple once per request. Every check in
 * that request receives the same context, so they all see one role.
 */

import type { Instance, PermissionContext, Role, User } from "@arbor/contracts";
import { userIdOf } from "@arbor/contracts";
import type { InstanceRef } from "./role-store.js";
import { roleInSnapshot, type RoleRegistry } from "./role-registry.js";

/**
 * Constructs a context from parts the caller already holds.
 * The result is frozen.
 */
export function buildPermissionContext(
  user: User,
  instance: Instance,
  role: Role
): PermissionContext {
  if (role.instanceId !== instance.id) {
    throw new Error(
      `Role "${role.id}" belongs to instance "${role.instanceId}", not "${instance.id}"`
    );
  }
  return Object.freeze({ user, instance, role });
}

/**
 * Resolves the context for `user` in an instance.
 * Instance and role come from one registry snapshot.
 *
 * @throws NotFoundError when the instance does not exist
 */
export async function resolvePermissionContext(
  registry: RoleRegistry,
  user: User,
  ref: InstanceRef
): Promise<PermissionContext> {
  const snapshot = await registry.snapshotFor(ref);
  return buildPermissionContext(user, snapshot.instance, roleInSnapshot(snapshot, user));
}

/** Same user (or both anonymous), same instance, and the very same role object. */
export function contextsEquivalent(a: PermissionContext, b: PermissionContext): boolean {
  return (
    a.user.kind === b.user.kind &&
    userIdOf(a.user) === userIdOf(b.user) &&
    a.instance.id === b.instance.id &&
    a.role === b.role
  );
}
