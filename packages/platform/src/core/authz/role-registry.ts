/**
 * Role Registry
 *
 * Loads and caches the roles of each instance. It is the only place role
 * data is read from storage; everything downstream decides in memory.
 *
 * Cache discipline:
 *   - One immutable snapshot per instance (instance, frozen roles,
 *     assignments, derived fallback roles)
 *   - Concurrent first loads of one instance share a single store read
 *   - refresh() builds a new snapshot and swaps it in with one Map.set,
 *     so readers see either the old snapshot or the new one, never a mix
 *   - invalidate() drops the snapshot; a load that began before the
 *     invalidation still answers its waiters but is not installed
 *   - Snapshots older than cacheTtlMs are reloaded on next access
 *   - A urlName resolves through the cache only while the instance's
 *     current, unexpired snapshot still carries that name
 *
 * Repeated calls with identical arguments return the same Role object for
 * as long as the stored role is unchanged: a reload reuses the role objects
 * of the last installed snapshot that are structurally equal, so callers
 * may compare roles by reference.
 */

import type { Assignment, Instance, Role, User } from "@arbor/contracts";
import { assignmentSchema, instanceSchema, roleSchema } from "@arbor/contracts";
import type { z } from "zod";
import {
  type InstanceRef,
  type RoleStore,
  describeInstanceRef,
  isUrlNameRef,
} from "./role-store.js";
import { anonymousRole, freezeRole, sameRole, zeroGrantRole } from "./role.js";
import { assertGrantInvariants } from "./grant-validation.js";
import {
  ConfigurationInvariantViolation,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("role-registry");

export interface RoleSnapshot {
  readonly instance: Instance;
  readonly roles: readonly Role[];
  /** The instance's default role, if it defines one */
  readonly defaultRole: Role | null;
  /** Default role, or the zero-grant role when there is none */
  readonly fallbackRole: Role;
  /** What anonymous visitors resolve to */
  readonly anonymousRole: Role;
  /** userId → assigned role */
  readonly assigned: ReadonlyMap<string, Role>;
  readonly loadedAt: number;
}

export interface RoleRegistryOptions {
  /** 0 disables time-based expiry */
  cacheTtlMs?: number;
  /** Clock, injectable for tests */
  now?: () => number;
}

function parseRecord<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, label: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      `Malformed ${label} record in role storage`,
      result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      }))
    );
  }
  return result.data;
}

export class RoleRegistry {
  private readonly store: RoleStore;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;

  private readonly snapshots = new Map<string, RoleSnapshot>();
  private readonly loading = new Map<string, Promise<RoleSnapshot>>();
  private readonly generations = new Map<string, number>();
  /** lower-cased urlName → instance id */
  private readonly urlNames = new Map<string, string>();
  /** Last installed snapshot per instance, kept across invalidation for role reuse */
  private readonly retained = new Map<string, RoleSnapshot>();

  constructor(store: RoleStore, options: RoleRegistryOptions = {}) {
    this.store = store;
    this.cacheTtlMs = options.cacheTtlMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /**
   * @throws NotFoundError when the instance does not exist
   */
  async instanceFor(ref: InstanceRef): Promise<Instance> {
    return (await this.snapshotFor(ref)).instance;
  }

  /** All roles of the instance, in storage order. */
  async rolesFor(ref: InstanceRef): Promise<readonly Role[]> {
    return (await this.snapshotFor(ref)).roles;
  }

  /**
   * The single role that applies to `user` in the instance:
   * the assigned role, else the default role, else a zero-grant role.
   * Anonymous visitors get the read-only view of the default role.
   *
   * @throws NotFoundError only when the instance does not exist
   */
  async roleFor(user: User, ref: InstanceRef): Promise<Role> {
    return roleInSnapshot(await this.snapshotFor(ref), user);
  }

  /**
   * The current snapshot for an instance, loading it if needed.
   */
  async snapshotFor(ref: InstanceRef): Promise<RoleSnapshot> {
    const instanceId = await this.resolveInstanceId(ref);
    const cached = this.snapshots.get(instanceId);
    if (cached && !this.isExpired(cached)) {
      return cached;
    }
    return this.loadShared(instanceId);
  }

  // -------------------------------------------------------------------------
  // Cache control
  // -------------------------------------------------------------------------

  /**
   * Reloads an instance and swaps the new snapshot in.
   * Readers keep the old snapshot until the swap.
   */
  async refresh(instanceId: string): Promise<void> {
    const generation = this.bumpGeneration(instanceId);
    try {
      const snapshot = await this.load(instanceId);
      if (this.generations.get(instanceId) === generation) {
        this.install(snapshot);
      }
    } catch (error) {
      if (error instanceof NotFoundError) {
        this.forget(instanceId);
        this.retained.delete(instanceId);
        return;
      }
      throw error;
    }
  }

  /** Drops the cached snapshot; the next access reloads. */
  invalidate(instanceId: string): void {
    this.bumpGeneration(instanceId);
    this.forget(instanceId);
  }

  /** Drops every snapshot. Role objects are no longer reused afterwards. */
  clear(): void {
    for (const instanceId of [...this.snapshots.keys(), ...this.loading.keys()]) {
      this.invalidate(instanceId);
    }
    this.urlNames.clear();
    this.retained.clear();
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async resolveInstanceId(ref: InstanceRef): Promise<string> {
    if (!isUrlNameRef(ref)) return ref;

    const key = ref.urlName.toLowerCase();
    const known = this.urlNames.get(key);
    if (known) {
      const cached = this.snapshots.get(known);
      if (cached && !this.isExpired(cached) && cached.instance.urlName.toLowerCase() === key) {
        return known;
      }
      this.urlNames.delete(key);
    }

    const instance = await this.store.findInstance(ref);
    if (!instance) {
      throw new NotFoundError("Instance", describeInstanceRef(ref));
    }
    return instance.id;
  }

  private isExpired(snapshot: RoleSnapshot): boolean {
    return this.cacheTtlMs > 0 && this.now() - snapshot.loadedAt >= this.cacheTtlMs;
  }

  private bumpGeneration(instanceId: string): number {
    const next = (this.generations.get(instanceId) ?? 0) + 1;
    this.generations.set(instanceId, next);
    return next;
  }

  private forget(instanceId: string): void {
    this.snapshots.delete(instanceId);
    this.loading.delete(instanceId);
    this.unmapUrlNames(instanceId);
  }

  private unmapUrlNames(instanceId: string): void {
    for (const [urlName, id] of this.urlNames) {
      if (id === instanceId) this.urlNames.delete(urlName);
    }
  }

  private install(snapshot: RoleSnapshot): void {
    const instanceId = snapshot.instance.id;
    this.snapshots.set(instanceId, snapshot);
    this.retained.set(instanceId, snapshot);
    this.unmapUrlNames(instanceId);
    this.urlNames.set(snapshot.instance.urlName.toLowerCase(), instanceId);
  }

  /** Coalesces concurrent loads of one instance into one store read. */
  private loadShared(instanceId: string): Promise<RoleSnapshot> {
    const inFlight = this.loading.get(instanceId);
    if (inFlight) return inFlight;

    const generation = this.generations.get(instanceId) ?? 0;
    const promise = this.load(instanceId)
      .then((snapshot) => {
        if ((this.generations.get(instanceId) ?? 0) === generation) {
          this.install(snapshot);
        }
        return snapshot;
      })
      .finally(() => {
        if (this.loading.get(instanceId) === promise) {
          this.loading.delete(instanceId);
        }
      });

    this.loading.set(instanceId, promise);
    return promise;
  }

  private async load(instanceId: string): Promise<RoleSnapshot> {
    const rawInstance = await this.store.findInstance(instanceId);
    if (!rawInstance) {
      throw new NotFoundError("Instance", instanceId);
    }
    const instance = deepFreezeInstance(parseRecord(instanceSchema, rawInstance, "instance"));
    const data = await this.store.loadInstanceRoles(instanceId);
    const previous = this.retained.get(instanceId);

    const roles = data.roles.map((raw) => {
      const role = parseRecord(roleSchema, raw, "role");
      if (role.instanceId !== instanceId) {
        throw new ConfigurationInvariantViolation(
          `Role "${role.id}" belongs to instance "${role.instanceId}", not "${instanceId}"`
        );
      }
      assertGrantInvariants(role.grants, { requireKnownModels: false });
      const unchanged = previous?.roles.find((old) => sameRole(old, role));
      return unchanged ?? freezeRole(role);
    });

    const defaults = roles.filter((role) => role.isDefault);
    if (defaults.length > 1) {
      throw new ConfigurationInvariantViolation(
        `Instance "${instanceId}" has ${defaults.length} default roles`,
        { role: defaults.map((role) => `Role "${role.id}" is marked default`) }
      );
    }
    const defaultRole = defaults[0] ?? null;

    const rolesById = new Map(roles.map((role) => [role.id, role]));
    const assigned = new Map<string, Role>();
    for (const raw of data.assignments) {
      const assignment: Assignment = parseRecord(assignmentSchema, raw, "assignment");
      const role = rolesById.get(assignment.roleId);
      if (!role) {
        logger.warn("Assignment references a role outside this instance; ignoring", {
          instanceId,
          userId: assignment.userId,
          roleId: assignment.roleId,
        });
        continue;
      }
      assigned.set(assignment.userId, role);
    }

    logger.debug("Loaded role snapshot", {
      instanceId,
      roles: roles.length,
      assignments: assigned.size,
    });

    // Derived roles depend only on the default role, which is reused by identity
    const derived =
      previous && previous.defaultRole === defaultRole
        ? { fallbackRole: previous.fallbackRole, anonymousRole: previous.anonymousRole }
        : {
            fallbackRole: defaultRole ?? zeroGrantRole(instanceId),
            anonymousRole: defaultRole ? anonymousRole(defaultRole) : zeroGrantRole(instanceId),
          };

    return Object.freeze({
      instance,
      roles: Object.freeze(roles),
      defaultRole,
      ...derived,
      assigned,
      loadedAt: this.now(),
    });
  }
}

/** Role resolution within one snapshot. */
export function roleInSnapshot(snapshot: RoleSnapshot, user: User): Role {
  if (user.kind === "anonymous") {
    return snapshot.anonymousRole;
  }
  return snapshot.assigned.get(user.id) ?? snapshot.fallbackRole;
}

/** Freezes a freshly parsed instance in place. */
function deepFreezeInstance(instance: Instance): Instance {
  Object.freeze(instance.features);
  instance.userDefinedFields.forEach((udf) => Object.freeze(udf));
  Object.freeze(instance.userDefinedFields);
  return Object.freeze(instance);
}
