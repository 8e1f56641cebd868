/**
 * Role Administration
 *
 * The only write path for instances, roles, grants, assignments and the
 * default role. Every change is validated before it is persisted, then
 * announced as a domain event so the RoleRegistry can refresh.
 *
 * Rejections:
 *   NotFoundError                    instance or role does not exist
 *   ValidationError                  malformed input
 *   ConfigurationInvariantViolation  the change would contradict the data
 *                                    model (see grant-validation.ts)
 */

import { randomUUID } from "node:crypto";
import type { Assignment, DomainEvent, Instance, Role, RoleGrant } from "@arbor/contracts";
import { grantKey, instanceSchema, newRoleSchema } from "@arbor/contracts";
import type { z } from "zod";
import type { RoleStore } from "./role-store.js";
import { assertGrantInvariants, parseGrants } from "./grant-validation.js";
import { toFieldErrors } from "../models/identifiers.js";
import {
  ConfigurationInvariantViolation,
  NotFoundError,
  ValidationError,
} from "../errors.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("role-admin");

export type EmitFn = (event: DomainEvent) => Promise<void>;

export interface RoleAdministrationOptions {
  /** Defaults to random UUIDs */
  generateId?: () => string;
}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;

  const problems: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const key = issue.path.join(".") || what;
    problems[key] = [...(problems[key] ?? []), issue.message];
  }
  throw new ValidationError(`Invalid ${what}`, toFieldErrors(problems, "invalid_input"));
}

export class RoleAdministration {
  private readonly store: RoleStore;
  private readonly emit: EmitFn;
  private readonly generateId: () => string;

  constructor(store: RoleStore, emit: EmitFn, options: RoleAdministrationOptions = {}) {
    this.store = store;
    this.emit = emit;
    this.generateId = options.generateId ?? randomUUID;
  }

  // -------------------------------------------------------------------------
  // Instances
  // -------------------------------------------------------------------------

  /** Creates or replaces an instance. URL names stay unique, ignoring case. */
  async saveInstance(input: unknown): Promise<Instance> {
    const instance = parseInput(instanceSchema, input, "instance");

    const clash = await this.store.findInstance({ urlName: instance.urlName });
    if (clash && clash.id !== instance.id) {
      throw new ConfigurationInvariantViolation(
        `URL name "${instance.urlName}" is already used by instance "${clash.id}"`,
        { urlName: ["Already in use"] }
      );
    }

    await this.store.saveInstance(instance);
    await this.emit({ type: "instance.updated", instanceId: instance.id, payload: {} });
    return instance;
  }

  // -------------------------------------------------------------------------
  // Roles
  // -------------------------------------------------------------------------

  async createRole(instanceId: string, input: unknown): Promise<Role> {
    const parsed = parseInput(newRoleSchema, input, "role");
    const instance = await this.requireInstance(instanceId);

    const { roles } = await this.store.loadInstanceRoles(instanceId);
    if (roles.some((role) => role.name.toLowerCase() === parsed.name.toLowerCase())) {
      throw new ConfigurationInvariantViolation(
        `Instance "${instanceId}" already has a role named "${parsed.name}"`,
        { name: ["Already in use"] }
      );
    }

    const grants = parsed.grants ?? [];
    assertGrantInvariants(grants, { requireKnownModels: true, instance });

    const role: Role = {
      id: this.generateId(),
      instanceId,
      name: parsed.name,
      isDefault: false,
      grants,
    };
    await this.store.saveRole(role);
    if (parsed.isDefault) {
      await this.store.setDefaultRole(instanceId, role.id);
      role.isDefault = true;
    }

    logger.info("Role created", { instanceId, roleId: role.id, name: role.name });
    await this.emit({ type: "role.created", instanceId, payload: { roleId: role.id } });
    return role;
  }

  /** Adds a grant, replacing any grant for the same model or field. */
  async addGrant(roleId: string, input: unknown): Promise<Role> {
    const role = await this.requireRole(roleId);
    const [grant] = parseGrants([input]);
    const key = grantKey(grant.modelType, grant.fieldName);

    const grants = role.grants.filter((g) => grantKey(g.modelType, g.fieldName) !== key);
    grants.push(grant);
    return this.replaceGrants(role, grants);
  }

  /**
   * Removes one grant. Removing a model grant that still has field grants
   * above "none" is rejected.
   */
  async removeGrant(roleId: string, modelType: string, fieldName?: string): Promise<Role> {
    const role = await this.requireRole(roleId);
    const key = grantKey(modelType, fieldName);

    const grants = role.grants.filter((g) => grantKey(g.modelType, g.fieldName) !== key);
    if (grants.length === role.grants.length) {
      throw new NotFoundError("Grant", `${roleId}/${key}`);
    }
    return this.replaceGrants(role, grants);
  }

  /** Makes the role the instance's only default; null leaves it with none. */
  async setDefaultRole(instanceId: string, roleId: string | null): Promise<void> {
    await this.requireInstance(instanceId);
    if (roleId !== null) {
      const role = await this.requireRole(roleId);
      this.requireSameInstance(role, instanceId);
    }

    await this.store.setDefaultRole(instanceId, roleId);
    await this.emit({ type: "role.updated", instanceId, payload: { defaultRoleId: roleId } });
  }

  /** Deletes a role. Rejected while any assignment references it. */
  async deleteRole(roleId: string): Promise<void> {
    const role = await this.requireRole(roleId);
    const assigned = await this.store.countAssignments(roleId);
    if (assigned > 0) {
      throw new ConfigurationInvariantViolation(
        `Role "${role.name}" is assigned to ${assigned} user(s)`,
        { role: ["Reassign its users before deleting it"] }
      );
    }

    await this.store.deleteRole(roleId);
    logger.info("Role deleted", { instanceId: role.instanceId, roleId });
    await this.emit({ type: "role.deleted", instanceId: role.instanceId, payload: { roleId } });
  }

  // -------------------------------------------------------------------------
  // Assignments
  // -------------------------------------------------------------------------

  /** Assigns the role to the user in its instance, replacing any earlier assignment. */
  async assignRole(userId: string, instanceId: string, roleId: string): Promise<Assignment> {
    if (userId.length === 0) {
      throw new ValidationError("Invalid assignment", [
        { field: "userId", message: "Required", code: "invalid_input" },
      ]);
    }
    const role = await this.requireRole(roleId);
    this.requireSameInstance(role, instanceId);

    const assignment: Assignment = { userId, instanceId, roleId };
    await this.store.saveAssignment(assignment);
    await this.emit({ type: "assignment.changed", instanceId, payload: { userId, roleId } });
    return assignment;
  }

  /** Removes the user's assignment; they fall back to the default role. */
  async unassign(userId: string, instanceId: string): Promise<void> {
    await this.store.deleteAssignment(userId, instanceId);
    await this.emit({ type: "assignment.changed", instanceId, payload: { userId, roleId: null } });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async replaceGrants(role: Role, grants: RoleGrant[]): Promise<Role> {
    const instance = await this.requireInstance(role.instanceId);
    assertGrantInvariants(grants, { requireKnownModels: true, instance });
    const updated: Role = { ...role, grants };
    await this.store.saveRole(updated);
    await this.emit({
      type: "role.updated",
      instanceId: role.instanceId,
      payload: { roleId: role.id },
    });
    return updated;
  }

  private async requireInstance(instanceId: string): Promise<Instance> {
    const instance = await this.store.findInstance(instanceId);
    if (!instance) throw new NotFoundError("Instance", instanceId);
    return instance;
  }

  private async requireRole(roleId: string): Promise<Role> {
    const role = await this.store.findRole(roleId);
    if (!role) throw new NotFoundError("Role", roleId);
    return role;
  }

  private requireSameInstance(role: Role, instanceId: string): void {
    if (role.instanceId !== instanceId) {
      throw new ConfigurationInvariantViolation(
        `Role "${role.id}" belongs to instance "${role.instanceId}", not "${instanceId}"`,
        { role: ["Belongs to a different instance"] }
      );
    }
  }
}
