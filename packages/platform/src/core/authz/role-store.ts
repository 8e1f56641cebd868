/**
 * Role Store
 *
 * The storage port for instances, roles, grants and assignments.
 * The RoleRegistry is its only reader on the decision path; RoleAdministration
 * is its only writer. Implementations: InMemoryRoleStore (development and
 * tests) and PostgresRoleStore.
 */

import type { Assignment, Instance, Role } from "@arbor/contracts";

/** An instance by id, or by its URL name (case-insensitive). */
export type InstanceRef = string | { urlName: string };

/** Everything the registry needs to answer questions about one instance. */
export interface InstanceRoleData {
  roles: Role[];
  assignments: Assignment[];
}

export interface RoleStore {
  findInstance(ref: InstanceRef): Promise<Instance | null>;
  loadInstanceRoles(instanceId: string): Promise<InstanceRoleData>;

  saveInstance(instance: Instance): Promise<void>;

  findRole(roleId: string): Promise<Role | null>;
  /** Inserts or replaces the role together with its full grant list */
  saveRole(role: Role): Promise<void>;
  deleteRole(roleId: string): Promise<void>;
  /** Makes `roleId` the only default role of the instance; null clears it */
  setDefaultRole(instanceId: string, roleId: string | null): Promise<void>;

  countAssignments(roleId: string): Promise<number>;
  /** Inserts or replaces the assignment for (userId, instanceId) */
  saveAssignment(assignment: Assignment): Promise<void>;
  deleteAssignment(userId: string, instanceId: string): Promise<void>;

  close(): Promise<void>;
}

export function isUrlNameRef(ref: InstanceRef): ref is { urlName: string } {
  return typeof ref !== "string";
}

export function describeInstanceRef(ref: InstanceRef): string {
  return isUrlNameRef(ref) ? ref.urlName : ref;
}

// ---------------------------------------------------------------------------
// In-memory implementation
// ---------------------------------------------------------------------------

function assignmentKey(userId: string, instanceId: string): string {
  return `${instanceId}\u0000${userId}`;
}

/**
 * Keeps every record in process memory. Records are copied on the way in
 * and out, so callers never share mutable state with the store.
 */
export class InMemoryRoleStore implements RoleStore {
  private readonly instances = new Map<string, Instance>();
  private readonly roles = new Map<string, Role>();
  private readonly assignments = new Map<string, Assignment>();

  async findInstance(ref: InstanceRef): Promise<Instance | null> {
    if (!isUrlNameRef(ref)) {
      const instance = this.instances.get(ref);
      return instance ? structuredClone(instance) : null;
    }
    const wanted = ref.urlName.toLowerCase();
    for (const instance of this.instances.values()) {
      if (instance.urlName.toLowerCase() === wanted) {
        return structuredClone(instance);
      }
    }
    return null;
  }

  async loadInstanceRoles(instanceId: string): Promise<InstanceRoleData> {
    return {
      roles: [...this.roles.values()]
        .filter((role) => role.instanceId === instanceId)
        .map((role) => structuredClone(role)),
      assignments: [...this.assignments.values()]
        .filter((a) => a.instanceId === instanceId)
        .map((a) => ({ ...a })),
    };
  }

  async saveInstance(instance: Instance): Promise<void> {
    this.instances.set(instance.id, structuredClone(instance));
  }

  async findRole(roleId: string): Promise<Role | null> {
    const role = this.roles.get(roleId);
    return role ? structuredClone(role) : null;
  }

  async saveRole(role: Role): Promise<void> {
    this.roles.set(role.id, structuredClone(role));
  }

  async deleteRole(roleId: string): Promise<void> {
    this.roles.delete(roleId);
  }

  async setDefaultRole(instanceId: string, roleId: string | null): Promise<void> {
    for (const [id, role] of this.roles) {
      if (role.instanceId !== instanceId) continue;
      this.roles.set(id, { ...role, isDefault: id === roleId });
    }
  }

  async countAssignments(roleId: string): Promise<number> {
    let count = 0;
    for (const assignment of this.assignments.values()) {
      if (assignment.roleId === roleId) count++;
    }
    return count;
  }

  async saveAssignment(assignment: Assignment): Promise<void> {
    this.assignments.set(assignmentKey(assignment.userId, assignment.instanceId), { ...assignment });
  }

  async deleteAssignment(userId: string, instanceId: string): Promise<void> {
    this.assignments.delete(assignmentKey(userId, instanceId));
  }

  async close(): Promise<void> {
    this.instances.clear();
    this.roles.clear();
    this.assignments.clear();
  }
}
