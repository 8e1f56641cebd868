/**
 * Postgres Role Store
 *
 * RoleStore over the tables in schema.ts. Grants are stored one row each
 * and rewritten as a whole with their role, inside one transaction.
 */

import { and, asc, eq, sql } from "drizzle-orm";
import type { Assignment, Instance, PermissionLevel, Role, RoleGrant } from "@arbor/contracts";
import { PERMISSION_LEVELS } from "@arbor/contracts";
import type { InstanceRef, InstanceRoleData, RoleStore } from "../authz/role-store.js";
import { isUrlNameRef } from "../authz/role-store.js";
import { ValidationError } from "../errors.js";
import { closeDatabase, type Database } from "./connection.js";
import {
  instances,
  roleAssignments,
  roleGrants,
  roles,
  type InstanceRow,
  type RoleAssignmentRow,
  type RoleGrantRow,
  type RoleRow,
} from "./schema.js";

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function toLevel(value: string, column: string): PermissionLevel {
  const level = PERMISSION_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new ValidationError(`Malformed permission level "${value}" in role_grants.${column}`);
  }
  return level;
}

export function rowToInstance(row: InstanceRow): Instance {
  return {
    id: row.id,
    name: row.name,
    urlName: row.urlName,
    features: row.features,
    userDefinedFields: row.userDefinedFields,
  };
}

export function rowToGrant(row: RoleGrantRow): RoleGrant {
  const grant: RoleGrant = { modelType: row.modelType, level: toLevel(row.level, "level") };
  if (row.fieldName !== null) grant.fieldName = row.fieldName;
  if (row.ownedLevel !== null) grant.ownedLevel = toLevel(row.ownedLevel, "owned_level");
  return grant;
}

/** Grant rows may arrive in any order; `position` decides. */
export function rowsToRole(row: RoleRow, grantRows: RoleGrantRow[]): Role {
  return {
    id: row.id,
    instanceId: row.instanceId,
    name: row.name,
    isDefault: row.isDefault,
    grants: [...grantRows]
      .filter((grant) => grant.roleId === row.id)
      .sort((a, b) => a.position - b.position)
      .map(rowToGrant),
  };
}

export function grantToRow(roleId: string, grant: RoleGrant, position: number): RoleGrantRow {
  return {
    roleId,
    position,
    modelType: grant.modelType,
    fieldName: grant.fieldName ?? null,
    level: grant.level,
    ownedLevel: grant.ownedLevel ?? null,
  };
}

export function rowToAssignment(row: RoleAssignmentRow): Assignment {
  return { userId: row.userId, instanceId: row.instanceId, roleId: row.roleId };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class PostgresRoleStore implements RoleStore {
  private readonly db: Database;
  private readonly onClose: () => Promise<void>;

  constructor(db: Database, onClose: () => Promise<void> = closeDatabase) {
    this.db = db;
    this.onClose = onClose;
  }

  async findInstance(ref: InstanceRef): Promise<Instance | null> {
    const condition = isUrlNameRef(ref)
      ? sql`lower(${instances.urlName}) = lower(${ref.urlName})`
      : eq(instances.id, ref);
    const rows = await this.db.select().from(instances).where(condition).limit(1);
    return rows[0] ? rowToInstance(rows[0]) : null;
  }

  async loadInstanceRoles(instanceId: string): Promise<InstanceRoleData> {
    const roleRows = await this.db
      .select()
      .from(roles)
      .where(eq(roles.instanceId, instanceId))
      .orderBy(asc(roles.createdAt), asc(roles.id));

    const grantRows = await this.db
      .select()
      .from(roleGrants)
      .innerJoin(roles, eq(roleGrants.roleId, roles.id))
      .where(eq(roles.instanceId, instanceId));

    const assignmentRows = await this.db
      .select()
      .from(roleAssignments)
      .where(eq(roleAssignments.instanceId, instanceId));

    const grants = grantRows.map((row) => row.role_grants);
    return {
      roles: roleRows.map((row) => rowsToRole(row, grants)),
      assignments: assignmentRows.map(rowToAssignment),
    };
  }

  async saveInstance(instance: Instance): Promise<void> {
    const values = {
      id: instance.id,
      name: instance.name,
      urlName: instance.urlName,
      features: instance.features,
      userDefinedFields: instance.userDefinedFields,
    };
    await this.db
      .insert(instances)
      .values(values)
      .onConflictDoUpdate({
        target: instances.id,
        set: {
          name: values.name,
          urlName: values.urlName,
          features: values.features,
          userDefinedFields: values.userDefinedFields,
        },
      });
  }

  async findRole(roleId: string): Promise<Role | null> {
    const rows = await this.db.select().from(roles).where(eq(roles.id, roleId)).limit(1);
    if (!rows[0]) return null;
    const grantRows = await this.db.select().from(roleGrants).where(eq(roleGrants.roleId, roleId));
    return rowsToRole(rows[0], grantRows);
  }

  async saveRole(role: Role): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .insert(roles)
        .values({
          id: role.id,
          instanceId: role.instanceId,
          name: role.name,
          isDefault: role.isDefault,
        })
        .onConflictDoUpdate({
          target: roles.id,
          set: { name: role.name, isDefault: role.isDefault },
        });

      await tx.delete(roleGrants).where(eq(roleGrants.roleId, role.id));
      if (role.grants.length > 0) {
        await tx
          .insert(roleGrants)
          .values(role.grants.map((grant, i) => grantToRow(role.id, grant, i)));
      }
    });
  }

  async deleteRole(roleId: string): Promise<void> {
    await this.db.delete(roles).where(eq(roles.id, roleId));
  }

  async setDefaultRole(instanceId: string, roleId: string | null): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx.update(roles).set({ isDefault: false }).where(eq(roles.instanceId, instanceId));
      if (roleId !== null) {
        await tx
          .update(roles)
          .set({ isDefault: true })
          .where(and(eq(roles.id, roleId), eq(roles.instanceId, instanceId)));
      }
    });
  }

  async countAssignments(roleId: string): Promise<number> {
    const rows = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(roleAssignments)
      .where(eq(roleAssignments.roleId, roleId));
    return rows[0]?.count ?? 0;
  }

  async saveAssignment(assignment: Assignment): Promise<void> {
    await this.db
      .insert(roleAssignments)
      .values(assignment)
      .onConflictDoUpdate({
        target: [roleAssignments.userId, roleAssignments.instanceId],
        set: { roleId: assignment.roleId },
      });
  }

  async deleteAssignment(userId: string, instanceId: string): Promise<void> {
    await this.db
      .delete(roleAssignments)
      .where(and(eq(roleAssignments.userId, userId), eq(roleAssignments.instanceId, instanceId)));
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
