/**
 * Roles, Grants and Assignments
 *
 * A Role is a named bundle of grants scoped to one instance. Two instances
 * may both have an "Editor" role; they are unrelated records.
 *
 * Grants are data, never rules: each one says "this role has level X on
 * model M" (or on field F of model M). There is no expression language.
 */

import { z } from "zod";
import { PERMISSION_LEVELS, type PermissionLevel } from "./permission.js";

/**
 * What a role may do to one model, or to one field of a model.
 *
 * A field grant can never exceed the model grant of the same role;
 * resolvers clamp, and the write path rejects contradictory sets.
 */
export interface RoleGrant {
  /** Model name, PascalCase (e.g., "Plot") */
  modelType: string;

  /** Absent for a model-level grant */
  fieldName?: string;

  level: PermissionLevel;

  /**
   * Owner-scoped escalation for model-level grants.
   * When set, the role gets this level on objects the requesting user owns,
   * for models that support ownership. Never lowers `level`.
   */
  ownedLevel?: PermissionLevel;
}

export interface Role {
  id: string;
  instanceId: string;
  name: string;
  /** At most one default role per instance; applies to users with no assignment */
  isDefault: boolean;
  /** Ordered as stored */
  grants: readonly RoleGrant[];
}

/** Binds one user to one role within one instance. */
export interface Assignment {
  userId: string;
  instanceId: string;
  roleId: string;
}

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const permissionLevelSchema = z.enum(PERMISSION_LEVELS);

export const roleGrantSchema = z
  .object({
    modelType: z.string().regex(/^[A-Z]\w*$/, "Model types are PascalCase"),
    fieldName: z.string().min(1).optional(),
    level: permissionLevelSchema,
    ownedLevel: permissionLevelSchema.optional(),
  })
  .refine((grant) => grant.fieldName === undefined || grant.ownedLevel === undefined, {
    message: "Owner-scoped levels apply to model-level grants only",
    path: ["ownedLevel"],
  });

export const roleSchema = z.object({
  id: z.string().min(1),
  instanceId: z.string().min(1),
  name: z.string().min(1).max(100),
  isDefault: z.boolean().default(false),
  grants: z.array(roleGrantSchema).default([]),
});

export const assignmentSchema = z.object({
  userId: z.string().min(1),
  instanceId: z.string().min(1),
  roleId: z.string().min(1),
});

/** Input accepted when an administrator creates a role. */
export const newRoleSchema = z.object({
  name: z.string().min(1).max(100),
  isDefault: z.boolean().optional(),
  grants: z.array(roleGrantSchema).optional(),
});

export type NewRole = z.infer<typeof newRoleSchema>;

/** Identity of a grant within a role: one model-level, one per field. */
export function grantKey(modelType: string, fieldName?: string): string {
  return fieldName === undefined ? modelType : `${modelType}.${fieldName}`;
}
