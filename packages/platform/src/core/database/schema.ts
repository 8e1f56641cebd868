/**
 * Database Schema
 *
 * Drizzle table definitions for role storage. Column names are snake_case;
 * the store maps rows to the camelCase records in contracts.
 *
 * The DDL that creates these tables lives in migrate.ts.
 */

import {
  boolean,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import type { UserDefinedField } from "@arbor/contracts";

export const instances = pgTable("instances", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  urlName: text("url_name").notNull(),
  features: jsonb("features").$type<string[]>().notNull().default([]),
  userDefinedFields: jsonb("user_defined_fields").$type<UserDefinedField[]>().notNull().default([]),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export const roles = pgTable("roles", {
  id: text("id").primaryKey(),
  instanceId: text("instance_id")
    .notNull()
    .references(() => instances.id, { onDelete: "cascade" }),
  name: text("name").notNull(),
  isDefault: boolean("is_default").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

/** One row per grant; `position` keeps the role's grant order. */
export const roleGrants = pgTable(
  "role_grants",
  {
    roleId: text("role_id")
      .notNull()
      .references(() => roles.id, { onDelete: "cascade" }),
    position: integer("position").notNull(),
    modelType: text("model_type").notNull(),
    fieldName: text("field_name"),
    level: text("level").notNull(),
    ownedLevel: text("owned_level"),
  },
  (table) => [primaryKey({ columns: [table.roleId, table.position] })]
);

export const roleAssignments = pgTable(
  "role_assignments",
  {
    userId: text("user_id").notNull(),
    instanceId: text("instance_id")
      .notNull()
      .references(() => instances.id, { onDelete: "cascade" }),
    roleId: text("role_id")
      .notNull()
      .references(() => roles.id),
  },
  (table) => [primaryKey({ columns: [table.userId, table.instanceId] })]
);

export type InstanceRow = typeof instances.$inferSelect;
export type RoleRow = typeof roles.$inferSelect;
export type RoleGrantRow = typeof roleGrants.$inferSelect;
export type RoleAssignmentRow = typeof roleAssignments.$inferSelect;
