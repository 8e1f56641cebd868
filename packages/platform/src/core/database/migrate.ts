/**
 * Migration Runner
 *
 * Creates the role storage tables (see schema.ts). Idempotent: each table
 * is created only when it does not exist yet; existing tables are never
 * altered or dropped.
 */

import type postgres from "postgres";
import { getDatabase } from "./connection.js";
import { createLogger } from "../logging/index.js";

const logger = createLogger("migrate");

export interface TableMigration {
  table: string;
  statements: string[];
}

/** In dependency order: every table comes after the tables it references. */
export const ROLE_TABLE_MIGRATIONS: readonly TableMigration[] = [
  {
    table: "instances",
    statements: [
      `CREATE TABLE instances (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        url_name TEXT NOT NULL,
        features JSONB NOT NULL DEFAULT '[]'::jsonb,
        user_defined_fields JSONB NOT NULL DEFAULT '[]'::jsonb,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE UNIQUE INDEX idx_instances_url_name ON instances (LOWER(url_name))`,
    ],
  },
  {
    table: "roles",
    statements: [
      `CREATE TABLE roles (
        id TEXT PRIMARY KEY,
        instance_id TEXT NOT NULL REFERENCES instances(id) ON DELETE CASCADE,
        name TEXT NOT NULL,
        is_default BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      `CREATE UNIQUE INDEX idx_roles_name ON roles (instance_id, LOWER(name))`,
      `CREATE UNIQUE INDEX idx_roles_default ON roles (instance_id) WHERE is_default`,
    ],
  },
  {
    table: "role_grants",
    statements: [
      `CREATE TABLE role_grants (
        role_id TEXT NOT NULL REFERENCES roles(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        model_type TEXT NOT NULL,
        field_name TEXT,
        level TEXT NOT NULL CHECK (level IN ('none', 'read', 'write')),
        owned_level TEXT CHECK (owned_level IN ('none', 'read', 'write')),
        PRIMARY KEY (role_id, position)
      )`,
    ],
  },
  {
    table: "role_assignments",
    statements: [
      `CREATE TABLE role_assignments (
        user_id TEXT NOT NULL,
        instance_id TEXT NOT NULL REFERENCES instances(id) ON DELETE CASCADE,
        role_id TEXT NOT NULL REFERENCES roles(id),
        PRIMARY KEY (user_id, instance_id)
      )`,
      `CREATE INDEX idx_role_assignments_role ON role_assignments (role_id)`,
    ],
  },
];

async function tableExists(pgSql: postgres.Sql, tableName: string): Promise<boolean> {
  const rows = await pgSql.unsafe(
    `SELECT 1 FROM information_schema.tables WHERE table_schema = 'public' AND table_name = $1 LIMIT 1`,
    [tableName]
  );
  return rows.length > 0;
}

/**
 * Creates any missing role storage table.
 * Requires initDatabase() to have been called.
 */
export async function runMigrations(): Promise<void> {
  const { sql: pgSql } = getDatabase();

  for (const migration of ROLE_TABLE_MIGRATIONS) {
    if (await tableExists(pgSql, migration.table)) continue;

    await pgSql.begin(async (tx) => {
      for (const statement of migration.statements) {
        await tx.unsafe(statement);
      }
    });
    logger.info("Created table", { table: migration.table });
  }
}
