/**
 * Application Configuration
 *
 * Loads configuration from environment variables with sensible defaults.
 * All config is validated at startup: fail fast if misconfigured.
 */

export type RoleStoreKind = "memory" | "postgres";

export interface AppConfig {
  roleStore: RoleStoreKind;
  database: {
    /** Required when roleStore is "postgres" */
    url: string | null;
  };
  api: {
    port: number;
    host: string;
  };
  registry: {
    /** How long a cached role snapshot is trusted; 0 disables expiry */
    cacheTtlMs: number;
  };
  /** User ids the development auth provider marks as super admins */
  superAdminUserIds: string[];
}

function parseNonNegativeInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}".`);
  }
  return value;
}

/**
 * Loads configuration from the given environment (process.env by default).
 * Throws immediately if a variable is missing or malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const storeRaw = env.ROLE_STORE ?? (env.NODE_ENV === "production" ? "postgres" : "memory");
  if (storeRaw !== "memory" && storeRaw !== "postgres") {
    throw new Error(`ROLE_STORE must be "memory" or "postgres", got "${storeRaw}".`);
  }

  const databaseUrl = env.DATABASE_URL ?? null;
  if (storeRaw === "postgres" && !databaseUrl) {
    throw new Error(
      "DATABASE_URL environment variable is required when ROLE_STORE=postgres. See .env.example."
    );
  }

  return {
    roleStore: storeRaw,
    database: {
      url: databaseUrl,
    },
    api: {
      port: parseNonNegativeInt("API_PORT", env.API_PORT, 4000),
      host: env.API_HOST ?? "0.0.0.0",
    },
    registry: {
      cacheTtlMs: parseNonNegativeInt("ROLE_CACHE_TTL_MS", env.ROLE_CACHE_TTL_MS, 60_000),
    },
    superAdminUserIds: (env.SUPER_ADMIN_USER_IDS ?? "")
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0),
  };
}
