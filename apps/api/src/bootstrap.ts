/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Register the domain's models with the platform
 *   2. Initialize the auth provider
 *   3. Open the role store (in memory, or Postgres with migrations)
 *   4. Create the role registry and administration
 *   5. Subscribe the registry to role events, then the domain subscribers
 */

import {
  RoleAdministration,
  RoleRegistry,
  InMemoryRoleStore,
  PostgresRoleStore,
  clearModelRegistry,
  createLogger,
  getAllModels,
  initAuthProvider,
  initDatabase,
  loadConfig,
  publish,
  registerModels,
  runMigrations,
  subscribe,
  subscribeAll,
  type AppConfig,
  type RoleStore,
} from "@arbor/platform";
import { models, eventSubscribers } from "@arbor/domain";

const logger = createLogger("bootstrap");

export interface AppContext {
  config: AppConfig;
  store: RoleStore;
  registry: RoleRegistry;
  admin: RoleAdministration;
}

export interface BootstrapOptions {
  config?: AppConfig;
  /** Overrides the configured store (tests) */
  store?: RoleStore;
}

async function openStore(config: AppConfig): Promise<RoleStore> {
  if (config.roleStore === "memory") {
    return new InMemoryRoleStore();
  }
  const { db } = initDatabase(config);
  await runMigrations();
  return new PostgresRoleStore(db);
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<AppContext> {
  // 0. Load configuration from environment
  const config = options.config ?? loadConfig();

  // 1. Register domain models (re-running bootstrap replaces them)
  clearModelRegistry();
  registerModels(models);

  // 2. Initialize authentication provider
  initAuthProvider(config);

  // 3. Open role storage
  const store = options.store ?? (await openStore(config));

  // 4. Registry reads, administration writes
  const registry = new RoleRegistry(store, { cacheTtlMs: config.registry.cacheTtlMs });
  const admin = new RoleAdministration(store, publish);

  // 5. Every persisted change refreshes the affected instance's snapshot
  subscribe({
    eventType: "*",
    name: "RefreshRoleSnapshot",
    async handler(event) {
      await registry.refresh(event.instanceId);
    },
  });
  subscribeAll(eventSubscribers);

  logger.info("Bootstrapped", {
    roleStore: config.roleStore,
    models: getAllModels().map((m) => m.name),
    subscribers: eventSubscribers.length + 1,
  });

  return { config, store, registry, admin };
}
