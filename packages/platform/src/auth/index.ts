/**
 * Auth Module
 *
 * Manages the active AuthProvider instance. The provider is set at
 * startup (in bootstrap) and used by the auth middleware to identify
 * the caller of every request.
 *
 * Provider selection:
 *   - Outside production → DevAuthProvider
 *   - In production → a provider must be installed with setAuthProvider()
 *     before initAuthProvider() runs, otherwise it throws (fail fast)
 */

import type { AuthProvider } from "@arbor/contracts";
import type { AppConfig } from "../core/config/index.js";
import { createLogger } from "../core/logging/index.js";
import { DevAuthProvider } from "./dev-provider.js";

const logger = createLogger("auth");

/** The singleton auth provider instance */
let authProvider: AuthProvider | null = null;

/**
 * Initialize the auth provider for the given configuration.
 * Call this once at startup (in bootstrap).
 */
export function initAuthProvider(
  config: Pick<AppConfig, "superAdminUserIds">,
  env: NodeJS.ProcessEnv = process.env
): AuthProvider {
  if (authProvider) return authProvider;

  if (env.NODE_ENV === "production") {
    throw new Error(
      "Authentication must be configured in production. " +
        "Install an AuthProvider with setAuthProvider() before startup."
    );
  }

  authProvider = new DevAuthProvider(config.superAdminUserIds);
  logger.info("Using development auth provider", {
    superAdmins: config.superAdminUserIds.length,
  });
  return authProvider;
}

/**
 * Get the active auth provider.
 * Throws if initAuthProvider() hasn't been called.
 */
export function getAuthProvider(): AuthProvider {
  if (!authProvider) {
    throw new Error(
      "Auth provider not initialized. Call initAuthProvider() in bootstrap."
    );
  }
  return authProvider;
}

/**
 * Set a custom auth provider (for testing or custom implementations).
 * Pass null to reset.
 */
export function setAuthProvider(provider: AuthProvider | null): void {
  authProvider = provider;
}

export { DevAuthProvider } from "./dev-provider.js";
