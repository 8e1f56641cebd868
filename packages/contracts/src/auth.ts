/**
 * Authentication Contract
 *
 * Decouples the HTTP boundary from any concrete identity service.
 * The provider only says who the caller is; what they may do is
 * decided by the authorization engine from the instance's roles.
 */

import type { User } from "./context.js";

/**
 * The result of verifying a token: a User (possibly anonymous),
 * or null when a token was presented but rejected.
 */
export type AuthResult = User | null;

export interface AuthProvider {
  /**
   * @param token - The raw bearer token; empty string when none was sent
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration for clients. Never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
