/**
 * Development Auth Provider
 *
 * Trusts the bearer token as the user id. No token means an anonymous
 * request; a token with characters a user id never has is rejected.
 *
 * NEVER use this in production: anyone can claim any user id.
 */

import type { AuthProvider, AuthResult } from "@arbor/contracts";
import { ANONYMOUS } from "@arbor/contracts";

const USER_ID_PATTERN = /^[\w.@-]{1,128}$/;

export class DevAuthProvider implements AuthProvider {
  private readonly superAdmins: ReadonlySet<string>;

  constructor(superAdminUserIds: readonly string[] = []) {
    this.superAdmins = new Set(superAdminUserIds);
  }

  async verifyToken(token: string): Promise<AuthResult> {
    const userId = token.trim();
    if (userId === "") return ANONYMOUS;
    if (!USER_ID_PATTERN.test(userId)) return null;

    return { kind: "user", id: userId, isSuperAdmin: this.superAdmins.has(userId) };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode: the bearer token is taken as the user id",
    };
  }
}
