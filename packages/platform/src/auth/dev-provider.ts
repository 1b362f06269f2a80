/**
 * Development Auth Provider
 *
 * A no-op auth provider for local development when no external auth
 * service is configured. Any token is accepted.
 *
 * NEVER use this in production — it bypasses all authentication.
 *
 * Tokens of the form `dev:<userId>` act as that user, which makes it
 * possible to try tier gating locally with several accounts. Every other
 * token (or none) is the default dev user. DEV_ROLES sets the roles of
 * all dev callers, e.g. "admin,superadmin".
 */

import type { AuthProvider, AuthResult } from "@tierline/contracts";
import { TENANT_ADMIN_ROLE } from "@tierline/contracts";

/** Tenant used by DevAuthProvider and the seed script so dev data is visible. */
export const DEV_TENANT_ID = "00000000-0000-0000-0000-000000000001";

export const DEV_USER_ID = "dev-user";

const USER_TOKEN_PREFIX = "dev:";

export function parseDevRoles(raw: string | undefined): string[] {
  const roles = (raw ?? "")
    .split(",")
    .map((role) => role.trim())
    .filter((role) => role.length > 0);
  return roles.length > 0 ? roles : [TENANT_ADMIN_ROLE];
}

export class DevAuthProvider implements AuthProvider {
  private readonly roles: string[];

  constructor(options: { roles?: string[] } = {}) {
    this.roles = options.roles ?? [TENANT_ADMIN_ROLE];
  }

  async verifyToken(token: string): Promise<AuthResult> {
    const named = token.startsWith(USER_TOKEN_PREFIX) ? token.slice(USER_TOKEN_PREFIX.length) : "";
    return {
      userId: named || DEV_USER_ID,
      tenantId: DEV_TENANT_ID,
      roles: [...this.roles],
      type: "human",
    };
  }

  getPublicConfig(): Record<string, string> {
    return {
      provider: "dev",
      message: "Development mode — authentication is bypassed",
    };
  }
}
