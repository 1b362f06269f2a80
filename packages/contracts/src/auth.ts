/**
 * Authentication Contract
 *
 * Defines the AuthProvider interface — the abstraction that decouples
 * the entitlement core from any specific authentication implementation.
 * Session issuance happens elsewhere; the core only verifies tokens.
 *
 * Swapping auth providers requires:
 *   1. Implementing a new class that satisfies AuthProvider
 *   2. Changing the bootstrap code to inject the new provider
 *   3. No changes to middleware or route handlers
 */

import type { Caller } from "./context.js";

/**
 * The result of verifying an authentication token.
 * Either a valid Caller (authenticated) or null (invalid/expired token).
 */
export type AuthResult = Caller | null;

/**
 * The contract that every authentication provider must implement.
 *
 * @example
 * class SupabaseAuthProvider implements AuthProvider {
 *   async verifyToken(token: string): Promise<AuthResult> {
 *     // Verify JWT, extract userId, tenantId, roles from claims
 *   }
 *   getPublicConfig(): Record<string, string> {
 *     return { projectUrl: "https://project.supabase.co" };
 *   }
 * }
 */
export interface AuthProvider {
  /**
   * Verify an authentication token and extract caller identity.
   *
   * @param token - The raw token (typically a JWT from the Authorization header)
   * @returns The authenticated Caller, or null if the token is invalid/expired
   */
  verifyToken(token: string): Promise<AuthResult>;

  /**
   * Public configuration the frontend needs to initialize its auth client.
   * Served by a public endpoint — never include secrets.
   */
  getPublicConfig(): Record<string, string>;
}
