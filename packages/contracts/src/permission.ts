/**
 * Caller Kinds and Roles
 *
 * Who can reach the entitlement core. Role strings are the only link
 * between the auth provider's claims and the platform's access rules.
 */

/** The type of caller invoking an operation */
export type CallerType = "human" | "ai-agent" | "system" | "webhook";

/**
 * Platform super-administrator. Bypasses every feature and credit check;
 * evaluated once, before any other rule.
 */
export const SUPERADMIN_ROLE = "superadmin";

/** Tenant administrator: manages license seats inside their own tenant. */
export const TENANT_ADMIN_ROLE = "admin";
