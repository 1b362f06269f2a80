/**
 * Caller Context
 *
 * The caller's identity and the structured logger, provided by the
 * platform to every entitlement operation.
 */

import type { CallerType } from "./permission.js";

/**
 * Identifies who or what is invoking an operation.
 * Built by the AuthProvider from a verified token.
 */
export interface Caller {
  /** Unique user identifier */
  userId: string;

  /** Tenant the caller belongs to */
  tenantId: string;

  /** Roles assigned to this caller */
  roles: string[];

  /** What kind of caller this is */
  type: CallerType;
}

/**
 * Structured logger.
 * Services receive one of these instead of writing to console directly.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}
