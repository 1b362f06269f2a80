/**
 * Entitlement Errors
 *
 * Every failure the entitlement core reports is an EntitlementError with
 * a stable code, the HTTP status the REST adapter answers with, and
 * whether the caller may retry. Caught by the REST adapter and mapped
 * to `{ success: false, error, errorCode, ...details }`.
 */

export type EntitlementErrorCode =
  | "pool_exhausted"
  | "already_licensed"
  | "not_licensed"
  | "insufficient_credits"
  | "unknown_feature_key"
  | "invalid_feature_value"
  | "not_found"
  | "invalid_request"
  | "storage_unavailable"
  | "concurrent_modification"
  | "authentication_required"
  | "access_denied";

export abstract class EntitlementError extends Error {
  abstract readonly code: EntitlementErrorCode;
  abstract readonly statusCode: number;
  readonly retryable: boolean = false;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

export class PoolExhaustedError extends EntitlementError {
  readonly code = "pool_exhausted";
  readonly statusCode = 409;

  constructor(tenantId: string, tierId: string) {
    super(`No seats left in the "${tierId}" pool`, { tenantId, tierId });
  }
}

export class AlreadyLicensedError extends EntitlementError {
  readonly code = "already_licensed";
  readonly statusCode = 409;

  constructor(userId: string, tierId: string | null) {
    super(`User "${userId}" already holds an active license`, { userId, tierId });
  }
}

export class NotLicensedError extends EntitlementError {
  readonly code = "not_licensed";
  readonly statusCode = 409;

  constructor(userId: string) {
    super(`User "${userId}" has no active license`, { userId });
  }
}

export class InsufficientCreditsError extends EntitlementError {
  readonly code = "insufficient_credits";
  readonly statusCode = 402;

  constructor(userId: string, requested: number, remaining: number) {
    super(`Insufficient credits: requested ${requested}, remaining ${remaining}`, {
      userId,
      requested,
      remaining,
    });
  }
}

export class UnknownFeatureKeyError extends EntitlementError {
  readonly code = "unknown_feature_key";
  readonly statusCode = 400;

  constructor(readonly keys: string[]) {
    super(`Unknown feature keys: ${keys.join(", ")}`, { unknownKeys: keys });
  }
}

export class InvalidFeatureValueError extends EntitlementError {
  readonly code = "invalid_feature_value";
  readonly statusCode = 400;

  constructor(featureKey: string, reason: string) {
    super(`Invalid value for "${featureKey}": ${reason}`, { featureKey });
  }
}

export class NotFoundError extends EntitlementError {
  readonly code = "not_found";
  readonly statusCode = 404;

  constructor(resource: string, id: string) {
    super(`${resource} "${id}" not found`, { resource, id });
  }
}

export class InvalidRequestError extends EntitlementError {
  readonly code = "invalid_request";
  readonly statusCode = 400;
}

/**
 * The authoritative store could not be reached or failed unexpectedly.
 * The message is generic; the cause is logged, never returned.
 */
export class StorageUnavailableError extends EntitlementError {
  readonly code = "storage_unavailable";
  readonly statusCode = 503;
  override readonly retryable = true;

  constructor(options?: { cause?: unknown }) {
    super("Entitlement storage is temporarily unavailable");
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** A conflicting mutation won the race; the operation can be retried. */
export class ConcurrentModificationError extends EntitlementError {
  readonly code = "concurrent_modification";
  readonly statusCode = 503;
  override readonly retryable = true;

  constructor(operation: string) {
    super(`Concurrent modification during ${operation}`, { operation });
  }
}

export class AuthenticationRequiredError extends EntitlementError {
  readonly code = "authentication_required";
  readonly statusCode = 401;

  constructor() {
    super("Authentication required");
  }
}

/** The caller's role or tenant does not permit the operation. */
export class AccessDeniedError extends EntitlementError {
  readonly code = "access_denied";
  readonly statusCode = 403;
}
