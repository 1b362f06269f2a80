/**
 * REST Error Mapping
 *
 * One Fastify error handler for every route:
 *   EntitlementError → its status, `{ success: false, error, errorCode, ...details }`
 *   ZodError         → 400 with the failing fields
 *   client errors raised by Fastify itself (bad JSON, payload too large) → as raised
 *   anything else    → 500 after captureException
 */

import type { FastifyInstance } from "fastify";
import { ZodError } from "zod";
import type { Logger } from "@tierline/contracts";
import { EntitlementError } from "../../core/entitlements/errors.js";
import { captureException } from "../../core/observability/index.js";

export interface ErrorBody {
  success: false;
  error: string;
  errorCode: string;
  [detail: string]: unknown;
}

export function entitlementErrorBody(error: EntitlementError): ErrorBody {
  return {
    ...error.details,
    success: false,
    error: error.message,
    errorCode: error.code,
    ...(error.retryable ? { retryable: true } : {}),
  };
}

function clientStatus(error: { statusCode?: number }): number | null {
  const { statusCode } = error;
  return statusCode !== undefined && statusCode >= 400 && statusCode < 500 ? statusCode : null;
}

export function registerErrorHandler(app: FastifyInstance, logger: Logger): void {
  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof EntitlementError) {
      return reply.status(error.statusCode).send(entitlementErrorBody(error));
    }

    if (error instanceof ZodError) {
      return reply.status(400).send({
        success: false,
        error: "Invalid request",
        errorCode: "invalid_request",
        issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      });
    }

    const status = clientStatus(error);
    if (status !== null) {
      return reply.status(status).send({
        success: false,
        error: error.message,
        errorCode: "invalid_request",
      });
    }

    logger.error("Unhandled route error", {
      url: request.url,
      method: request.method,
      error: error.message,
    });
    captureException(error, {
      url: request.url,
      method: request.method,
      userId: request.caller?.userId,
      tenantId: request.caller?.tenantId,
    });

    return reply.status(500).send({
      success: false,
      error: "An unexpected error occurred",
      errorCode: "internal_error",
    });
  });
}
