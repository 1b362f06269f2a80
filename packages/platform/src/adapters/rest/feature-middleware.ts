/**
 * Feature Enforcement Middleware
 *
 * Runs after authentication and asks the Enforcement Layer whether the
 * caller may reach the requested path. Denials carry the unmet feature
 * keys and where to upgrade; an unavailable decision is a retryable 503.
 */

import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from "fastify";
import type { Logger } from "@tierline/contracts";
import type { EnforcementPolicy } from "../../core/enforcement/policy.js";
import { requestPath } from "./auth-middleware.js";

export const UPGRADE_URL = "/settings/subscription";

export function createFeatureEnforcement(
  policy: EnforcementPolicy,
  logger: Logger
): preHandlerAsyncHookHandler {
  return async function featureEnforcement(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> {
    // Public routes have no caller; authentication already let them through.
    if (request.method === "OPTIONS" || !request.caller) return;

    const path = requestPath(request);
    const decision = await policy.authorize(request.caller, { type: "route", path });
    if (decision.allowed) return;

    if (decision.reason === "unavailable") {
      return reply.status(503).send({
        success: false,
        error: "Feature service temporarily unavailable. Please retry.",
        errorCode: "FEATURE_SERVICE_UNAVAILABLE",
        retryable: true,
      });
    }

    logger.info("Route denied: missing features", {
      userId: request.caller.userId,
      path,
      requiredFeatures: decision.unmetFeatures,
    });
    return reply.status(403).send({
      success: false,
      error: `This feature requires an upgrade: ${decision.unmetFeatures.join(", ")}`,
      errorCode: "FEATURE_NOT_ENABLED",
      requiredFeatures: decision.unmetFeatures,
      upgradeUrl: UPGRADE_URL,
    });
  };
}
