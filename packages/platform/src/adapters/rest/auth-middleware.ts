/**
 * Fastify Authentication Middleware
 *
 * Intercepts incoming HTTP requests and verifies authentication tokens.
 * Extracts the Bearer token from the Authorization header, verifies it
 * through the configured AuthProvider, and attaches the Caller to the
 * request object for downstream handlers.
 *
 * Public routes (health checks, auth config) are exempt.
 *
 * Usage: Register this as a Fastify preHandler hook during bootstrap.
 */

import type { FastifyRequest, FastifyReply } from "fastify";
import type { Caller } from "@tierline/contracts";
import { getAuthProvider } from "../../auth/index.js";

/**
 * Routes that do NOT require authentication.
 */
export const PUBLIC_ROUTES = new Set(["/health", "/api/health", "/api/auth/config"]);

/**
 * Extend Fastify's request type to include the authenticated caller.
 * This is the standard Fastify pattern for adding custom properties.
 */
declare module "fastify" {
  interface FastifyRequest {
    caller?: Caller;
  }
}

/**
 * Extracts the Bearer token from the Authorization header.
 * Returns null if the header is missing or malformed.
 */
function extractBearerToken(request: FastifyRequest): string | null {
  const header = request.headers.authorization;
  if (!header) return null;

  const [scheme, token, ...rest] = header.split(" ");
  if (rest.length > 0 || !token || scheme?.toLowerCase() !== "bearer") return null;

  return token;
}

export function requestPath(request: FastifyRequest): string {
  return request.url.split("?")[0] ?? request.url;
}

/**
 * Fastify preHandler hook that enforces authentication.
 *
 * For protected routes:
 *   1. Extracts the Bearer token from the Authorization header
 *   2. Verifies it through the AuthProvider
 *   3. Attaches the Caller to request.caller
 *   4. Returns 401 if the token is missing or invalid
 *
 * For public routes: passes through without checking.
 */
export async function authMiddleware(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | undefined> {
  // Preflight requests never carry Authorization headers; @fastify/cors answers them.
  if (request.method === "OPTIONS") {
    return;
  }

  if (PUBLIC_ROUTES.has(requestPath(request))) {
    return;
  }

  const provider = getAuthProvider();
  const token = extractBearerToken(request);

  // The DevAuthProvider accepts anything, including no token; real providers return null.
  const caller = await provider.verifyToken(token ?? "");

  if (!caller) {
    return reply.status(401).send({
      success: false,
      errorCode: "authentication_required",
      error: token
        ? "Invalid or expired authentication token."
        : "Authentication required. Provide a Bearer token in the Authorization header.",
    });
  }

  request.caller = caller;
}
