/**
 * HTTP Application
 *
 * Builds the Fastify instance: security headers, rate limiting, CORS,
 * the health check and the entitlement routes. Kept apart from the
 * entry point so tests can drive it with inject().
 */

import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import { registerRESTRoutes, type EntitlementServices } from "@tierline/platform";

export interface AppOptions {
  production: boolean;
  /** Comma-separated allowed origins; every origin when unset */
  corsOrigin?: string;
  rateLimitMax?: number;
  rateLimitWindowMs?: number;
}

/** Reads the HTTP options from the environment. */
export function appOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): AppOptions {
  const readNumber = (name: string) => {
    const raw = env[name];
    return raw ? Number(raw) : undefined;
  };
  return {
    production: env.NODE_ENV === "production",
    corsOrigin: env.CORS_ORIGIN,
    rateLimitMax: readNumber("RATE_LIMIT_MAX"),
    rateLimitWindowMs: readNumber("RATE_LIMIT_WINDOW_MS"),
  };
}

const PUBLIC_PATHS = new Set(["/api/health", "/api/auth/config"]);

export async function buildApp(
  services: EntitlementServices,
  options: AppOptions
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // We use our own structured logging
    // Behind a reverse proxy the rate limiter needs the real client IP.
    trustProxy: options.production,
  });

  // Content Security Policy only in production
  await app.register(helmet, {
    contentSecurityPolicy: options.production,
  });

  // Public routes get a much higher ceiling.
  const defaultMax = options.rateLimitMax ?? (options.production ? 100 : 1_000);
  await app.register(rateLimit, {
    max: (request) => (PUBLIC_PATHS.has(request.url) ? 10_000 : defaultMax),
    timeWindow: options.rateLimitWindowMs ?? 60_000,
  });

  await app.register(cors, {
    origin: options.corsOrigin
      ? options.corsOrigin.split(",").map((origin) => origin.trim())
      : true,
    credentials: true,
    methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  });

  app.get("/api/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  await registerRESTRoutes(app, services);

  return app;
}
