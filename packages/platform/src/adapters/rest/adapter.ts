/**
 * REST Adapter
 *
 * Maps the entitlement services to HTTP endpoints on a Fastify instance.
 *
 *   /api/features  — the caller's resolved features, models, components,
 *                    limit and authorization checks; registry admin
 *                    (super-admin)
 *   /api/tiers     — active tiers; tier feature admin (super-admin)
 *   /api/licenses  — seat pools and assignment (tenant admin)
 *   /api/credits   — own balance; debit/replenish (system callers);
 *                    transaction history (tenant admin)
 *
 * Every response is `{ success: true, data }` or the error body built by
 * the error handler. Request bodies and query strings are zod-validated.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  assignLicenseSchema,
  creditsRemaining,
  debitCreditsSchema,
  featureKeySchema,
  operationSchema,
  replenishCreditsSchema,
  setPoolCapacitySchema,
  setTierFeaturesSchema,
  transactionQuerySchema,
  upgradeLicenseSchema,
} from "@tierline/contracts";
import type { EntitlementServices } from "../../services.js";
import { getAuthProvider } from "../../auth/index.js";
import { createLogger } from "../../core/observability/logger.js";
import { isSuperAdmin } from "../../core/enforcement/superadmin.js";
import { authMiddleware } from "./auth-middleware.js";
import { createFeatureEnforcement } from "./feature-middleware.js";
import { createUserRegistration } from "./user-registration.js";
import { registerErrorHandler } from "./errors.js";
import {
  callerOf,
  requireCreditWriter,
  requireSameTenant,
  requireSuperAdmin,
  requireTenantAdmin,
} from "./access.js";

const setActiveSchema = z.object({ isActive: z.boolean() });

const poolQuerySchema = z.object({ tenantId: z.string().min(1).optional() });

const limitCheckQuerySchema = z.object({
  usage: z.coerce.number().int().nonnegative().default(0),
});

const executionCheckQuerySchema = z.object({
  estimatedCredits: z.coerce.number().int().positive().default(1),
});

/**
 * Registers the hooks, the error handler and every entitlement route.
 */
export async function registerRESTRoutes(app: FastifyInstance, services: EntitlementServices) {
  const { registry, tiers, resolver, ledger, policy } = services;
  const logger = createLogger("rest");

  // ---------------------------------------------------------------
  // Hooks: authenticate, make sure the caller has a user record,
  // then check the route against the caller's features
  // ---------------------------------------------------------------

  app.addHook("preHandler", authMiddleware);

  app.addHook("preHandler", createUserRegistration(ledger));

  app.addHook("preHandler", createFeatureEnforcement(policy, createLogger("enforcement")));

  registerErrorHandler(app, logger);

  // ---------------------------------------------------------------
  // Public
  // ---------------------------------------------------------------

  /** Auth configuration — tells the frontend how to authenticate */
  app.get("/api/auth/config", async () => {
    return getAuthProvider().getPublicConfig();
  });

  // ---------------------------------------------------------------
  // Features
  // ---------------------------------------------------------------

  app.get("/api/features", async (request) => {
    const resolved = await resolver.resolveForCaller(callerOf(request));
    return { success: true, data: resolved };
  });

  app.get<{ Params: { key: string } }>("/api/features/check/:key", async (request) => {
    const key = featureKeySchema.parse(request.params.key);
    const resolved = await resolver.resolveForCaller(callerOf(request));
    return { success: true, data: resolver.statusOf(resolved, key) };
  });

  /** Measures the caller's usage against a limit feature. */
  app.get<{ Params: { key: string } }>("/api/features/limits/:key", async (request) => {
    const key = featureKeySchema.parse(request.params.key);
    const { usage } = limitCheckQuerySchema.parse(request.query);
    const resolved = await resolver.resolveForCaller(callerOf(request));
    return { success: true, data: resolver.evaluateLimit(resolved, key, usage) };
  });

  app.get("/api/features/models", async (request) => {
    const resolved = await resolver.resolveForCaller(callerOf(request));
    return { success: true, data: resolver.modelsFor(resolved) };
  });

  app.get("/api/features/components", async (request) => {
    const resolved = await resolver.resolveForCaller(callerOf(request));
    return { success: true, data: resolver.componentsFor(resolved) };
  });

  /** Dry-run authorization of an action or workflow, e.g. before running a flow */
  app.post("/api/features/authorize", async (request) => {
    const operation = operationSchema.parse(request.body);
    return { success: true, data: await policy.authorize(callerOf(request), operation) };
  });

  app.get("/api/features/registry", async (request) => {
    requireSuperAdmin(callerOf(request));
    return { success: true, data: await registry.listDefinitions() };
  });

  app.patch<{ Params: { key: string } }>("/api/features/registry/:key", async (request) => {
    const caller = callerOf(request);
    requireSuperAdmin(caller);
    const { isActive } = setActiveSchema.parse(request.body);
    return {
      success: true,
      data: await registry.setActive(request.params.key, isActive, caller.userId),
    };
  });

  // ---------------------------------------------------------------
  // Tiers
  // ---------------------------------------------------------------

  app.get("/api/tiers", async () => {
    return { success: true, data: await tiers.listTiers(true) };
  });

  app.get<{ Params: { id: string } }>("/api/tiers/:id/features", async (request) => {
    requireSuperAdmin(callerOf(request));
    return { success: true, data: await tiers.getTierFeatures(request.params.id) };
  });

  app.put<{ Params: { id: string } }>("/api/tiers/:id/features", async (request) => {
    const caller = callerOf(request);
    requireSuperAdmin(caller);
    const { features } = setTierFeaturesSchema.parse(request.body);
    return {
      success: true,
      data: await tiers.setTierFeatures(request.params.id, features, caller.userId),
    };
  });

  // ---------------------------------------------------------------
  // License pools and seats
  // ---------------------------------------------------------------

  app.get("/api/licenses/pools", async (request) => {
    const caller = callerOf(request);
    requireTenantAdmin(caller);
    const { tenantId } = poolQuerySchema.parse(request.query);
    const target = isSuperAdmin(caller) && tenantId ? tenantId : caller.tenantId;
    return { success: true, data: await ledger.listPools(target) };
  });

  app.put<{ Params: { tierId: string } }>("/api/licenses/pools/:tierId", async (request) => {
    const caller = callerOf(request);
    requireSuperAdmin(caller);
    const { tenantId, totalCount } = setPoolCapacitySchema.parse(request.body);
    return {
      success: true,
      data: await ledger.setPoolCapacity(tenantId, request.params.tierId, totalCount, caller.userId),
    };
  });

  app.post("/api/licenses/assign", async (request) => {
    const caller = callerOf(request);
    requireTenantAdmin(caller);
    const { userId, tierId } = assignLicenseSchema.parse(request.body);
    requireSameTenant(caller, (await ledger.getLicense(userId)).tenantId);
    return { success: true, data: await ledger.assign(userId, tierId, caller.userId) };
  });

  app.post<{ Params: { userId: string } }>("/api/licenses/unassign/:userId", async (request) => {
    const caller = callerOf(request);
    requireTenantAdmin(caller);
    const { userId } = request.params;
    requireSameTenant(caller, (await ledger.getLicense(userId)).tenantId);
    return { success: true, data: await ledger.unassign(userId, caller.userId) };
  });

  app.post("/api/licenses/upgrade", async (request) => {
    const caller = callerOf(request);
    requireTenantAdmin(caller);
    const { userId, tierId, preserveCredits } = upgradeLicenseSchema.parse(request.body);
    requireSameTenant(caller, (await ledger.getLicense(userId)).tenantId);
    return {
      success: true,
      data: await ledger.upgrade(userId, tierId, preserveCredits, caller.userId),
    };
  });

  // ---------------------------------------------------------------
  // Credits
  // ---------------------------------------------------------------

  app.get("/api/credits", async (request) => {
    const license = await ledger.getLicense(callerOf(request).userId);
    return {
      success: true,
      data: {
        tierId: license.licenseTierId,
        licenseIsActive: license.licenseIsActive,
        creditsAllocated: license.creditsAllocated,
        creditsUsed: license.creditsUsed,
        creditsRemaining: creditsRemaining(license),
        creditsPerMonth: license.creditsPerMonth,
        licenseExpiresAt: license.licenseExpiresAt,
      },
    };
  });

  /** Pre-execution check; super-admins are never limited by credits. */
  app.get("/api/credits/check", async (request) => {
    const caller = callerOf(request);
    if (isSuperAdmin(caller)) {
      return { success: true, data: { allowed: true, reason: "superadmin" } };
    }
    const { estimatedCredits } = executionCheckQuerySchema.parse(request.query);
    return { success: true, data: await ledger.checkCanExecute(caller.userId, estimatedCredits) };
  });

  app.post("/api/credits/debit", async (request) => {
    const caller = callerOf(request);
    requireCreditWriter(caller);
    const { userId, amount, reference } = debitCreditsSchema.parse(request.body);
    return { success: true, data: await ledger.debit(userId, amount, reference, caller.userId) };
  });

  app.post("/api/credits/replenish", async (request) => {
    const caller = callerOf(request);
    requireCreditWriter(caller);
    const { userId, amount, billingPeriod } = replenishCreditsSchema.parse(request.body);
    return {
      success: true,
      data: await ledger.replenish(userId, amount, billingPeriod, caller.userId),
    };
  });

  app.get("/api/credits/transactions", async (request) => {
    const caller = callerOf(request);
    requireTenantAdmin(caller);
    const query = transactionQuerySchema.parse(request.query);
    return {
      success: true,
      data: await ledger.listTransactions({
        ...query,
        tenantId: isSuperAdmin(caller) ? undefined : caller.tenantId,
      }),
    };
  });
}
