/**
 * Route Access Rules
 *
 * Who may call which admin and ledger endpoint. Super-admins pass every
 * rule; tenant admins act only inside their own tenant; credit writes
 * come from system callers.
 */

import type { FastifyRequest } from "fastify";
import { TENANT_ADMIN_ROLE, type Caller } from "@tierline/contracts";
import { isSuperAdmin } from "../../core/enforcement/superadmin.js";
import {
  AccessDeniedError,
  AuthenticationRequiredError,
} from "../../core/entitlements/errors.js";

export function callerOf(request: FastifyRequest): Caller {
  if (!request.caller) throw new AuthenticationRequiredError();
  return request.caller;
}

export function requireSuperAdmin(caller: Caller): void {
  if (!isSuperAdmin(caller)) {
    throw new AccessDeniedError("Super-administrator role required");
  }
}

export function requireTenantAdmin(caller: Caller): void {
  if (!isSuperAdmin(caller) && !caller.roles.includes(TENANT_ADMIN_ROLE)) {
    throw new AccessDeniedError("Tenant administrator role required");
  }
}

/** Debits and replenishment are posted by the platform, not by end users. */
export function requireCreditWriter(caller: Caller): void {
  if (!isSuperAdmin(caller) && caller.type !== "system") {
    throw new AccessDeniedError("Only system callers may post credit movements");
  }
}

export function requireSameTenant(caller: Caller, tenantId: string): void {
  if (!isSuperAdmin(caller) && caller.tenantId !== tenantId) {
    throw new AccessDeniedError("User belongs to another tenant", { tenantId });
  }
}
