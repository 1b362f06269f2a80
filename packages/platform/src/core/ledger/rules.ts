/**
 * Ledger Rules
 *
 * Pure state transitions shared by every EntitlementStore. A store loads
 * the rows it has locked, asks these functions for the next state and the
 * ledger row to append, and writes both in the same atomic unit. Keeping
 * the arithmetic here means both stores agree on every balance.
 */

import {
  creditsRemaining,
  type LedgerTransaction,
  type TenantLicensePool,
  type Tier,
  type TransactionType,
  type UserLicenseState,
} from "@tierline/contracts";
import {
  AlreadyLicensedError,
  InsufficientCreditsError,
  InvalidRequestError,
  NotLicensedError,
  PoolExhaustedError,
} from "../entitlements/errors.js";

/** A ledger row before the store gives it an id and timestamp. */
export type TransactionDraft = Omit<LedgerTransaction, "id" | "createdAt">;

export interface Transition {
  state: UserLicenseState;
  transaction: TransactionDraft;
}

/** Holds a license whose credits may be spent right now. */
export function hasUsableLicense(state: UserLicenseState, now: Date): boolean {
  if (!state.licenseIsActive || state.licenseTierId === null) return false;
  return state.licenseExpiresAt === null || Date.parse(state.licenseExpiresAt) > now.getTime();
}

export function clearedLicense(userId: string, tenantId: string): UserLicenseState {
  return {
    userId,
    tenantId,
    licenseTierId: null,
    licenseIsActive: false,
    creditsAllocated: 0,
    creditsUsed: 0,
    creditsPerMonth: null,
    licenseAssignedAt: null,
    licenseAssignedBy: null,
    licenseExpiresAt: null,
  };
}

/** Higher or equal sortOrder counts as an upgrade. */
export function classifyTierChange(from: Tier, to: Tier): "upgrade" | "downgrade" {
  return to.sortOrder >= from.sortOrder ? "upgrade" : "downgrade";
}

// ---------------------------------------------------------------------------
// Pools
// ---------------------------------------------------------------------------

export function takeSeat(pool: TenantLicensePool | null, tenantId: string, tierId: string): TenantLicensePool {
  if (!pool || pool.availableCount <= 0) {
    throw new PoolExhaustedError(tenantId, tierId);
  }
  return {
    ...pool,
    assignedCount: pool.assignedCount + 1,
    availableCount: pool.availableCount - 1,
  };
}

/** A missing pool or one with nothing assigned is left as it is. */
export function releaseSeat(pool: TenantLicensePool): TenantLicensePool {
  if (pool.assignedCount <= 0) return pool;
  return {
    ...pool,
    assignedCount: pool.assignedCount - 1,
    availableCount: pool.availableCount + 1,
  };
}

export function resizePool(
  pool: TenantLicensePool | null,
  tier: Tier,
  totalCount: number
): { totalCount: number; assignedCount: number; availableCount: number } {
  if (tier.maxUsers !== null && totalCount > tier.maxUsers) {
    throw new InvalidRequestError(
      `Tier "${tier.id}" allows at most ${tier.maxUsers} seats per tenant`,
      { tierId: tier.id, maxUsers: tier.maxUsers, totalCount }
    );
  }

  const assignedCount = pool?.assignedCount ?? 0;
  if (totalCount < assignedCount) {
    throw new InvalidRequestError(
      `Cannot shrink pool below its ${assignedCount} assigned seats`,
      { tierId: tier.id, assignedCount, totalCount }
    );
  }

  return { totalCount, assignedCount, availableCount: totalCount - assignedCount };
}

// ---------------------------------------------------------------------------
// License transitions
// ---------------------------------------------------------------------------

function draft(
  state: UserLicenseState,
  type: TransactionType,
  amount: number,
  actor: string | null,
  extra: Partial<Pick<TransactionDraft, "reference" | "billingPeriod" | "metadata">> = {}
): TransactionDraft {
  return {
    userId: state.userId,
    tenantId: state.tenantId,
    type,
    amount,
    balanceAfter: creditsRemaining(state),
    reference: extra.reference ?? null,
    billingPeriod: extra.billingPeriod ?? null,
    metadata: extra.metadata ?? {},
    createdBy: actor,
  };
}

/** Inactive tiers keep their current holders but take no new ones. */
function requireAssignableTier(tier: Tier): void {
  if (!tier.isActive) {
    throw new InvalidRequestError(`Tier "${tier.id}" is not active`, { tierId: tier.id });
  }
}

export function assignTransition(
  current: UserLicenseState,
  tier: Tier,
  actor: string | null,
  now: Date
): Transition {
  if (current.licenseIsActive) {
    throw new AlreadyLicensedError(current.userId, current.licenseTierId);
  }
  requireAssignableTier(tier);

  const state: UserLicenseState = {
    ...current,
    licenseTierId: tier.id,
    licenseIsActive: true,
    creditsAllocated: tier.defaultCredits,
    creditsUsed: 0,
    creditsPerMonth: tier.creditsPerMonth,
    licenseAssignedAt: now.toISOString(),
    licenseAssignedBy: actor,
    licenseExpiresAt: null,
  };

  return {
    state,
    transaction: draft(state, "assign", tier.defaultCredits, actor, {
      metadata: { tierId: tier.id },
    }),
  };
}

/** Remaining credits are forfeited; the ledger row records how many. */
export function unassignTransition(current: UserLicenseState, actor: string | null): Transition {
  if (!current.licenseIsActive || current.licenseTierId === null) {
    throw new NotLicensedError(current.userId);
  }

  const forfeited = creditsRemaining(current);
  const state = clearedLicense(current.userId, current.tenantId);

  return {
    state,
    transaction: draft(state, "unassign", forfeited, actor, {
      metadata: { tierId: current.licenseTierId },
    }),
  };
}

export function tierChangeTransition(
  current: UserLicenseState,
  from: Tier,
  to: Tier,
  preserveCredits: boolean,
  actor: string | null,
  now: Date
): Transition {
  if (!current.licenseIsActive || current.licenseTierId === null) {
    throw new NotLicensedError(current.userId);
  }
  requireAssignableTier(to);
  if (from.id === to.id) {
    throw new InvalidRequestError(`User "${current.userId}" already holds tier "${to.id}"`, {
      userId: current.userId,
      tierId: to.id,
    });
  }

  const creditsAllocated = preserveCredits
    ? creditsRemaining(current) + to.defaultCredits
    : to.defaultCredits;

  const state: UserLicenseState = {
    ...current,
    licenseTierId: to.id,
    creditsAllocated,
    creditsUsed: 0,
    creditsPerMonth: to.creditsPerMonth,
    licenseAssignedAt: now.toISOString(),
    licenseAssignedBy: actor,
  };

  return {
    state,
    transaction: draft(state, classifyTierChange(from, to), to.defaultCredits, actor, {
      metadata: {
        fromTierId: from.id,
        toTierId: to.id,
        creditsAllocatedBefore: current.creditsAllocated,
        creditsAllocatedAfter: creditsAllocated,
        creditsUsedBefore: current.creditsUsed,
        preserveCredits,
      },
    }),
  };
}

export function debitTransition(
  current: UserLicenseState,
  amount: number,
  reference: string,
  actor: string | null,
  now: Date
): Transition {
  if (!hasUsableLicense(current, now)) {
    throw new NotLicensedError(current.userId);
  }
  if (current.creditsUsed + amount > current.creditsAllocated) {
    throw new InsufficientCreditsError(current.userId, amount, creditsRemaining(current));
  }

  const state: UserLicenseState = { ...current, creditsUsed: current.creditsUsed + amount };
  return { state, transaction: draft(state, "debit", amount, actor, { reference }) };
}

export function replenishTransition(
  current: UserLicenseState,
  amount: number,
  billingPeriod: string,
  actor: string | null,
  now: Date
): Transition {
  if (!hasUsableLicense(current, now)) {
    throw new NotLicensedError(current.userId);
  }

  const state: UserLicenseState = {
    ...current,
    creditsAllocated: current.creditsAllocated + amount,
  };
  return { state, transaction: draft(state, "replenish", amount, actor, { billingPeriod }) };
}
