/**
 * Licensing Definitions
 *
 * Tiers, tenant seat pools, per-user license state and the append-only
 * ledger of every license and credit mutation.
 */

import { z } from "zod";

/** A named bundle of feature overrides, credit grants and limits. */
export interface Tier {
  id: string;
  name: string;
  description: string | null;
  priceCents: number;
  seatPriceCents: number;
  currency: string;
  /** Credits granted on assignment */
  defaultCredits: number;
  /** Credits granted per billing period, if the tier replenishes */
  creditsPerMonth: number | null;
  /** Seat ceiling per tenant, null = no ceiling */
  maxUsers: number | null;
  /** Position from lowest to highest tier; decides upgrade vs downgrade */
  sortOrder: number;
  isActive: boolean;
}

export const createTierSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1).max(100),
  description: z.string().nullable().default(null),
  priceCents: z.number().int().nonnegative().default(0),
  seatPriceCents: z.number().int().nonnegative().default(0),
  currency: z.string().length(3).default("usd"),
  defaultCredits: z.number().int().nonnegative(),
  creditsPerMonth: z.number().int().nonnegative().nullable().default(null),
  maxUsers: z.number().int().positive().nullable().default(null),
  sortOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
});

export type CreateTierInput = z.input<typeof createTierSchema>;

/**
 * A tenant's seat inventory for one tier.
 * Invariant: availableCount = totalCount - assignedCount, both >= 0.
 */
export interface TenantLicensePool {
  tenantId: string;
  tierId: string;
  totalCount: number;
  assignedCount: number;
  availableCount: number;
  createdBy: string | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * License fields embedded in the user record.
 * Invariant: 0 <= creditsUsed <= creditsAllocated.
 */
export interface UserLicenseState {
  userId: string;
  tenantId: string;
  licenseTierId: string | null;
  licenseIsActive: boolean;
  creditsAllocated: number;
  creditsUsed: number;
  creditsPerMonth: number | null;
  licenseAssignedAt: string | null;
  licenseAssignedBy: string | null;
  licenseExpiresAt: string | null;
}

/** Credits still spendable */
export function creditsRemaining(state: Pick<UserLicenseState, "creditsAllocated" | "creditsUsed">): number {
  return state.creditsAllocated - state.creditsUsed;
}

export const TRANSACTION_TYPES = [
  "assign",
  "unassign",
  "upgrade",
  "downgrade",
  "debit",
  "replenish",
] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];

/** One append-only ledger row. Never updated or deleted. */
export interface LedgerTransaction {
  id: string;
  userId: string;
  tenantId: string;
  type: TransactionType;
  amount: number;
  /** Spendable credits right after this mutation */
  balanceAfter: number;
  /** Caller-supplied reference, e.g. the billable operation id */
  reference: string | null;
  /** Set on replenish rows; (userId, billingPeriod) is unique among them */
  billingPeriod: string | null;
  metadata: Record<string, unknown>;
  createdBy: string | null;
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

export const assignLicenseSchema = z.object({
  userId: z.string().min(1),
  tierId: z.string().min(1),
});

export const upgradeLicenseSchema = z.object({
  userId: z.string().min(1),
  tierId: z.string().min(1),
  preserveCredits: z.boolean().default(false),
});

export const setPoolCapacitySchema = z.object({
  tenantId: z.string().min(1),
  totalCount: z.number().int().nonnegative(),
});

export const debitCreditsSchema = z.object({
  userId: z.string().min(1),
  amount: z.number().int().positive(),
  reference: z.string().min(1).max(255),
});

export const replenishCreditsSchema = z.object({
  userId: z.string().min(1),
  amount: z.number().int().positive(),
  billingPeriod: z.string().min(1).max(32),
});

export const transactionQuerySchema = z.object({
  userId: z.string().min(1).optional(),
  type: z.enum(TRANSACTION_TYPES).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});
