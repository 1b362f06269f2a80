/**
 * License Pool & Credit Ledger
 *
 * Seat assignment against tenant pools and per-user credit accounting.
 * Every mutation is one atomic store operation that also appends its
 * ledger row; this service adds input checks, the storage guard
 * (timeout and conflict retries), cache invalidation and one structured
 * log line per mutation.
 */

import {
  creditsRemaining,
  type LedgerTransaction,
  type Logger,
  type TenantLicensePool,
  type TransactionType,
  type UserLicenseState,
} from "@tierline/contracts";
import type { EntitlementStore, LicenseMutation } from "../entitlements/store.js";
import type { StorageGuard } from "../entitlements/storage-guard.js";
import type { FeatureCache } from "../entitlements/cache.js";
import { InvalidRequestError, NotFoundError } from "../entitlements/errors.js";
import { hasUsableLicense } from "./rules.js";

export interface LicenseLedgerDeps {
  store: EntitlementStore;
  guard: StorageGuard;
  cache: FeatureCache;
  logger: Logger;
  clock?: () => Date;
}

export interface CreditBalance {
  balance: number;
  transaction: LedgerTransaction;
}

export interface ReplenishResult {
  /** false when the billing period had already been applied */
  applied: boolean;
  balance: number;
}

export type ExecutionCheck =
  | { allowed: true; remaining: number }
  | { allowed: false; reason: "not_licensed" | "insufficient_credits"; remaining: number };

export interface TransactionQuery {
  userId?: string;
  tenantId?: string;
  type?: TransactionType;
  limit?: number;
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidRequestError(`${name} must be a positive integer`, { [name]: value });
  }
}

export class LicenseLedger {
  private readonly clock: () => Date;

  constructor(private readonly deps: LicenseLedgerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private logMutation(operation: string, mutation: LicenseMutation): void {
    const { state, transaction } = mutation;
    this.deps.logger.info(`ledger.${operation}`, {
      userId: state.userId,
      tenantId: state.tenantId,
      tierId: state.licenseTierId,
      type: transaction.type,
      amount: transaction.amount,
      balanceAfter: transaction.balanceAfter,
    });
  }

  // ---------------------------------------------------------------------------
  // Seats
  // ---------------------------------------------------------------------------

  async assign(userId: string, tierId: string, actor: string | null): Promise<LicenseMutation> {
    const { store, guard, cache } = this.deps;
    const mutation = await guard.mutate("assign", (signal) =>
      store.assignLicense({ userId, tierId, actor, signal })
    );
    cache.invalidateUser(userId);
    this.logMutation("assign", mutation);
    return mutation;
  }

  async unassign(userId: string, actor: string | null): Promise<LicenseMutation> {
    const { store, guard, cache } = this.deps;
    const mutation = await guard.mutate("unassign", (signal) =>
      store.unassignLicense({ userId, actor, signal })
    );
    cache.invalidateUser(userId);
    this.logMutation("unassign", mutation);
    return mutation;
  }

  /**
   * Moves the user to another tier in one step: the new seat is taken and
   * the old one released together. Recorded as upgrade or downgrade by
   * the tiers' sort order.
   */
  async upgrade(
    userId: string,
    tierId: string,
    preserveCredits: boolean,
    actor: string | null
  ): Promise<LicenseMutation> {
    const { store, guard, cache } = this.deps;
    const mutation = await guard.mutate("upgrade", (signal) =>
      store.changeTier({ userId, tierId, preserveCredits, actor, signal })
    );
    cache.invalidateUser(userId);
    this.logMutation(mutation.transaction.type, mutation);
    return mutation;
  }

  async setPoolCapacity(
    tenantId: string,
    tierId: string,
    totalCount: number,
    actor: string | null
  ): Promise<TenantLicensePool> {
    const { store, guard, logger } = this.deps;
    if (!Number.isInteger(totalCount) || totalCount < 0) {
      throw new InvalidRequestError("totalCount must be a non-negative integer", { totalCount });
    }
    const pool = await guard.mutate("setPoolCapacity", (signal) =>
      store.setPoolCapacity({ tenantId, tierId, totalCount, actor, signal })
    );
    logger.info("ledger.set_pool_capacity", {
      tenantId,
      tierId,
      totalCount: pool.totalCount,
      assignedCount: pool.assignedCount,
    });
    return pool;
  }

  async listPools(tenantId: string): Promise<TenantLicensePool[]> {
    const { store, guard } = this.deps;
    return guard.run("listPools", () => store.listPools(tenantId));
  }

  // ---------------------------------------------------------------------------
  // Credits
  // ---------------------------------------------------------------------------

  /** Creates the user's (unlicensed) record on first sight; idempotent. */
  async registerUser(userId: string, tenantId: string): Promise<UserLicenseState> {
    const { store, guard } = this.deps;
    return guard.run("ensureUser", () => store.ensureUser(userId, tenantId));
  }

  /** Authoritative read, never served from the cache. */
  async getLicense(userId: string): Promise<UserLicenseState> {
    const { store, guard } = this.deps;
    const license = await guard.run("getLicense", () => store.getLicense(userId));
    if (!license) throw new NotFoundError("User", userId);
    return license;
  }

  async debit(
    userId: string,
    amount: number,
    reference: string,
    actor: string | null
  ): Promise<CreditBalance> {
    const { store, guard } = this.deps;
    requirePositiveInteger("amount", amount);

    const mutation = await guard.mutate("debit", (signal) =>
      store.debitCredits({ userId, amount, reference, actor, signal })
    );
    this.logMutation("debit", mutation);
    return { balance: creditsRemaining(mutation.state), transaction: mutation.transaction };
  }

  /** Applies a billing period's grant once; replays are no-ops. */
  async replenish(
    userId: string,
    amount: number,
    billingPeriod: string,
    actor: string | null
  ): Promise<ReplenishResult> {
    const { store, guard, logger } = this.deps;
    requirePositiveInteger("amount", amount);
    if (billingPeriod.trim() === "") {
      throw new InvalidRequestError("billingPeriod is required");
    }

    const outcome = await guard.mutate("replenish", (signal) =>
      store.replenishCredits({ userId, amount, billingPeriod, actor, signal })
    );
    if (outcome.transaction) {
      this.logMutation("replenish", { state: outcome.state, transaction: outcome.transaction });
    } else {
      logger.info("ledger.replenish_replayed", { userId, billingPeriod });
    }
    return { applied: outcome.applied, balance: creditsRemaining(outcome.state) };
  }

  /**
   * Pre-execution check: can the user afford an operation of the given
   * estimated cost right now? Nothing is reserved.
   */
  async checkCanExecute(userId: string, estimatedCredits = 1): Promise<ExecutionCheck> {
    const license = await this.getLicense(userId);
    const remaining = creditsRemaining(license);

    if (!hasUsableLicense(license, this.clock())) {
      return { allowed: false, reason: "not_licensed", remaining: 0 };
    }
    if (remaining < estimatedCredits) {
      return { allowed: false, reason: "insufficient_credits", remaining };
    }
    return { allowed: true, remaining };
  }

  /** Newest first */
  async listTransactions(query: TransactionQuery = {}): Promise<LedgerTransaction[]> {
    const { store, guard } = this.deps;
    const limit = query.limit ?? 50;
    return guard.run("listTransactions", () =>
      store.listTransactions({
        userId: query.userId,
        tenantId: query.tenantId,
        type: query.type,
        limit,
      })
    );
  }
}
