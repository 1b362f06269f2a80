/**
 * Postgres Entitlement Store
 *
 * Production implementation of EntitlementStore on drizzle-orm and
 * postgres.js. Each ledger mutation runs in one database transaction:
 *
 *   - seats are taken with a conditional UPDATE (available_count > 0)
 *   - debits are a conditional UPDATE (credits_used + n <= credits_allocated)
 *   - tier changes, unassign and replenish lock the user row FOR UPDATE
 *
 * Serialization failures and deadlocks surface as
 * ConcurrentModificationError so the Ledger can retry them. With
 * statementTimeoutMs set, every mutation transaction carries the same
 * bound as SET LOCAL statement_timeout and lock_timeout, and a command
 * whose signal aborted before commit rolls back.
 */

import { and, desc, eq, gt, isNull, or, sql } from "drizzle-orm";
import postgres from "postgres";
import type {
  FeatureCategory,
  FeatureDefinition,
  FeatureKind,
  LedgerTransaction,
  TenantLicensePool,
  Tier,
  TierFeatureOverride,
  TransactionType,
  UserLicenseState,
} from "@tierline/contracts";
import { FEATURE_CATEGORIES, FEATURE_KINDS, TRANSACTION_TYPES } from "@tierline/contracts";
import type { Database } from "../database/connection.js";
import {
  featureRegistry,
  ledgerTransactions,
  licenseTiers,
  tenantLicensePools,
  tierFeatureOverrides,
  users,
  type FeatureRow,
  type PoolRow,
  type TierRow,
  type TransactionRow,
  type UserRow,
} from "../database/schema.js";
import {
  ConcurrentModificationError,
  EntitlementError,
  NotFoundError,
  NotLicensedError,
  PoolExhaustedError,
} from "./errors.js";
import type {
  AssignLicenseCommand,
  ChangeTierCommand,
  DebitCreditsCommand,
  EntitlementStore,
  LicenseMutation,
  ReplenishCreditsCommand,
  ReplenishOutcome,
  SetPoolCapacityCommand,
  TransactionFilter,
  UnassignLicenseCommand,
} from "./store.js";
import {
  assignTransition,
  debitTransition,
  replenishTransition,
  resizePool,
  tierChangeTransition,
  unassignTransition,
  type Transition,
} from "../ledger/rules.js";

type Tx = Parameters<Parameters<Database["transaction"]>[0]>[0];

/** SQLSTATEs that mean "another transaction got there first" */
const CONFLICT_CODES = new Set(["40001", "40P01"]);

/**
 * True when the error, or anything in its cause chain, is a Postgres
 * serialization failure or deadlock.
 */
export function isConflictError(error: unknown): boolean {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if (current instanceof postgres.PostgresError && CONFLICT_CODES.has(current.code)) {
      return true;
    }
    current = current.cause;
  }
  return false;
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

function asKind(value: string): FeatureKind {
  return FEATURE_KINDS.find((kind) => kind === value) ?? "boolean";
}

function asCategory(value: string): FeatureCategory {
  return FEATURE_CATEGORIES.find((category) => category === value) ?? "ui";
}

function asTransactionType(value: string): TransactionType {
  const type = TRANSACTION_TYPES.find((t) => t === value);
  if (!type) throw new Error(`Unexpected ledger transaction type "${value}"`);
  return type;
}

function toFeature(row: FeatureRow): FeatureDefinition {
  return {
    key: row.key,
    name: row.name,
    description: row.description,
    category: asCategory(row.category),
    kind: asKind(row.kind),
    defaultValue: row.defaultValue,
    isPremium: row.isPremium,
    isActive: row.isActive,
    dependsOn: row.dependsOn,
  };
}

function toTier(row: TierRow): Tier {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    priceCents: row.priceCents,
    seatPriceCents: row.seatPriceCents,
    currency: row.currency,
    defaultCredits: row.defaultCredits,
    creditsPerMonth: row.creditsPerMonth,
    maxUsers: row.maxUsers,
    sortOrder: row.sortOrder,
    isActive: row.isActive,
  };
}

function toPool(row: PoolRow): TenantLicensePool {
  return {
    tenantId: row.tenantId,
    tierId: row.tierId,
    totalCount: row.totalCount,
    assignedCount: row.assignedCount,
    availableCount: row.availableCount,
    createdBy: row.createdBy,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function toLicense(row: UserRow): UserLicenseState {
  return {
    userId: row.id,
    tenantId: row.tenantId,
    licenseTierId: row.licenseTierId,
    licenseIsActive: row.licenseIsActive,
    creditsAllocated: row.creditsAllocated,
    creditsUsed: row.creditsUsed,
    creditsPerMonth: row.creditsPerMonth,
    licenseAssignedAt: iso(row.licenseAssignedAt),
    licenseAssignedBy: row.licenseAssignedBy,
    licenseExpiresAt: iso(row.licenseExpiresAt),
  };
}

function toTransaction(row: TransactionRow): LedgerTransaction {
  return {
    id: row.id,
    userId: row.userId,
    tenantId: row.tenantId,
    type: asTransactionType(row.type),
    amount: row.amount,
    balanceAfter: row.balanceAfter,
    reference: row.reference,
    billingPeriod: row.billingPeriod,
    metadata: row.metadata,
    createdBy: row.createdBy,
    createdAt: row.createdAt.toISOString(),
  };
}

/** License columns of a UserLicenseState, ready for UPDATE ... SET */
function licenseColumns(state: UserLicenseState) {
  return {
    licenseTierId: state.licenseTierId,
    licenseIsActive: state.licenseIsActive,
    creditsAllocated: state.creditsAllocated,
    creditsUsed: state.creditsUsed,
    creditsPerMonth: state.creditsPerMonth,
    licenseAssignedAt: state.licenseAssignedAt ? new Date(state.licenseAssignedAt) : null,
    licenseAssignedBy: state.licenseAssignedBy,
    licenseExpiresAt: state.licenseExpiresAt ? new Date(state.licenseExpiresAt) : null,
  };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface PostgresStoreOptions {
  clock?: () => Date;
  /** Server-side bound for each mutation transaction */
  statementTimeoutMs?: number;
}

export class PostgresEntitlementStore implements EntitlementStore {
  private readonly clock: () => Date;
  private readonly statementTimeoutMs: number | null;

  constructor(
    private readonly db: Database,
    options: PostgresStoreOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    const timeout = options.statementTimeoutMs;
    this.statementTimeoutMs =
      timeout !== undefined && Number.isInteger(timeout) && timeout > 0 ? timeout : null;
  }

  /**
   * Runs `work` in one transaction. Domain errors pass through untouched;
   * conflicts become ConcurrentModificationError. An aborted signal
   * throws before the transaction commits, so it rolls back.
   */
  private async atomically<T>(
    operation: string,
    signal: AbortSignal | undefined,
    work: (tx: Tx) => Promise<T>
  ): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        if (this.statementTimeoutMs !== null) {
          await tx.execute(sql.raw(`SET LOCAL statement_timeout = ${this.statementTimeoutMs}`));
          await tx.execute(sql.raw(`SET LOCAL lock_timeout = ${this.statementTimeoutMs}`));
        }
        const result = await work(tx);
        signal?.throwIfAborted();
        return result;
      });
    } catch (error) {
      if (error instanceof EntitlementError) throw error;
      if (isConflictError(error)) throw new ConcurrentModificationError(operation);
      throw error;
    }
  }

  private async lockUser(tx: Tx, userId: string): Promise<UserLicenseState> {
    const [row] = await tx.select().from(users).where(eq(users.id, userId)).for("update");
    if (!row) throw new NotFoundError("User", userId);
    return toLicense(row);
  }

  private async requireTier(tx: Tx, tierId: string): Promise<Tier> {
    const [row] = await tx.select().from(licenseTiers).where(eq(licenseTiers.id, tierId));
    if (!row) throw new NotFoundError("Tier", tierId);
    return toTier(row);
  }

  /** Conditional decrement: no row back means no seat was free. */
  private async takeSeat(tx: Tx, tenantId: string, tierId: string): Promise<void> {
    const taken = await tx
      .update(tenantLicensePools)
      .set({
        assignedCount: sql`${tenantLicensePools.assignedCount} + 1`,
        availableCount: sql`${tenantLicensePools.availableCount} - 1`,
        updatedAt: this.clock(),
      })
      .where(
        and(
          eq(tenantLicensePools.tenantId, tenantId),
          eq(tenantLicensePools.tierId, tierId),
          gt(tenantLicensePools.availableCount, 0)
        )
      )
      .returning({ tierId: tenantLicensePools.tierId });
    if (taken.length === 0) throw new PoolExhaustedError(tenantId, tierId);
  }

  private async releaseSeat(tx: Tx, tenantId: string, tierId: string): Promise<void> {
    await tx
      .update(tenantLicensePools)
      .set({
        assignedCount: sql`${tenantLicensePools.assignedCount} - 1`,
        availableCount: sql`${tenantLicensePools.availableCount} + 1`,
        updatedAt: this.clock(),
      })
      .where(
        and(
          eq(tenantLicensePools.tenantId, tenantId),
          eq(tenantLicensePools.tierId, tierId),
          gt(tenantLicensePools.assignedCount, 0)
        )
      );
  }

  /** Writes the new license columns and appends the ledger row. */
  private async commit(tx: Tx, transition: Transition): Promise<LicenseMutation> {
    const [userRow] = await tx
      .update(users)
      .set(licenseColumns(transition.state))
      .where(eq(users.id, transition.state.userId))
      .returning();
    const [txRow] = await tx.insert(ledgerTransactions).values(transition.transaction).returning();
    if (!userRow || !txRow) {
      throw new ConcurrentModificationError(transition.transaction.type);
    }
    return { state: toLicense(userRow), transaction: toTransaction(txRow) };
  }

  // -------------------------------------------------------------------------
  // Feature Registry
  // -------------------------------------------------------------------------

  async listFeatures(): Promise<FeatureDefinition[]> {
    const rows = await this.db.select().from(featureRegistry).orderBy(featureRegistry.key);
    return rows.map(toFeature);
  }

  async getFeature(key: string): Promise<FeatureDefinition | null> {
    const [row] = await this.db.select().from(featureRegistry).where(eq(featureRegistry.key, key));
    return row ? toFeature(row) : null;
  }

  async upsertFeatures(definitions: FeatureDefinition[]): Promise<void> {
    if (definitions.length === 0) return;
    await this.db
      .insert(featureRegistry)
      .values(definitions)
      .onConflictDoUpdate({
        target: featureRegistry.key,
        set: {
          name: sql`excluded.name`,
          description: sql`excluded.description`,
          category: sql`excluded.category`,
          kind: sql`excluded.kind`,
          defaultValue: sql`excluded.default_value`,
          isPremium: sql`excluded.is_premium`,
          dependsOn: sql`excluded.depends_on`,
          updatedAt: this.clock(),
        },
      });
  }

  async setFeatureActive(key: string, isActive: boolean): Promise<FeatureDefinition | null> {
    const [row] = await this.db
      .update(featureRegistry)
      .set({ isActive, updatedAt: this.clock() })
      .where(eq(featureRegistry.key, key))
      .returning();
    return row ? toFeature(row) : null;
  }

  // -------------------------------------------------------------------------
  // Tiers
  // -------------------------------------------------------------------------

  async listTiers(): Promise<Tier[]> {
    const rows = await this.db.select().from(licenseTiers).orderBy(licenseTiers.sortOrder);
    return rows.map(toTier);
  }

  async getTier(id: string): Promise<Tier | null> {
    const [row] = await this.db.select().from(licenseTiers).where(eq(licenseTiers.id, id));
    return row ? toTier(row) : null;
  }

  async upsertTier(tier: Tier): Promise<Tier> {
    const { id, ...columns } = tier;
    const [row] = await this.db
      .insert(licenseTiers)
      .values(tier)
      .onConflictDoUpdate({
        target: licenseTiers.id,
        set: { ...columns, updatedAt: this.clock() },
      })
      .returning();
    if (!row) throw new NotFoundError("Tier", id);
    return toTier(row);
  }

  async getTierOverrides(tierId: string): Promise<TierFeatureOverride[]> {
    const rows = await this.db
      .select()
      .from(tierFeatureOverrides)
      .where(eq(tierFeatureOverrides.tierId, tierId));
    return rows.map((row) => ({
      tierId: row.tierId,
      featureKey: row.featureKey,
      value: row.value,
      expiresAt: iso(row.expiresAt),
    }));
  }

  async upsertTierOverrides(overrides: TierFeatureOverride[], updatedBy: string | null): Promise<void> {
    if (overrides.length === 0) return;
    await this.db
      .insert(tierFeatureOverrides)
      .values(
        overrides.map((o) => ({
          tierId: o.tierId,
          featureKey: o.featureKey,
          value: o.value,
          expiresAt: o.expiresAt ? new Date(o.expiresAt) : null,
          updatedBy,
        }))
      )
      .onConflictDoUpdate({
        target: [tierFeatureOverrides.tierId, tierFeatureOverrides.featureKey],
        set: {
          value: sql`excluded.value`,
          expiresAt: sql`excluded.expires_at`,
          updatedBy: sql`excluded.updated_by`,
          updatedAt: this.clock(),
        },
      });
  }

  // -------------------------------------------------------------------------
  // Users
  // -------------------------------------------------------------------------

  async ensureUser(userId: string, tenantId: string): Promise<UserLicenseState> {
    await this.db.insert(users).values({ id: userId, tenantId }).onConflictDoNothing();
    const license = await this.getLicense(userId);
    if (!license) throw new NotFoundError("User", userId);
    return license;
  }

  async getLicense(userId: string): Promise<UserLicenseState | null> {
    const [row] = await this.db.select().from(users).where(eq(users.id, userId));
    return row ? toLicense(row) : null;
  }

  // -------------------------------------------------------------------------
  // Pools
  // -------------------------------------------------------------------------

  async listPools(tenantId: string): Promise<TenantLicensePool[]> {
    const rows = await this.db
      .select()
      .from(tenantLicensePools)
      .where(eq(tenantLicensePools.tenantId, tenantId))
      .orderBy(tenantLicensePools.tierId);
    return rows.map(toPool);
  }

  async setPoolCapacity(command: SetPoolCapacityCommand): Promise<TenantLicensePool> {
    return this.atomically("setPoolCapacity", command.signal, async (tx) => {
      const tier = await this.requireTier(tx, command.tierId);
      const [existing] = await tx
        .select()
        .from(tenantLicensePools)
        .where(
          and(
            eq(tenantLicensePools.tenantId, command.tenantId),
            eq(tenantLicensePools.tierId, command.tierId)
          )
        )
        .for("update");
      const counts = resizePool(existing ? toPool(existing) : null, tier, command.totalCount);

      const [row] = await tx
        .insert(tenantLicensePools)
        .values({
          tenantId: command.tenantId,
          tierId: command.tierId,
          ...counts,
          createdBy: command.actor,
        })
        .onConflictDoUpdate({
          target: [tenantLicensePools.tenantId, tenantLicensePools.tierId],
          set: { ...counts, updatedAt: this.clock() },
        })
        .returning();
      if (!row) throw new ConcurrentModificationError("setPoolCapacity");
      return toPool(row);
    });
  }

  // -------------------------------------------------------------------------
  // Ledger mutations
  // -------------------------------------------------------------------------

  async assignLicense(command: AssignLicenseCommand): Promise<LicenseMutation> {
    return this.atomically("assign", command.signal, async (tx) => {
      const user = await this.lockUser(tx, command.userId);
      const tier = await this.requireTier(tx, command.tierId);
      const transition = assignTransition(user, tier, command.actor, this.clock());
      await this.takeSeat(tx, user.tenantId, tier.id);
      return this.commit(tx, transition);
    });
  }

  async unassignLicense(command: UnassignLicenseCommand): Promise<LicenseMutation> {
    return this.atomically("unassign", command.signal, async (tx) => {
      const user = await this.lockUser(tx, command.userId);
      const transition = unassignTransition(user, command.actor);
      if (user.licenseTierId !== null) {
        await this.releaseSeat(tx, user.tenantId, user.licenseTierId);
      }
      return this.commit(tx, transition);
    });
  }

  async changeTier(command: ChangeTierCommand): Promise<LicenseMutation> {
    return this.atomically("upgrade", command.signal, async (tx) => {
      const user = await this.lockUser(tx, command.userId);
      const to = await this.requireTier(tx, command.tierId);
      if (!user.licenseIsActive || user.licenseTierId === null) {
        throw new NotLicensedError(user.userId);
      }
      const from = await this.requireTier(tx, user.licenseTierId);
      const transition = tierChangeTransition(
        user,
        from,
        to,
        command.preserveCredits,
        command.actor,
        this.clock()
      );

      // Both seat moves commit together, so no reader sees zero or two seats.
      await this.takeSeat(tx, user.tenantId, to.id);
      await this.releaseSeat(tx, user.tenantId, from.id);
      return this.commit(tx, transition);
    });
  }

  async debitCredits(command: DebitCreditsCommand): Promise<LicenseMutation> {
    return this.atomically("debit", command.signal, async (tx) => {
      const now = this.clock();
      const [row] = await tx
        .update(users)
        .set({ creditsUsed: sql`${users.creditsUsed} + ${command.amount}` })
        .where(
          and(
            eq(users.id, command.userId),
            eq(users.licenseIsActive, true),
            sql`${users.creditsUsed} + ${command.amount} <= ${users.creditsAllocated}`,
            or(isNull(users.licenseExpiresAt), gt(users.licenseExpiresAt, now))
          )
        )
        .returning();

      if (!row) {
        // Nothing matched: find out why, so the caller gets the precise error.
        const [current] = await tx.select().from(users).where(eq(users.id, command.userId));
        if (!current) throw new NotFoundError("User", command.userId);
        debitTransition(toLicense(current), command.amount, command.reference, command.actor, now);
        throw new ConcurrentModificationError("debit");
      }

      const after = toLicense(row);
      const before = { ...after, creditsUsed: after.creditsUsed - command.amount };
      const { transaction } = debitTransition(
        before,
        command.amount,
        command.reference,
        command.actor,
        now
      );
      const [txRow] = await tx.insert(ledgerTransactions).values(transaction).returning();
      if (!txRow) throw new ConcurrentModificationError("debit");
      return { state: after, transaction: toTransaction(txRow) };
    });
  }

  async replenishCredits(command: ReplenishCreditsCommand): Promise<ReplenishOutcome> {
    return this.atomically("replenish", command.signal, async (tx) => {
      const user = await this.lockUser(tx, command.userId);

      // A replayed period is a no-op even if the license has since gone.
      const [previous] = await tx
        .select({ id: ledgerTransactions.id })
        .from(ledgerTransactions)
        .where(
          and(
            eq(ledgerTransactions.userId, command.userId),
            eq(ledgerTransactions.type, "replenish"),
            eq(ledgerTransactions.billingPeriod, command.billingPeriod)
          )
        );
      if (previous) {
        return { applied: false, state: user, transaction: null };
      }

      const transition = replenishTransition(
        user,
        command.amount,
        command.billingPeriod,
        command.actor,
        this.clock()
      );
      return { applied: true, ...(await this.commit(tx, transition)) };
    });
  }

  async listTransactions(filter: TransactionFilter): Promise<LedgerTransaction[]> {
    const rows = await this.db
      .select()
      .from(ledgerTransactions)
      .where(
        and(
          filter.userId ? eq(ledgerTransactions.userId, filter.userId) : undefined,
          filter.tenantId ? eq(ledgerTransactions.tenantId, filter.tenantId) : undefined,
          filter.type ? eq(ledgerTransactions.type, filter.type) : undefined
        )
      )
      .orderBy(desc(ledgerTransactions.createdAt))
      .limit(filter.limit);
    return rows.map(toTransaction);
  }

  async close(): Promise<void> {
    // The connection is owned by core/database/connection.ts
  }
}
