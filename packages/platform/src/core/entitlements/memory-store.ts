/**
 * In-Process Entitlement Store
 *
 * Keeps every table in Maps. Used when no DATABASE_URL is configured and
 * by the test suites. Each operation awaits a simulated I/O round trip
 * first, then runs its whole read-check-write as one synchronous block,
 * so concurrent callers interleave between operations but never inside one.
 */

import { randomUUID } from "node:crypto";
import { setTimeout as sleep } from "node:timers/promises";
import type {
  FeatureDefinition,
  LedgerTransaction,
  TenantLicensePool,
  Tier,
  TierFeatureOverride,
  UserLicenseState,
} from "@tierline/contracts";
import { NotFoundError, NotLicensedError } from "./errors.js";
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
  clearedLicense,
  debitTransition,
  releaseSeat,
  replenishTransition,
  resizePool,
  takeSeat,
  tierChangeTransition,
  unassignTransition,
  type Transition,
} from "../ledger/rules.js";

export interface MemoryStoreOptions {
  /** Simulated round-trip time per call */
  latencyMs?: number;
  clock?: () => Date;
}

function poolKey(tenantId: string, tierId: string): string {
  return `${tenantId}:${tierId}`;
}

export class MemoryEntitlementStore implements EntitlementStore {
  private readonly features = new Map<string, FeatureDefinition>();
  private readonly tiers = new Map<string, Tier>();
  private readonly overrides = new Map<string, Map<string, TierFeatureOverride>>();
  private readonly users = new Map<string, UserLicenseState>();
  private readonly pools = new Map<string, TenantLicensePool>();
  private readonly transactions: LedgerTransaction[] = [];

  private latencyMs: number;
  private readonly clock: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.latencyMs = options.latencyMs ?? 0;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Changes the simulated round trip for calls that start afterwards. */
  setLatency(latencyMs: number): void {
    this.latencyMs = latencyMs;
  }

  private async roundTrip(): Promise<void> {
    if (this.latencyMs > 0) {
      await sleep(this.latencyMs);
    } else {
      await Promise.resolve();
    }
  }

  // -------------------------------------------------------------------------
  // Feature Registry
  // -------------------------------------------------------------------------

  async listFeatures(): Promise<FeatureDefinition[]> {
    await this.roundTrip();
    return [...this.features.values()]
      .sort((a, b) => a.key.localeCompare(b.key))
      .map((def) => structuredClone(def));
  }

  async getFeature(key: string): Promise<FeatureDefinition | null> {
    await this.roundTrip();
    const def = this.features.get(key);
    return def ? structuredClone(def) : null;
  }

  async upsertFeatures(definitions: FeatureDefinition[]): Promise<void> {
    await this.roundTrip();
    for (const def of definitions) {
      const existing = this.features.get(def.key);
      this.features.set(def.key, {
        ...structuredClone(def),
        isActive: existing ? existing.isActive : def.isActive,
      });
    }
  }

  async setFeatureActive(key: string, isActive: boolean): Promise<FeatureDefinition | null> {
    await this.roundTrip();
    const def = this.features.get(key);
    if (!def) return null;
    const updated = { ...def, isActive };
    this.features.set(key, updated);
    return structuredClone(updated);
  }

  // -------------------------------------------------------------------------
  // Tiers
  // -------------------------------------------------------------------------

  async listTiers(): Promise<Tier[]> {
    await this.roundTrip();
    return [...this.tiers.values()]
      .sort((a, b) => a.sortOrder - b.sortOrder)
      .map((tier) => ({ ...tier }));
  }

  async getTier(id: string): Promise<Tier | null> {
    await this.roundTrip();
    const tier = this.tiers.get(id);
    return tier ? { ...tier } : null;
  }

  async upsertTier(tier: Tier): Promise<Tier> {
    await this.roundTrip();
    this.tiers.set(tier.id, { ...tier });
    return { ...tier };
  }

  async getTierOverrides(tierId: string): Promise<TierFeatureOverride[]> {
    await this.roundTrip();
    const forTier = this.overrides.get(tierId);
    if (!forTier) return [];
    return [...forTier.values()].map((o) => structuredClone(o));
  }

  async upsertTierOverrides(overrides: TierFeatureOverride[]): Promise<void> {
    await this.roundTrip();
    for (const override of overrides) {
      let forTier = this.overrides.get(override.tierId);
      if (!forTier) {
        forTier = new Map();
        this.overrides.set(override.tierId, forTier);
      }
      forTier.set(override.featureKey, structuredClone(override));
    }
  }

  // -------------------------------------------------------------------------
  // Users
  // -------------------------------------------------------------------------

  async ensureUser(userId: string, tenantId: string): Promise<UserLicenseState> {
    await this.roundTrip();
    let user = this.users.get(userId);
    if (!user) {
      user = clearedLicense(userId, tenantId);
      this.users.set(userId, user);
    }
    return { ...user };
  }

  async getLicense(userId: string): Promise<UserLicenseState | null> {
    await this.roundTrip();
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  private requireUser(userId: string): UserLicenseState {
    const user = this.users.get(userId);
    if (!user) throw new NotFoundError("User", userId);
    return user;
  }

  private requireTier(tierId: string): Tier {
    const tier = this.tiers.get(tierId);
    if (!tier) throw new NotFoundError("Tier", tierId);
    return tier;
  }

  // -------------------------------------------------------------------------
  // Pools
  // -------------------------------------------------------------------------

  async listPools(tenantId: string): Promise<TenantLicensePool[]> {
    await this.roundTrip();
    return [...this.pools.values()]
      .filter((pool) => pool.tenantId === tenantId)
      .sort((a, b) => a.tierId.localeCompare(b.tierId))
      .map((pool) => ({ ...pool }));
  }

  async setPoolCapacity(command: SetPoolCapacityCommand): Promise<TenantLicensePool> {
    await this.roundTrip();
    command.signal?.throwIfAborted();
    const tier = this.requireTier(command.tierId);
    const key = poolKey(command.tenantId, command.tierId);
    const existing = this.pools.get(key) ?? null;
    const counts = resizePool(existing, tier, command.totalCount);
    const now = this.clock().toISOString();

    const pool: TenantLicensePool = {
      tenantId: command.tenantId,
      tierId: command.tierId,
      ...counts,
      createdBy: existing ? existing.createdBy : command.actor,
      createdAt: existing ? existing.createdAt : now,
      updatedAt: now,
    };
    this.pools.set(key, pool);
    return { ...pool };
  }

  // -------------------------------------------------------------------------
  // Ledger mutations
  // -------------------------------------------------------------------------

  /** Appends the ledger row; only called once every check has passed. */
  private commit(transition: Transition): LicenseMutation {
    const transaction: LedgerTransaction = {
      ...transition.transaction,
      id: randomUUID(),
      createdAt: this.clock().toISOString(),
    };
    this.users.set(transition.state.userId, transition.state);
    this.transactions.push(transaction);
    return { state: { ...transition.state }, transaction: structuredClone(transaction) };
  }

  async assignLicense(command: AssignLicenseCommand): Promise<LicenseMutation> {
    await this.roundTrip();
    command.signal?.throwIfAborted();
    const user = this.requireUser(command.userId);
    const tier = this.requireTier(command.tierId);
    const transition = assignTransition(user, tier, command.actor, this.clock());

    const key = poolKey(user.tenantId, tier.id);
    const pool = takeSeat(this.pools.get(key) ?? null, user.tenantId, tier.id);

    this.pools.set(key, { ...pool, updatedAt: this.clock().toISOString() });
    return this.commit(transition);
  }

  async unassignLicense(command: UnassignLicenseCommand): Promise<LicenseMutation> {
    await this.roundTrip();
    command.signal?.throwIfAborted();
    const user = this.requireUser(command.userId);
    const heldTierId = user.licenseTierId;
    const transition = unassignTransition(user, command.actor);

    if (heldTierId !== null) {
      const key = poolKey(user.tenantId, heldTierId);
      const pool = this.pools.get(key);
      if (pool) this.pools.set(key, { ...releaseSeat(pool), updatedAt: this.clock().toISOString() });
    }
    return this.commit(transition);
  }

  async changeTier(command: ChangeTierCommand): Promise<LicenseMutation> {
    await this.roundTrip();
    command.signal?.throwIfAborted();
    const user = this.requireUser(command.userId);
    const to = this.requireTier(command.tierId);
    if (!user.licenseIsActive || user.licenseTierId === null) {
      throw new NotLicensedError(user.userId);
    }
    const from = this.requireTier(user.licenseTierId);

    const transition = tierChangeTransition(
      user,
      from,
      to,
      command.preserveCredits,
      command.actor,
      this.clock()
    );

    // Take the new seat before releasing the old one, in the same block.
    const toKey = poolKey(user.tenantId, to.id);
    const acquired = takeSeat(this.pools.get(toKey) ?? null, user.tenantId, to.id);
    const fromKey = poolKey(user.tenantId, from.id);
    const held = this.pools.get(fromKey);
    const now = this.clock().toISOString();

    this.pools.set(toKey, { ...acquired, updatedAt: now });
    if (held) this.pools.set(fromKey, { ...releaseSeat(held), updatedAt: now });
    return this.commit(transition);
  }

  async debitCredits(command: DebitCreditsCommand): Promise<LicenseMutation> {
    await this.roundTrip();
    command.signal?.throwIfAborted();
    const user = this.requireUser(command.userId);
    return this.commit(
      debitTransition(user, command.amount, command.reference, command.actor, this.clock())
    );
  }

  async replenishCredits(command: ReplenishCreditsCommand): Promise<ReplenishOutcome> {
    await this.roundTrip();
    command.signal?.throwIfAborted();
    const user = this.requireUser(command.userId);

    // A replayed period is a no-op even if the license has since gone.
    const replay = this.transactions.some(
      (tx) =>
        tx.type === "replenish" &&
        tx.userId === command.userId &&
        tx.billingPeriod === command.billingPeriod
    );
    if (replay) {
      return { applied: false, state: { ...user }, transaction: null };
    }

    const transition = replenishTransition(
      user,
      command.amount,
      command.billingPeriod,
      command.actor,
      this.clock()
    );
    return { applied: true, ...this.commit(transition) };
  }

  async listTransactions(filter: TransactionFilter): Promise<LedgerTransaction[]> {
    await this.roundTrip();
    const matches: LedgerTransaction[] = [];
    for (let i = this.transactions.length - 1; i >= 0 && matches.length < filter.limit; i--) {
      const tx = this.transactions[i];
      if (filter.userId && tx.userId !== filter.userId) continue;
      if (filter.tenantId && tx.tenantId !== filter.tenantId) continue;
      if (filter.type && tx.type !== filter.type) continue;
      matches.push(structuredClone(tx));
    }
    return matches;
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}
