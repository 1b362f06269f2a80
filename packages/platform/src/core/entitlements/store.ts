/**
 * Entitlement Store
 *
 * The authoritative store behind the Registry, the Tier Configuration
 * Store and the Ledger. Reads return plain contract objects; every
 * ledger mutation is one atomic unit — it either commits completely
 * (state change plus its ledger row) or not at all.
 *
 * Implementations:
 *   - PostgresEntitlementStore — production (drizzle + postgres.js)
 *   - MemoryEntitlementStore   — development fallback and tests
 */

import type {
  FeatureDefinition,
  LedgerTransaction,
  TenantLicensePool,
  Tier,
  TierFeatureOverride,
  TransactionType,
  UserLicenseState,
} from "@tierline/contracts";

export interface MutationCommand {
  /** Checked immediately before writing; once aborted, nothing is written. */
  signal?: AbortSignal;
}

export interface AssignLicenseCommand extends MutationCommand {
  userId: string;
  tierId: string;
  actor: string | null;
}

export interface UnassignLicenseCommand extends MutationCommand {
  userId: string;
  actor: string | null;
}

export interface ChangeTierCommand extends MutationCommand {
  userId: string;
  tierId: string;
  preserveCredits: boolean;
  actor: string | null;
}

export interface DebitCreditsCommand extends MutationCommand {
  userId: string;
  amount: number;
  reference: string;
  actor: string | null;
}

export interface ReplenishCreditsCommand extends MutationCommand {
  userId: string;
  amount: number;
  billingPeriod: string;
  actor: string | null;
}

export interface SetPoolCapacityCommand extends MutationCommand {
  tenantId: string;
  tierId: string;
  totalCount: number;
  actor: string | null;
}

/** The committed state and the ledger row written with it. */
export interface LicenseMutation {
  state: UserLicenseState;
  transaction: LedgerTransaction;
}

/** `applied: false` means the billing period was already replenished. */
export interface ReplenishOutcome {
  applied: boolean;
  state: UserLicenseState;
  transaction: LedgerTransaction | null;
}

export interface TransactionFilter {
  userId?: string;
  tenantId?: string;
  type?: TransactionType;
  limit: number;
}

export interface EntitlementStore {
  // Feature Registry
  listFeatures(): Promise<FeatureDefinition[]>;
  getFeature(key: string): Promise<FeatureDefinition | null>;
  /** Insert new definitions, refresh metadata of existing ones; `isActive` is kept. */
  upsertFeatures(definitions: FeatureDefinition[]): Promise<void>;
  setFeatureActive(key: string, isActive: boolean): Promise<FeatureDefinition | null>;

  // Tiers
  listTiers(): Promise<Tier[]>;
  getTier(id: string): Promise<Tier | null>;
  upsertTier(tier: Tier): Promise<Tier>;
  getTierOverrides(tierId: string): Promise<TierFeatureOverride[]>;
  upsertTierOverrides(overrides: TierFeatureOverride[], updatedBy: string | null): Promise<void>;

  // Users
  /** Creates the user record if missing. License fields start cleared. */
  ensureUser(userId: string, tenantId: string): Promise<UserLicenseState>;
  getLicense(userId: string): Promise<UserLicenseState | null>;

  // Pools
  listPools(tenantId: string): Promise<TenantLicensePool[]>;
  setPoolCapacity(command: SetPoolCapacityCommand): Promise<TenantLicensePool>;

  // Ledger mutations
  assignLicense(command: AssignLicenseCommand): Promise<LicenseMutation>;
  unassignLicense(command: UnassignLicenseCommand): Promise<LicenseMutation>;
  changeTier(command: ChangeTierCommand): Promise<LicenseMutation>;
  debitCredits(command: DebitCreditsCommand): Promise<LicenseMutation>;
  replenishCredits(command: ReplenishCreditsCommand): Promise<ReplenishOutcome>;

  /** Newest first */
  listTransactions(filter: TransactionFilter): Promise<LedgerTransaction[]>;

  close(): Promise<void>;
}
