/**
 * Tier Configuration Store
 *
 * Tiers and their per-feature overrides. Admin input arrives as a bare
 * boolean or `{ enabled, limit?, expiresAt? }` and is normalised to the
 * feature's own kind before it is written. A write either applies to
 * every key in the request or to none of them.
 */

import {
  createTierSchema,
  type CreateTierInput,
  type FeatureDefinition,
  type FeatureValue,
  type Logger,
  type Tier,
  type TierFeatureInput,
  type TierFeatureOverride,
} from "@tierline/contracts";
import type { EntitlementStore } from "./store.js";
import type { StorageGuard } from "./storage-guard.js";
import type { FeatureCache } from "./cache.js";
import {
  InvalidFeatureValueError,
  NotFoundError,
  UnknownFeatureKeyError,
} from "./errors.js";

export interface TierConfigStoreDeps {
  store: EntitlementStore;
  guard: StorageGuard;
  cache: FeatureCache;
  logger: Logger;
}

/** Override map keyed by feature key */
export type TierFeatureMap = Record<string, { value: FeatureValue; expiresAt: string | null }>;

/**
 * "Team Plus" → "team_plus"
 */
function slugify(name: string): string {
  return name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** Converts one admin input to the tagged value the feature expects. */
export function normalizeTierFeatureInput(
  definition: FeatureDefinition,
  input: TierFeatureInput
): { value: FeatureValue; expiresAt: string | null } {
  const enabled = typeof input === "boolean" ? input : input.enabled;
  const limit = typeof input === "boolean" ? undefined : input.limit;
  const expiresAt = typeof input === "boolean" ? null : (input.expiresAt ?? null);

  if (definition.kind === "boolean") {
    if (limit !== undefined && limit !== null) {
      throw new InvalidFeatureValueError(definition.key, "boolean features take no limit");
    }
    return { value: { kind: "boolean", enabled }, expiresAt };
  }

  const fallback = definition.defaultValue.kind === "limit" ? definition.defaultValue.limit : null;
  return {
    value: { kind: "limit", enabled, limit: limit === undefined ? fallback : limit },
    expiresAt,
  };
}

export class TierConfigStore {
  constructor(private readonly deps: TierConfigStoreDeps) {}

  async listTiers(activeOnly = true): Promise<Tier[]> {
    const { store, guard } = this.deps;
    const tiers = await guard.run("listTiers", () => store.listTiers());
    return activeOnly ? tiers.filter((tier) => tier.isActive) : tiers;
  }

  async getTier(id: string): Promise<Tier> {
    const { store, guard } = this.deps;
    const tier = await guard.run("getTier", () => store.getTier(id));
    if (!tier) throw new NotFoundError("Tier", id);
    return tier;
  }

  async getTierFeatures(tierId: string): Promise<TierFeatureMap> {
    const { store, guard } = this.deps;
    await this.getTier(tierId);
    const overrides = await guard.run("getTierOverrides", () => store.getTierOverrides(tierId));

    const map: TierFeatureMap = {};
    for (const override of overrides) {
      map[override.featureKey] = { value: override.value, expiresAt: override.expiresAt };
    }
    return map;
  }

  /**
   * Bulk upsert of a tier's overrides. Unknown keys are reported all at
   * once and nothing is written. Every user on the tier sees the change
   * on their next resolution.
   */
  async setTierFeatures(
    tierId: string,
    features: Record<string, TierFeatureInput>,
    updatedBy: string | null
  ): Promise<TierFeatureMap> {
    const { store, guard, cache, logger } = this.deps;
    await this.getTier(tierId);

    const definitions = new Map(
      (await guard.run("listFeatures", () => store.listFeatures())).map((def) => [def.key, def] as const)
    );

    const unknown = Object.keys(features)
      .filter((key) => !definitions.has(key))
      .sort();
    if (unknown.length > 0) throw new UnknownFeatureKeyError(unknown);

    const overrides: TierFeatureOverride[] = [];
    for (const [featureKey, input] of Object.entries(features)) {
      const definition = definitions.get(featureKey);
      if (!definition) continue;
      overrides.push({ tierId, featureKey, ...normalizeTierFeatureInput(definition, input) });
    }

    await guard.run("upsertTierOverrides", () => store.upsertTierOverrides(overrides, updatedBy));
    cache.invalidateTier(tierId);
    logger.info("tiers.set_features", { tierId, keys: overrides.length, updatedBy });

    return this.getTierFeatures(tierId);
  }

  async createTier(input: CreateTierInput): Promise<Tier> {
    const { store, guard, logger } = this.deps;
    const { id, ...rest } = createTierSchema.parse(input);
    const tier: Tier = { id: id ?? slugify(rest.name), ...rest };

    const saved = await guard.run("upsertTier", () => store.upsertTier(tier));
    logger.info("tiers.created", { tierId: saved.id });
    return saved;
  }
}
