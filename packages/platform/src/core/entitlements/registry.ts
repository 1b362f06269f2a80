/**
 * Feature Registry
 *
 * The catalogue of every gateable capability and its default value.
 * Seeded at startup from data/features.json; at runtime only a
 * feature's active flag changes, and doing so affects every user.
 */

import type { FeatureDefinition, Logger } from "@tierline/contracts";
import type { EntitlementStore } from "./store.js";
import type { StorageGuard } from "./storage-guard.js";
import type { FeatureCache } from "./cache.js";
import { NotFoundError } from "./errors.js";

export interface FeatureRegistryDeps {
  store: EntitlementStore;
  guard: StorageGuard;
  cache: FeatureCache;
  logger: Logger;
}

export class FeatureRegistry {
  constructor(private readonly deps: FeatureRegistryDeps) {}

  async listDefinitions(): Promise<FeatureDefinition[]> {
    const { store, guard } = this.deps;
    return guard.run("listFeatures", () => store.listFeatures());
  }

  async getDefinition(key: string): Promise<FeatureDefinition> {
    const { store, guard } = this.deps;
    const definition = await guard.run("getFeature", () => store.getFeature(key));
    if (!definition) throw new NotFoundError("Feature", key);
    return definition;
  }

  /** Switches a feature on or off for everyone. */
  async setActive(key: string, isActive: boolean, actor: string | null = null): Promise<FeatureDefinition> {
    const { store, guard, cache, logger } = this.deps;
    const updated = await guard.run("setFeatureActive", () => store.setFeatureActive(key, isActive));
    if (!updated) throw new NotFoundError("Feature", key);

    cache.invalidateAll();
    logger.info("registry.set_active", { featureKey: key, isActive, actor });
    return updated;
  }
}

/**
 * Idempotent startup seeding. New keys are inserted; existing keys get
 * their metadata refreshed and keep their active flag.
 *
 * @returns The number of keys that were not in the store before
 */
export async function seedFeatureRegistry(
  store: EntitlementStore,
  catalog: FeatureDefinition[],
  logger: Logger
): Promise<number> {
  const existing = new Set((await store.listFeatures()).map((def) => def.key));
  await store.upsertFeatures(catalog);

  const added = catalog.filter((def) => !existing.has(def.key)).length;
  logger.info("registry.seeded", { total: catalog.length, added });
  return added;
}
