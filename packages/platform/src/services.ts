/**
 * Entitlement Services
 *
 * Composition root for the entitlement core. Builds one explicit
 * instance of each service around a single store, cache and guard, so
 * nothing relies on hidden module state and tests can build as many
 * independent copies as they need.
 */

import type {
  ComponentDescriptor,
  FeatureDefinition,
  Logger,
  ModelDescriptor,
} from "@tierline/contracts";
import type { AppConfig } from "./core/config/index.js";
import { createLogger } from "./core/observability/logger.js";
import type { EntitlementStore } from "./core/entitlements/store.js";
import { StorageGuard } from "./core/entitlements/storage-guard.js";
import { FeatureCache } from "./core/entitlements/cache.js";
import { FeatureRegistry, seedFeatureRegistry } from "./core/entitlements/registry.js";
import { TierConfigStore } from "./core/entitlements/tiers.js";
import { FeatureResolver } from "./core/entitlements/resolver.js";
import {
  loadComponentRegistry,
  loadDefaultTiers,
  loadFeatureCatalog,
  loadModelRegistry,
  type DefaultTier,
} from "./core/entitlements/catalog.js";
import { LicenseLedger } from "./core/ledger/ledger.js";
import { EnforcementPolicy } from "./core/enforcement/policy.js";
import {
  loadRouteFeatureConfig,
  type RouteFeatureConfig,
} from "./core/enforcement/route-features.js";

export type EntitlementSettings = AppConfig["entitlements"];

export const DEFAULT_ENTITLEMENT_SETTINGS: EntitlementSettings = {
  cacheTtlSeconds: 300,
  storageTimeoutMs: 5000,
  ledgerMaxRetries: 3,
  routeFeaturesPath: null,
};

export interface CreateEntitlementServicesOptions {
  store: EntitlementStore;
  settings?: Partial<EntitlementSettings>;
  /** Defaults to the bundled (or ROUTE_FEATURES_PATH) configuration */
  routeFeatures?: RouteFeatureConfig;
  models?: ModelDescriptor[];
  components?: ComponentDescriptor[];
  /** One logger per service context */
  logger?: (context: string) => Logger;
  clock?: () => Date;
}

export interface EntitlementServices {
  store: EntitlementStore;
  cache: FeatureCache;
  registry: FeatureRegistry;
  tiers: TierConfigStore;
  resolver: FeatureResolver;
  ledger: LicenseLedger;
  policy: EnforcementPolicy;
  settings: EntitlementSettings;
}

export function createEntitlementServices(
  options: CreateEntitlementServicesOptions
): EntitlementServices {
  const settings: EntitlementSettings = { ...DEFAULT_ENTITLEMENT_SETTINGS, ...options.settings };
  const loggerFor = options.logger ?? createLogger;
  const clock = options.clock ?? (() => new Date());
  const { store } = options;

  const guard = new StorageGuard({
    timeoutMs: settings.storageTimeoutMs,
    maxRetries: settings.ledgerMaxRetries,
    logger: loggerFor("storage"),
  });
  const cache = new FeatureCache({
    ttlMs: settings.cacheTtlSeconds * 1000,
    clock: () => clock().getTime(),
  });
  const components = options.components ?? loadComponentRegistry();

  const registry = new FeatureRegistry({ store, guard, cache, logger: loggerFor("registry") });
  const tiers = new TierConfigStore({ store, guard, cache, logger: loggerFor("tiers") });
  const resolver = new FeatureResolver({
    store,
    guard,
    cache,
    logger: loggerFor("resolver"),
    models: options.models ?? loadModelRegistry(),
    components,
    clock,
  });
  const ledger = new LicenseLedger({ store, guard, cache, logger: loggerFor("ledger"), clock });
  const policy = new EnforcementPolicy({
    resolver,
    config: options.routeFeatures ?? loadRouteFeatureConfig(settings.routeFeaturesPath),
    components,
    logger: loggerFor("enforcement"),
  });

  return { store, cache, registry, tiers, resolver, ledger, policy, settings };
}

export interface SeedOptions {
  features?: FeatureDefinition[];
  tiers?: DefaultTier[];
  logger?: Logger;
}

/**
 * Seeds the registry and the default tiers with their overrides.
 * Idempotent: run at every startup.
 */
export async function seedEntitlements(
  services: EntitlementServices,
  options: SeedOptions = {}
): Promise<{ featuresAdded: number; tiers: number }> {
  const logger = options.logger ?? createLogger("seed");
  const featuresAdded = await seedFeatureRegistry(
    services.store,
    options.features ?? loadFeatureCatalog(),
    logger
  );

  const defaults = options.tiers ?? loadDefaultTiers();
  for (const { features, ...tier } of defaults) {
    await services.tiers.createTier(tier);
    await services.tiers.setTierFeatures(tier.id, features, "seed");
  }

  return { featuresAdded, tiers: defaults.length };
}
