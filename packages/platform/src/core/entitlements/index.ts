export * from "./errors.js";
export type {
  EntitlementStore,
  AssignLicenseCommand,
  UnassignLicenseCommand,
  ChangeTierCommand,
  DebitCreditsCommand,
  ReplenishCreditsCommand,
  SetPoolCapacityCommand,
  LicenseMutation,
  ReplenishOutcome,
  TransactionFilter,
} from "./store.js";
export { MemoryEntitlementStore, type MemoryStoreOptions } from "./memory-store.js";
export {
  PostgresEntitlementStore,
  isConflictError,
  type PostgresStoreOptions,
} from "./postgres-store.js";
export { StorageGuard, type StorageGuardOptions } from "./storage-guard.js";
export { FeatureCache, type FeatureCacheOptions } from "./cache.js";
export { featureOf, mergeFeatureLayers, type FeatureLayer } from "./merge.js";
export { FeatureRegistry, seedFeatureRegistry, type FeatureRegistryDeps } from "./registry.js";
export {
  TierConfigStore,
  normalizeTierFeatureInput,
  type TierConfigStoreDeps,
  type TierFeatureMap,
} from "./tiers.js";
export {
  FeatureResolver,
  type ResolverDeps,
  type FeatureStatus,
  type LimitCheck,
} from "./resolver.js";
export {
  loadFeatureCatalog,
  loadDefaultTiers,
  loadModelRegistry,
  loadComponentRegistry,
  readJsonFile,
  type DefaultTier,
} from "./catalog.js";
