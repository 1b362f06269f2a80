/**
 * Resolver
 *
 * Computes a user's effective feature set: registry defaults, then the
 * overrides of the tier the user holds, merged last-write-wins. Results
 * are cached per user in the injected FeatureCache.
 *
 * Failure policy:
 *   - resolve(), checkLimit() and the list queries propagate
 *     StorageUnavailableError
 *   - isEnabled() fails closed: any failure means "not enabled"
 */

import type {
  Caller,
  ComponentDescriptor,
  FeatureDefinition,
  FeatureSource,
  FeatureValue,
  Logger,
  ModelDescriptor,
  ResolvedFeatureSet,
  Tier,
  TierFeatureOverride,
} from "@tierline/contracts";
import type { EntitlementStore } from "./store.js";
import type { StorageGuard } from "./storage-guard.js";
import type { FeatureCache } from "./cache.js";
import { featureOf, mergeFeatureLayers, type FeatureLayer } from "./merge.js";
import { InvalidRequestError } from "./errors.js";
import { hasUsableLicense } from "../ledger/rules.js";
import { isSuperAdmin } from "../enforcement/superadmin.js";

export interface ResolverDeps {
  store: EntitlementStore;
  guard: StorageGuard;
  cache: FeatureCache;
  logger: Logger;
  models: ModelDescriptor[];
  components: ComponentDescriptor[];
  clock?: () => Date;
}

export interface FeatureStatus {
  featureKey: string;
  enabled: boolean;
  source: FeatureSource | null;
}

/**
 * A usage figure measured against a limit feature. `limit` and
 * `remaining` are null when the limit is lifted.
 */
export interface LimitCheck {
  featureKey: string;
  allowed: boolean;
  limit: number | null;
  currentUsage: number;
  remaining: number | null;
}

/** Every feature switched on, limits lifted. */
function unrestricted(value: FeatureValue): FeatureValue {
  return value.kind === "limit"
    ? { kind: "limit", enabled: true, limit: null }
    : { kind: "boolean", enabled: true };
}

export class FeatureResolver {
  private readonly clock: () => Date;

  constructor(private readonly deps: ResolverDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async resolve(userId: string): Promise<ResolvedFeatureSet> {
    const { cache } = this.deps;
    const cached = cache.get(userId);
    if (cached) return cached;

    const ticket = cache.ticket();
    const resolved = await this.compute(userId);
    cache.set(userId, resolved, ticket);
    return resolved;
  }

  /**
   * Resolution as seen by an authenticated caller. Super-admins get every
   * active feature enabled without touching the store.
   */
  async resolveForCaller(caller: Caller): Promise<ResolvedFeatureSet> {
    if (!isSuperAdmin(caller)) return this.resolve(caller.userId);

    const { store, guard } = this.deps;
    const definitions = await guard.run("listFeatures", () => store.listFeatures());
    return this.superAdminSet(caller.userId, definitions);
  }

  async isEnabled(userId: string, featureKey: string): Promise<boolean> {
    try {
      const resolved = await this.resolve(userId);
      return featureOf(resolved, featureKey)?.enabled === true;
    } catch (error) {
      this.deps.logger.warn("Feature check failed closed", {
        userId,
        featureKey,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /** Single-key view for the check endpoint. */
  statusOf(resolved: ResolvedFeatureSet, featureKey: string): FeatureStatus {
    const feature = featureOf(resolved, featureKey);
    return {
      featureKey,
      enabled: feature?.enabled === true,
      source: feature ? feature.source : null,
    };
  }

  /** Can the user go one past `currentUsage` of the limited resource? */
  async checkLimit(userId: string, featureKey: string, currentUsage: number): Promise<LimitCheck> {
    return this.evaluateLimit(await this.resolve(userId), featureKey, currentUsage);
  }

  /**
   * A disabled or unknown feature allows nothing; a null limit allows
   * everything. Boolean features carry no limit and are rejected.
   */
  evaluateLimit(resolved: ResolvedFeatureSet, featureKey: string, currentUsage: number): LimitCheck {
    if (!Number.isInteger(currentUsage) || currentUsage < 0) {
      throw new InvalidRequestError("currentUsage must be a non-negative integer", { currentUsage });
    }
    const feature = featureOf(resolved, featureKey);
    if (feature && feature.value.kind !== "limit") {
      throw new InvalidRequestError(`${featureKey} is not a limit feature`, { featureKey });
    }

    if (!feature || !feature.enabled) {
      return { featureKey, allowed: false, limit: 0, currentUsage, remaining: 0 };
    }
    const { limit } = feature.value;
    if (limit === null) {
      return { featureKey, allowed: true, limit: null, currentUsage, remaining: null };
    }
    return {
      featureKey,
      allowed: currentUsage < limit,
      limit,
      currentUsage,
      remaining: Math.max(0, limit - currentUsage),
    };
  }

  async enabledModels(userId: string): Promise<ModelDescriptor[]> {
    return this.modelsFor(await this.resolve(userId));
  }

  async enabledComponents(userId: string): Promise<ComponentDescriptor[]> {
    return this.componentsFor(await this.resolve(userId));
  }

  modelsFor(resolved: ResolvedFeatureSet): ModelDescriptor[] {
    return this.deps.models.filter((model) => featureOf(resolved, model.featureKey)?.enabled === true);
  }

  /** Public components (no feature key) are always included. */
  componentsFor(resolved: ResolvedFeatureSet): ComponentDescriptor[] {
    return this.deps.components.filter(
      (component) =>
        component.featureKey === null || featureOf(resolved, component.featureKey)?.enabled === true
    );
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async compute(userId: string): Promise<ResolvedFeatureSet> {
    const { store, guard } = this.deps;
    const now = this.clock();

    const [license, definitions] = await Promise.all([
      guard.run("getLicense", () => store.getLicense(userId)),
      guard.run("listFeatures", () => store.listFeatures()),
    ]);

    const tierId = license && hasUsableLicense(license, now) ? license.licenseTierId : null;
    let tier: Tier | null = null;
    let overrides: TierFeatureOverride[] = [];
    if (tierId) {
      [tier, overrides] = await Promise.all([
        guard.run("getTier", () => store.getTier(tierId)),
        guard.run("getTierOverrides", () => store.getTierOverrides(tierId)),
      ]);
    }

    const active = new Map(
      definitions.filter((def) => def.isActive).map((def) => [def.key, def] as const)
    );

    const layers: FeatureLayer[] = [
      {
        source: "default",
        values: new Map([...active.values()].map((def) => [def.key, def.defaultValue] as const)),
      },
    ];
    if (tierId) {
      layers.push({ source: "tier", values: this.tierLayer(overrides, active, now) });
    }

    return {
      userId,
      tierId,
      tierName: tier ? tier.name : null,
      features: mergeFeatureLayers(layers),
      computedAt: now.toISOString(),
    };
  }

  /**
   * Keeps overrides that are unexpired, name an active feature, and carry
   * a value of that feature's kind. Anything else is logged and dropped.
   */
  private tierLayer(
    overrides: TierFeatureOverride[],
    active: Map<string, FeatureDefinition>,
    now: Date
  ): Map<string, FeatureValue> {
    const { logger } = this.deps;
    const values = new Map<string, FeatureValue>();

    for (const override of overrides) {
      if (override.expiresAt !== null && Date.parse(override.expiresAt) <= now.getTime()) {
        continue;
      }
      const definition = active.get(override.featureKey);
      if (!definition) {
        logger.warn("Ignoring override for unknown or inactive feature", {
          tierId: override.tierId,
          featureKey: override.featureKey,
        });
        continue;
      }
      if (definition.kind !== override.value.kind) {
        logger.warn("Ignoring override of the wrong kind", {
          tierId: override.tierId,
          featureKey: override.featureKey,
          expected: definition.kind,
          actual: override.value.kind,
        });
        continue;
      }
      values.set(override.featureKey, override.value);
    }
    return values;
  }

  private superAdminSet(userId: string, definitions: FeatureDefinition[]): ResolvedFeatureSet {
    const values = new Map(
      definitions
        .filter((def) => def.isActive)
        .map((def) => [def.key, unrestricted(def.defaultValue)] as const)
    );
    return {
      userId,
      tierId: null,
      tierName: null,
      features: mergeFeatureLayers([{ source: "superadmin", values }]),
      computedAt: this.clock().toISOString(),
    };
  }
}
