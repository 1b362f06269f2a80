/**
 * Layered resolution: each layer maps feature keys to values, and later
 * layers replace earlier ones key by key.
 */

import type {
  FeatureSource,
  FeatureValue,
  ResolvedFeature,
  ResolvedFeatureSet,
} from "@tierline/contracts";

export interface FeatureLayer {
  source: FeatureSource;
  values: ReadonlyMap<string, FeatureValue>;
}

/** Last write wins. */
export function mergeFeatureLayers(layers: readonly FeatureLayer[]): Record<string, ResolvedFeature> {
  const merged: Record<string, ResolvedFeature> = {};
  for (const layer of layers) {
    for (const [key, value] of layer.values) {
      merged[key] = { enabled: value.enabled, value, source: layer.source };
    }
  }
  return merged;
}

/** Own keys only: names inherited from Object.prototype are not features. */
export function featureOf(resolved: ResolvedFeatureSet, key: string): ResolvedFeature | undefined {
  return Object.hasOwn(resolved.features, key) ? resolved.features[key] : undefined;
}
