/**
 * Route-to-Feature Configuration
 *
 * External configuration for the Enforcement Layer, read from
 * config/route-features.json (or ROUTE_FEATURES_PATH):
 *
 *   exempt        — path patterns that always bypass checks
 *   routes        — { pattern, features } in priority order; first match wins
 *   operations    — named operation → features
 *   providers     — model provider → feature key
 *   vectorStores  — vector store → feature key
 *
 * Route and operation feature lists use OR semantics: any one enabled
 * key authorizes. Patterns are regular expressions matched case-insensitively.
 */

import { z } from "zod";
import { featureKeySchema } from "@tierline/contracts";
import { readJsonFile } from "../entitlements/catalog.js";

const DEFAULT_PATH = new URL("../../../config/route-features.json", import.meta.url);

const patternSchema = z.string().refine(
  (pattern) => {
    try {
      new RegExp(pattern, "i");
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" }
);

export const routeFeatureConfigSchema = z.object({
  exempt: z.array(patternSchema).default([]),
  routes: z
    .array(z.object({ pattern: patternSchema, features: z.array(featureKeySchema) }))
    .default([]),
  operations: z.record(z.string(), z.array(featureKeySchema)).default({}),
  providers: z.record(z.string(), featureKeySchema).default({}),
  vectorStores: z.record(z.string(), featureKeySchema).default({}),
});

export type RouteFeatureConfigInput = z.input<typeof routeFeatureConfigSchema>;

export interface RouteRule {
  pattern: RegExp;
  features: string[];
}

/**
 * Validated configuration with patterns compiled. Lookup tables are Maps
 * so caller-supplied names only ever match configured entries.
 */
export interface RouteFeatureConfig {
  exempt: RegExp[];
  routes: RouteRule[];
  operations: ReadonlyMap<string, string[]>;
  providers: ReadonlyMap<string, string>;
  vectorStores: ReadonlyMap<string, string>;
}

export function compileRouteFeatureConfig(input: RouteFeatureConfigInput): RouteFeatureConfig {
  const config = routeFeatureConfigSchema.parse(input);
  return {
    exempt: config.exempt.map((pattern) => new RegExp(pattern, "i")),
    routes: config.routes.map((rule) => ({
      pattern: new RegExp(rule.pattern, "i"),
      features: rule.features,
    })),
    operations: new Map(Object.entries(config.operations)),
    providers: new Map(Object.entries(config.providers)),
    vectorStores: new Map(Object.entries(config.vectorStores)),
  };
}

export function loadRouteFeatureConfig(path?: string | null): RouteFeatureConfig {
  const raw = readJsonFile(path ?? DEFAULT_PATH, routeFeatureConfigSchema);
  return compileRouteFeatureConfig(raw);
}

/** Query strings never take part in matching. */
function pathOnly(path: string): string {
  const query = path.indexOf("?");
  return query === -1 ? path : path.slice(0, query);
}

export function isExemptPath(config: RouteFeatureConfig, path: string): boolean {
  const target = pathOnly(path);
  return config.exempt.some((pattern) => pattern.test(target));
}

/** Features of the first matching route, or null when no route matches. */
export function routeFeatures(config: RouteFeatureConfig, path: string): string[] | null {
  const target = pathOnly(path);
  const rule = config.routes.find((r) => r.pattern.test(target));
  return rule ? rule.features : null;
}
