/**
 * Enforcement Layer
 *
 * Decides whether a caller may perform an operation. Holds no mutable
 * state: every decision is a function of the Resolver's output and the
 * static route-to-feature configuration.
 *
 * Order of evaluation:
 *   1. Super-admin pre-check (always allowed)
 *   2. Exempt routes (always allowed)
 *   3. Mapping: unmapped operations are allowed
 *   4. Feature evaluation against the caller's resolved set
 *
 * Routes and named actions need any one of their features. A workflow
 * needs every requirement group it implies, and a denial lists all of
 * the unmet keys. When features cannot be resolved the decision is a
 * retryable "unavailable" denial.
 */

import type {
  AuthorizationDecision,
  Caller,
  ComponentDescriptor,
  Logger,
  Operation,
  ResolvedFeatureSet,
} from "@tierline/contracts";
import type { FeatureResolver } from "../entitlements/resolver.js";
import { featureOf } from "../entitlements/merge.js";
import { isSuperAdmin } from "./superadmin.js";
import { isExemptPath, routeFeatures, type RouteFeatureConfig } from "./route-features.js";
import { workflowRequirements } from "./workflow.js";

export interface EnforcementPolicyDeps {
  resolver: FeatureResolver;
  config: RouteFeatureConfig;
  components: ComponentDescriptor[];
  logger: Logger;
}

/** The requirement groups an operation implies, or "exempt". */
export type Requirements = "exempt" | string[][];

export class EnforcementPolicy {
  constructor(private readonly deps: EnforcementPolicyDeps) {}

  requirementsOf(operation: Operation): Requirements {
    const { config, components } = this.deps;

    switch (operation.type) {
      case "route": {
        if (isExemptPath(config, operation.path)) return "exempt";
        const features = routeFeatures(config, operation.path);
        return features && features.length > 0 ? [features] : [];
      }

      case "action": {
        const name = operation.name.toLowerCase();
        let features = config.operations.get(name) ?? [];

        if (name === "use_model" || name === "use_embedding") {
          const provider = operation.context?.provider?.toLowerCase();
          const feature = provider ? config.providers.get(provider) : undefined;
          if (feature) features = [feature];
        }
        if (name === "use_vector_store") {
          const store = operation.context?.vectorStore?.toLowerCase();
          const feature = store ? config.vectorStores.get(store) : undefined;
          if (feature) features = [feature];
        }
        return features.length > 0 ? [features] : [];
      }

      case "workflow":
        return workflowRequirements(
          { nodes: operation.graph.nodes, streaming: operation.streaming, batch: operation.batch },
          config,
          components
        );
    }
  }

  async authorize(caller: Caller, operation: Operation): Promise<AuthorizationDecision> {
    if (isSuperAdmin(caller)) return { allowed: true, reason: "superadmin" };

    const requirements = this.requirementsOf(operation);
    if (requirements === "exempt") return { allowed: true, reason: "exempt" };
    if (requirements.length === 0) return { allowed: true, reason: "unmapped" };

    let resolved: ResolvedFeatureSet;
    try {
      resolved = await this.deps.resolver.resolve(caller.userId);
    } catch (error) {
      this.deps.logger.warn("Authorization failed closed: features unavailable", {
        userId: caller.userId,
        operation: operation.type,
        error: error instanceof Error ? error.message : String(error),
      });
      return { allowed: false, reason: "unavailable", retryable: true, unmetFeatures: [] };
    }

    const unmet = new Set<string>();
    for (const group of requirements) {
      const satisfied = group.some((key) => featureOf(resolved, key)?.enabled === true);
      if (!satisfied) group.forEach((key) => unmet.add(key));
    }

    if (unmet.size === 0) return { allowed: true, reason: "satisfied" };
    return { allowed: false, reason: "missing_features", unmetFeatures: [...unmet].sort() };
  }
}
