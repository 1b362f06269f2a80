/**
 * Test Fixtures
 *
 * A small, self-contained catalogue (features, tiers, models, components,
 * route map) and a builder that wires the entitlement services around an
 * in-process store. Used by the platform test suites only.
 */

import type {
  Caller,
  ComponentDescriptor,
  FeatureDefinition,
  ModelDescriptor,
} from "@tierline/contracts";
import { silentLogger } from "../core/observability/logger.js";
import { MemoryEntitlementStore } from "../core/entitlements/memory-store.js";
import type { DefaultTier } from "../core/entitlements/catalog.js";
import { compileRouteFeatureConfig } from "../core/enforcement/route-features.js";
import {
  createEntitlementServices,
  seedEntitlements,
  type EntitlementServices,
  type EntitlementSettings,
} from "../services.js";

export const TENANT_A = "tenant-a";
export const TENANT_B = "tenant-b";

export function caller(userId: string, overrides: Partial<Caller> = {}): Caller {
  return { userId, tenantId: TENANT_A, roles: ["member"], type: "human", ...overrides };
}

function boolFeature(
  key: string,
  enabled: boolean,
  extra: Partial<FeatureDefinition> = {}
): FeatureDefinition {
  return {
    key,
    name: key,
    description: null,
    category: "ui",
    kind: "boolean",
    defaultValue: { kind: "boolean", enabled },
    isPremium: !enabled,
    isActive: true,
    dependsOn: [],
    ...extra,
  };
}

export const FEATURES: FeatureDefinition[] = [
  boolFeature("models.openai", false, { category: "models" }),
  boolFeature("models.anthropic", true, { category: "models" }),
  boolFeature("models.mistral", false, { category: "models" }),
  boolFeature("integrations.mcp", false, { category: "integrations" }),
  boolFeature("integrations.vector_stores.pinecone", false, { category: "integrations" }),
  boolFeature("api.streaming_responses", true, { category: "api" }),
  boolFeature("api.batch_execution", false, { category: "api" }),
  boolFeature("ui.flow_builder.export_flow", false),
  boolFeature("components.logic", true, { category: "components" }),
  {
    key: "limits.max_flows",
    name: "Max Flows",
    description: null,
    category: "limits",
    kind: "limit",
    defaultValue: { kind: "limit", enabled: true, limit: 10 },
    isPremium: false,
    isActive: true,
    dependsOn: [],
  },
];

export const TIERS: DefaultTier[] = [
  {
    id: "basic",
    name: "Basic",
    description: null,
    priceCents: 2900,
    seatPriceCents: 900,
    currency: "usd",
    defaultCredits: 1000,
    creditsPerMonth: 1000,
    maxUsers: 5,
    sortOrder: 10,
    isActive: true,
    features: { "limits.max_flows": { enabled: true, limit: 20 } },
  },
  {
    id: "pro",
    name: "Pro",
    description: null,
    priceCents: 9900,
    seatPriceCents: 2900,
    currency: "usd",
    defaultCredits: 5000,
    creditsPerMonth: 5000,
    maxUsers: null,
    sortOrder: 20,
    isActive: true,
    features: {
      "models.openai": true,
      "integrations.mcp": true,
      "limits.max_flows": { enabled: true, limit: 100 },
    },
  },
];

export const MODELS: ModelDescriptor[] = [
  {
    provider: "openai",
    modelId: "gpt-4o",
    modelName: "GPT-4o",
    modelType: "chat",
    supportsTools: true,
    supportsVision: true,
    maxTokens: 128000,
    featureKey: "models.openai",
  },
  {
    provider: "anthropic",
    modelId: "claude-3-5-sonnet",
    modelName: "Claude 3.5 Sonnet",
    modelType: "chat",
    supportsTools: true,
    supportsVision: true,
    maxTokens: 200000,
    featureKey: "models.anthropic",
  },
];

export const COMPONENTS: ComponentDescriptor[] = [
  { componentKey: "ChatInput", displayName: "Chat Input", category: "inputs", featureKey: null },
  { componentKey: "OpenAIModel", displayName: "OpenAI", category: "models", featureKey: "models.openai" },
  { componentKey: "ConditionalRouter", displayName: "If-Else", category: "logic", featureKey: "components.logic" },
  { componentKey: "Pinecone", displayName: "Pinecone", category: "vectorstores", featureKey: "integrations.vector_stores.pinecone" },
];

export const ROUTE_FEATURES = compileRouteFeatureConfig({
  exempt: ["^/api/health", "^/api/features"],
  routes: [
    { pattern: "^/api/mcp/servers", features: ["integrations.mcp", "ui.flow_builder.export_flow"] },
    { pattern: "^/api/flows/.*/export$", features: ["ui.flow_builder.export_flow"] },
    { pattern: "^/api/batch", features: ["api.batch_execution"] },
  ],
  operations: {
    execute_flow: [],
    execute_flow_streaming: ["api.streaming_responses"],
    execute_batch: ["api.batch_execution"],
    export_flow: ["ui.flow_builder.export_flow"],
    use_model: [],
    use_vector_store: [],
    use_mcp_server: ["integrations.mcp"],
  },
  providers: {
    openai: "models.openai",
    anthropic: "models.anthropic",
    mistral: "models.mistral",
  },
  vectorStores: {
    pinecone: "integrations.vector_stores.pinecone",
  },
});

export interface TestServicesOptions {
  latencyMs?: number;
  clock?: () => Date;
  settings?: Partial<EntitlementSettings>;
}

export function buildTestServices(options: TestServicesOptions = {}): {
  services: EntitlementServices;
  store: MemoryEntitlementStore;
} {
  const store = new MemoryEntitlementStore({ latencyMs: options.latencyMs, clock: options.clock });
  const services = createEntitlementServices({
    store,
    settings: options.settings,
    routeFeatures: ROUTE_FEATURES,
    models: MODELS,
    components: COMPONENTS,
    logger: () => silentLogger,
    clock: options.clock,
  });
  return { services, store };
}

/**
 * Seeds the fixture catalogue and gives tenant A three Basic seats and
 * one Pro seat.
 */
export async function seedTestCatalog(services: EntitlementServices): Promise<void> {
  await seedEntitlements(services, { features: FEATURES, tiers: TIERS, logger: silentLogger });
  await services.ledger.setPoolCapacity(TENANT_A, "basic", 3, "test");
  await services.ledger.setPoolCapacity(TENANT_A, "pro", 1, "test");
}

export async function addUsers(
  services: EntitlementServices,
  tenantId: string,
  ...userIds: string[]
): Promise<void> {
  for (const userId of userIds) {
    await services.store.ensureUser(userId, tenantId);
  }
}
