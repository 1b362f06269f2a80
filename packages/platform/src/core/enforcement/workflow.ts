/**
 * Workflow Requirements
 *
 * Derives the features a workflow graph needs before it may run. Each
 * requirement is a group of keys of which one must be enabled; every
 * group must be satisfied. Groups come from the execution mode, the
 * model provider behind each node, gated components, and MCP nodes.
 */

import type { ComponentDescriptor, WorkflowNode } from "@tierline/contracts";
import type { RouteFeatureConfig } from "./route-features.js";

/** Model-name hints used when neither type nor display name names a provider. */
const MODEL_NAME_HINTS: Array<[RegExp, string]> = [
  [/gpt|openai/, "openai"],
  [/claude/, "anthropic"],
  [/gemini/, "google"],
];

/**
 * Explicit provider first; then a configured provider name inside the
 * node type or display name; then the model-name hints.
 */
export function detectModelProvider(
  node: WorkflowNode,
  providers: ReadonlyMap<string, string>
): string | null {
  if (node.provider) return node.provider.toLowerCase();

  const type = node.type.toLowerCase();
  const displayName = (node.displayName ?? "").toLowerCase();
  for (const provider of providers.keys()) {
    if (type.includes(provider) || displayName.includes(provider)) return provider;
  }

  const modelName = (node.modelName ?? "").toLowerCase();
  if (modelName) {
    for (const [hint, provider] of MODEL_NAME_HINTS) {
      if (hint.test(modelName)) return provider;
    }
  }
  return null;
}

export function isMcpNode(node: WorkflowNode): boolean {
  return node.type.toLowerCase().includes("mcp") || Boolean(node.mcpServer);
}

export interface WorkflowRequest {
  nodes: WorkflowNode[];
  streaming?: boolean;
  batch?: boolean;
}

/**
 * @returns Requirement groups, deduplicated; an empty list means the
 *          workflow needs no gated feature
 */
export function workflowRequirements(
  request: WorkflowRequest,
  config: RouteFeatureConfig,
  components: ComponentDescriptor[]
): string[][] {
  const groups = new Map<string, string[]>();
  const add = (features: string[] | undefined) => {
    if (!features || features.length === 0) return;
    groups.set([...features].sort().join("|"), features);
  };

  if (request.streaming) add(config.operations.get("execute_flow_streaming"));
  if (request.batch) add(config.operations.get("execute_batch"));

  const gated = new Map(
    components
      .filter((c) => c.featureKey !== null)
      .map((c) => [c.componentKey.toLowerCase(), c.featureKey] as const)
  );

  for (const node of request.nodes) {
    const provider = detectModelProvider(node, config.providers);
    const providerFeature = provider ? config.providers.get(provider) : undefined;
    if (providerFeature) add([providerFeature]);

    const componentFeature = gated.get((node.componentKey ?? node.type).toLowerCase());
    if (componentFeature) add([componentFeature]);

    if (isMcpNode(node)) add(config.operations.get("use_mcp_server") ?? ["integrations.mcp"]);
  }

  return [...groups.values()];
}
