/**
 * Enforcement Definitions
 *
 * Operations the Enforcement Layer can authorize, and its decisions.
 * Routes and named actions need ANY one of their mapped features;
 * a workflow needs ALL features implied by every node it references.
 */

import { z } from "zod";

export const workflowNodeSchema = z.object({
  id: z.string().min(1),
  /** Component type as stored in the graph, e.g. "OpenAIModel" */
  type: z.string().default(""),
  displayName: z.string().optional(),
  /** Explicit model provider, when the node declares one */
  provider: z.string().optional(),
  /** Selected model name, used to infer the provider */
  modelName: z.string().optional(),
  /** Registry key of the component this node instantiates */
  componentKey: z.string().optional(),
  /** Set when the node talks to an MCP server */
  mcpServer: z.string().optional(),
});

export const workflowGraphSchema = z.object({
  nodes: z.array(workflowNodeSchema),
});

export type WorkflowNode = z.infer<typeof workflowNodeSchema>;
export type WorkflowGraph = z.infer<typeof workflowGraphSchema>;

export const operationSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("route"), path: z.string().min(1) }),
  z.object({
    type: z.literal("action"),
    name: z.string().min(1),
    context: z
      .object({
        provider: z.string().optional(),
        vectorStore: z.string().optional(),
      })
      .optional(),
  }),
  z.object({
    type: z.literal("workflow"),
    graph: workflowGraphSchema,
    streaming: z.boolean().optional(),
    batch: z.boolean().optional(),
  }),
]);

export type Operation = z.infer<typeof operationSchema>;

export type AllowReason = "superadmin" | "exempt" | "unmapped" | "satisfied";

export type AuthorizationDecision =
  | { allowed: true; reason: AllowReason }
  | { allowed: false; reason: "missing_features"; unmetFeatures: string[] }
  | { allowed: false; reason: "unavailable"; retryable: true; unmetFeatures: [] };
