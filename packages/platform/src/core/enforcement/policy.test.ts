/**
 * Enforcement Policy — Test Suite
 *
 * Evaluation order (super-admin, exempt, unmapped, features), OR
 * semantics for routes and actions, AND semantics across workflow
 * requirement groups, and the unavailable decision.
 */

import { describe, it, expect, vi } from "vitest";
import type { Operation } from "@tierline/contracts";
import {
  addUsers,
  buildTestServices,
  caller,
  seedTestCatalog,
  TENANT_A,
} from "../../testing/fixtures.js";

async function setup() {
  const { services, store } = buildTestServices();
  await seedTestCatalog(services);
  await addUsers(services, TENANT_A, "basic-user", "pro-user");
  await services.ledger.assign("basic-user", "basic", null);
  await services.ledger.assign("pro-user", "pro", null);
  return { store, policy: services.policy };
}

const basicUser = caller("basic-user");
const proUser = caller("pro-user");

describe("requirementsOf", () => {
  it("maps routes, actions and workflows to requirement groups", async () => {
    const { policy } = await setup();

    expect(policy.requirementsOf({ type: "route", path: "/api/health" })).toBe("exempt");
    expect(policy.requirementsOf({ type: "route", path: "/api/batch/run" })).toEqual([
      ["api.batch_execution"],
    ]);
    expect(policy.requirementsOf({ type: "route", path: "/api/unmapped" })).toEqual([]);
    expect(policy.requirementsOf({ type: "action", name: "execute_flow" })).toEqual([]);
    expect(
      policy.requirementsOf({ type: "action", name: "USE_MODEL", context: { provider: "OpenAI" } })
    ).toEqual([["models.openai"]]);
    expect(
      policy.requirementsOf({
        type: "action",
        name: "use_vector_store",
        context: { vectorStore: "pinecone" },
      })
    ).toEqual([["integrations.vector_stores.pinecone"]]);
  });
});

describe("authorize", () => {
  it("allows a super-admin before anything else", async () => {
    const { policy } = await setup();

    const decision = await policy.authorize(caller("root", { roles: ["superadmin"] }), {
      type: "route",
      path: "/api/batch",
    });

    expect(decision).toEqual({ allowed: true, reason: "superadmin" });
  });

  it("allows exempt and unmapped operations", async () => {
    const { policy } = await setup();

    expect(await policy.authorize(basicUser, { type: "route", path: "/api/health" })).toEqual({
      allowed: true,
      reason: "exempt",
    });
    expect(await policy.authorize(basicUser, { type: "route", path: "/api/unmapped" })).toEqual({
      allowed: true,
      reason: "unmapped",
    });
  });

  it("treats inherited object names as unmapped", async () => {
    const { policy } = await setup();

    expect(policy.requirementsOf({ type: "action", name: "constructor" })).toEqual([]);
    expect(
      policy.requirementsOf({ type: "action", name: "use_model", context: { provider: "toString" } })
    ).toEqual([]);
    expect(
      policy.requirementsOf({
        type: "action",
        name: "use_vector_store",
        context: { vectorStore: "hasOwnProperty" },
      })
    ).toEqual([]);
    expect(await policy.authorize(basicUser, { type: "action", name: "constructor" })).toEqual({
      allowed: true,
      reason: "unmapped",
    });
  });

  it("lets any one of a route's features authorize it", async () => {
    const { policy } = await setup();
    const operation: Operation = { type: "route", path: "/api/mcp/servers" };

    expect(await policy.authorize(proUser, operation)).toEqual({ allowed: true, reason: "satisfied" });
    expect(await policy.authorize(basicUser, operation)).toEqual({
      allowed: false,
      reason: "missing_features",
      unmetFeatures: ["integrations.mcp", "ui.flow_builder.export_flow"],
    });
  });

  it("gates model use by provider", async () => {
    const { policy } = await setup();

    expect(
      await policy.authorize(basicUser, { type: "action", name: "use_model", context: { provider: "anthropic" } })
    ).toEqual({ allowed: true, reason: "satisfied" });
    expect(
      await policy.authorize(basicUser, { type: "action", name: "use_model", context: { provider: "openai" } })
    ).toEqual({ allowed: false, reason: "missing_features", unmetFeatures: ["models.openai"] });
  });

  it("needs every workflow requirement and reports all unmet keys", async () => {
    const { policy } = await setup();
    const operation: Operation = {
      type: "workflow",
      graph: {
        nodes: [
          { id: "1", type: "OpenAIModel" },
          { id: "2", type: "MCPTools" },
          { id: "3", type: "AnthropicModel" },
        ],
      },
    };

    expect(await policy.authorize(basicUser, operation)).toEqual({
      allowed: false,
      reason: "missing_features",
      unmetFeatures: ["integrations.mcp", "models.openai"],
    });
    expect(await policy.authorize(proUser, operation)).toEqual({ allowed: true, reason: "satisfied" });
  });

  it("denies with a retryable decision when features cannot be resolved", async () => {
    const { store, policy } = await setup();
    vi.spyOn(store, "getLicense").mockRejectedValue(new Error("connection reset"));

    const decision = await policy.authorize(caller("someone-new"), { type: "route", path: "/api/batch" });

    expect(decision).toEqual({
      allowed: false,
      reason: "unavailable",
      retryable: true,
      unmetFeatures: [],
    });
  });
});
