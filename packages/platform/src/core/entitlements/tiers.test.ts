/**
 * Tier Configuration Store — Test Suite
 */

import { describe, it, expect } from "vitest";
import { buildTestServices, seedTestCatalog, FEATURES } from "../../testing/fixtures.js";
import { normalizeTierFeatureInput } from "./tiers.js";
import {
  InvalidFeatureValueError,
  NotFoundError,
  UnknownFeatureKeyError,
} from "./errors.js";

async function setup() {
  const { services } = buildTestServices();
  await seedTestCatalog(services);
  return services.tiers;
}

function definition(key: string) {
  const def = FEATURES.find((f) => f.key === key);
  if (!def) throw new Error(`fixture ${key} missing`);
  return def;
}

describe("normalizeTierFeatureInput", () => {
  it("expands the boolean shorthand", () => {
    expect(normalizeTierFeatureInput(definition("models.openai"), true)).toEqual({
      value: { kind: "boolean", enabled: true },
      expiresAt: null,
    });
  });

  it("rejects a limit on a boolean feature", () => {
    expect(() =>
      normalizeTierFeatureInput(definition("models.openai"), { enabled: true, limit: 5 })
    ).toThrow(InvalidFeatureValueError);
  });

  it("keeps the default limit when the input names none", () => {
    expect(normalizeTierFeatureInput(definition("limits.max_flows"), true)).toEqual({
      value: { kind: "limit", enabled: true, limit: 10 },
      expiresAt: null,
    });
  });

  it("passes an explicit unlimited ceiling and expiry through", () => {
    expect(
      normalizeTierFeatureInput(definition("limits.max_flows"), {
        enabled: true,
        limit: null,
        expiresAt: "2030-01-01T00:00:00Z",
      })
    ).toEqual({
      value: { kind: "limit", enabled: true, limit: null },
      expiresAt: "2030-01-01T00:00:00Z",
    });
  });
});

describe("TierConfigStore", () => {
  it("returns the tier's overrides keyed by feature", async () => {
    const tiers = await setup();

    const features = await tiers.getTierFeatures("pro");

    expect(Object.keys(features).sort()).toEqual([
      "integrations.mcp",
      "limits.max_flows",
      "models.openai",
    ]);
    expect(features["limits.max_flows"]).toEqual({
      value: { kind: "limit", enabled: true, limit: 100 },
      expiresAt: null,
    });
  });

  it("upserts overrides and leaves the others in place", async () => {
    const tiers = await setup();

    const features = await tiers.setTierFeatures(
      "pro",
      { "models.openai": false, "api.batch_execution": true },
      "admin"
    );

    expect(features["models.openai"]?.value).toEqual({ kind: "boolean", enabled: false });
    expect(features["api.batch_execution"]?.value).toEqual({ kind: "boolean", enabled: true });
    expect(features["integrations.mcp"]?.value).toEqual({ kind: "boolean", enabled: true });
  });

  it("reports every unknown key and writes nothing", async () => {
    const tiers = await setup();

    const error = await tiers
      .setTierFeatures(
        "basic",
        { "models.openai": true, "zeta.unknown": true, "alpha.unknown": false },
        "admin"
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UnknownFeatureKeyError);
    if (error instanceof UnknownFeatureKeyError) {
      expect(error.details).toEqual({ unknownKeys: ["alpha.unknown", "zeta.unknown"] });
    }
    expect(await tiers.getTierFeatures("basic")).not.toHaveProperty(["models.openai"]);
  });

  it("rejects an invalid value without writing the valid ones", async () => {
    const tiers = await setup();

    await expect(
      tiers.setTierFeatures(
        "basic",
        { "api.batch_execution": true, "models.openai": { enabled: true, limit: 3 } },
        "admin"
      )
    ).rejects.toBeInstanceOf(InvalidFeatureValueError);
    expect(await tiers.getTierFeatures("basic")).not.toHaveProperty(["api.batch_execution"]);
  });

  it("rejects unknown tiers", async () => {
    const tiers = await setup();

    await expect(tiers.getTier("platinum")).rejects.toBeInstanceOf(NotFoundError);
    await expect(tiers.setTierFeatures("platinum", {}, "admin")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("slugifies the name into an id and hides inactive tiers by default", async () => {
    const tiers = await setup();

    const legacy = await tiers.createTier({
      name: "Legacy Plan",
      defaultCredits: 0,
      sortOrder: 0,
      isActive: false,
    });

    expect(legacy.id).toBe("legacy_plan");
    expect((await tiers.listTiers()).map((t) => t.id)).toEqual(["basic", "pro"]);
    expect((await tiers.listTiers(false)).map((t) => t.id)).toEqual(["legacy_plan", "basic", "pro"]);
  });

  it("validates new tiers", async () => {
    const tiers = await setup();

    await expect(tiers.createTier({ name: "", defaultCredits: 0 })).rejects.toThrow();
  });
});
