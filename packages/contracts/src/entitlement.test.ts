/**
 * Entitlement Schemas — Test Suite
 *
 * Validates feature keys, the tagged feature value variant, catalogue
 * entries and admin tier-feature input.
 */

import { describe, it, expect } from "vitest";
import {
  featureKeySchema,
  featureValueSchema,
  featureDefinitionSchema,
  setTierFeaturesSchema,
  componentDescriptorSchema,
} from "./entitlement.js";

describe("featureKeySchema", () => {
  it("accepts hierarchical dotted keys", () => {
    expect(featureKeySchema.safeParse("models.openai").success).toBe(true);
    expect(featureKeySchema.safeParse("ui.flow_builder.export_flow").success).toBe(true);
    expect(featureKeySchema.safeParse("webhooks").success).toBe(true);
  });

  it("rejects empty segments and uppercase", () => {
    expect(featureKeySchema.safeParse("models..openai").success).toBe(false);
    expect(featureKeySchema.safeParse(".models").success).toBe(false);
    expect(featureKeySchema.safeParse("Models.OpenAI").success).toBe(false);
  });
});

describe("featureValueSchema", () => {
  it("parses a boolean value", () => {
    expect(featureValueSchema.parse({ kind: "boolean", enabled: true })).toEqual({
      kind: "boolean",
      enabled: true,
    });
  });

  it("parses a limit value with an unlimited ceiling", () => {
    expect(featureValueSchema.parse({ kind: "limit", enabled: true, limit: null })).toEqual({
      kind: "limit",
      enabled: true,
      limit: null,
    });
  });

  it("rejects a limit value without a limit field", () => {
    expect(featureValueSchema.safeParse({ kind: "limit", enabled: true }).success).toBe(false);
  });

  it("rejects negative limits", () => {
    expect(
      featureValueSchema.safeParse({ kind: "limit", enabled: true, limit: -1 }).success
    ).toBe(false);
  });

  it("rejects untagged values", () => {
    expect(featureValueSchema.safeParse({ enabled: true }).success).toBe(false);
  });
});

describe("featureDefinitionSchema", () => {
  it("applies defaults for optional catalogue fields", () => {
    const parsed = featureDefinitionSchema.parse({
      key: "models.openai",
      name: "OpenAI models",
      category: "models",
      kind: "boolean",
      defaultValue: { kind: "boolean", enabled: false },
    });
    expect(parsed.description).toBeNull();
    expect(parsed.isPremium).toBe(false);
    expect(parsed.isActive).toBe(true);
    expect(parsed.dependsOn).toEqual([]);
  });

  it("rejects a default whose kind differs from the feature kind", () => {
    const result = featureDefinitionSchema.safeParse({
      key: "limits.max_flows",
      name: "Max flows",
      category: "limits",
      kind: "limit",
      defaultValue: { kind: "boolean", enabled: true },
    });
    expect(result.success).toBe(false);
  });
});

describe("setTierFeaturesSchema", () => {
  it("accepts boolean shorthand and object values side by side", () => {
    const parsed = setTierFeaturesSchema.parse({
      features: {
        "models.openai": true,
        "limits.max_flows": { enabled: true, limit: 50 },
        "api.webhooks": { enabled: false, expiresAt: "2030-01-01T00:00:00Z" },
      },
    });
    expect(parsed.features["models.openai"]).toBe(true);
    expect(parsed.features["limits.max_flows"]).toEqual({ enabled: true, limit: 50 });
  });

  it("rejects a malformed expiry timestamp", () => {
    const result = setTierFeaturesSchema.safeParse({
      features: { "api.webhooks": { enabled: true, expiresAt: "next tuesday" } },
    });
    expect(result.success).toBe(false);
  });
});

describe("componentDescriptorSchema", () => {
  it("allows public components with a null feature key", () => {
    const parsed = componentDescriptorSchema.parse({
      componentKey: "ChatInput",
      displayName: "Chat Input",
      category: "inputs",
      featureKey: null,
    });
    expect(parsed.featureKey).toBeNull();
  });
});
