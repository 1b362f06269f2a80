/**
 * Entitlement Definitions
 *
 * Feature keys, their tagged values, tier overrides and the resolved
 * per-user view. Feature values are a tagged variant: a plain on/off
 * switch, or an on/off switch with an optional numeric limit.
 *
 * The schemas here are the single source of truth — the TypeScript
 * types are inferred from them so stored JSON and API payloads can be
 * validated against exactly the shape the engine works with.
 */

import { z } from "zod";

/**
 * Hierarchical dotted identifier, e.g. "models.openai" or
 * "ui.flow_builder.export_flow".
 */
export const FEATURE_KEY_PATTERN = /^[a-z0-9_]+(\.[a-z0-9_]+)*$/;

export const featureKeySchema = z
  .string()
  .max(255)
  .regex(FEATURE_KEY_PATTERN, "Feature keys are lowercase dotted identifiers");

export const FEATURE_KINDS = ["boolean", "limit"] as const;
export type FeatureKind = (typeof FEATURE_KINDS)[number];

export const FEATURE_CATEGORIES = [
  "models",
  "components",
  "integrations",
  "ui",
  "api",
  "limits",
] as const;
export type FeatureCategory = (typeof FEATURE_CATEGORIES)[number];

export const booleanFeatureValueSchema = z.object({
  kind: z.literal("boolean"),
  enabled: z.boolean(),
});

/** `limit: null` means unlimited */
export const limitFeatureValueSchema = z.object({
  kind: z.literal("limit"),
  enabled: z.boolean(),
  limit: z.number().int().nonnegative().nullable(),
});

export const featureValueSchema = z.discriminatedUnion("kind", [
  booleanFeatureValueSchema,
  limitFeatureValueSchema,
]);

export type BooleanFeatureValue = z.infer<typeof booleanFeatureValueSchema>;
export type LimitFeatureValue = z.infer<typeof limitFeatureValueSchema>;
export type FeatureValue = z.infer<typeof featureValueSchema>;

/**
 * A gateable capability in the Feature Registry.
 * Seeded at startup; only `isActive` changes at runtime.
 */
export interface FeatureDefinition {
  key: string;
  name: string;
  description: string | null;
  category: FeatureCategory;
  kind: FeatureKind;
  defaultValue: FeatureValue;
  isPremium: boolean;
  isActive: boolean;
  /**
   * Declared prerequisites. Stored and surfaced, never resolved:
   * a dependent feature is not switched off when its prerequisite is.
   */
  dependsOn: string[];
}

/** Shape of one entry in the seed catalogue (data/features.json). */
export const featureDefinitionSchema = z
  .object({
    key: featureKeySchema,
    name: z.string().min(1).max(255),
    description: z.string().nullable().default(null),
    category: z.enum(FEATURE_CATEGORIES),
    kind: z.enum(FEATURE_KINDS),
    defaultValue: featureValueSchema,
    isPremium: z.boolean().default(false),
    isActive: z.boolean().default(true),
    dependsOn: z.array(featureKeySchema).default([]),
  })
  .refine((def) => def.kind === def.defaultValue.kind, {
    message: "defaultValue.kind must match kind",
    path: ["defaultValue"],
  });

/** A tier's value for one feature, replacing the registry default. */
export interface TierFeatureOverride {
  tierId: string;
  featureKey: string;
  value: FeatureValue;
  /** ISO timestamp; an expired override is treated as absent */
  expiresAt: string | null;
}

/**
 * Admin input for one tier feature. A bare boolean is shorthand for
 * `{ enabled }` with no limit.
 */
export const tierFeatureInputSchema = z.union([
  z.boolean(),
  z.object({
    enabled: z.boolean(),
    limit: z.number().int().nonnegative().nullable().optional(),
    expiresAt: z.string().datetime({ offset: true }).nullable().optional(),
  }),
]);

export type TierFeatureInput = z.infer<typeof tierFeatureInputSchema>;

export const setTierFeaturesSchema = z.object({
  features: z.record(z.string(), tierFeatureInputSchema),
});

/** Where a resolved value came from */
export type FeatureSource = "default" | "tier" | "superadmin";

export interface ResolvedFeature {
  enabled: boolean;
  value: FeatureValue;
  source: FeatureSource;
}

/**
 * The merged, cached view of which features are enabled for a user.
 * Derived data — recomputable at any time, never written back.
 */
export interface ResolvedFeatureSet {
  userId: string;
  tierId: string | null;
  tierName: string | null;
  features: Record<string, ResolvedFeature>;
  /** ISO timestamp of when the set was computed */
  computedAt: string;
}

export const modelDescriptorSchema = z.object({
  provider: z.string().min(1),
  modelId: z.string().min(1),
  modelName: z.string().min(1),
  modelType: z.enum(["chat", "completion", "embedding", "image", "audio"]),
  supportsTools: z.boolean().default(false),
  supportsVision: z.boolean().default(false),
  maxTokens: z.number().int().positive().nullable().default(null),
  featureKey: featureKeySchema,
});

export type ModelDescriptor = z.infer<typeof modelDescriptorSchema>;

/** `featureKey: null` marks a public component, always available. */
export const componentDescriptorSchema = z.object({
  componentKey: z.string().min(1),
  displayName: z.string().min(1),
  category: z.string().min(1),
  featureKey: featureKeySchema.nullable(),
});

export type ComponentDescriptor = z.infer<typeof componentDescriptorSchema>;
