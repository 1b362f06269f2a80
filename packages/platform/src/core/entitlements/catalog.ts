/**
 * Static Catalogues
 *
 * The seed feature catalogue, the default tiers, and the model and
 * component registries ship as JSON under packages/platform/data/.
 * Each loader reads its file and validates it with zod, so a malformed
 * catalogue stops startup instead of reaching the Resolver.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import {
  componentDescriptorSchema,
  createTierSchema,
  featureDefinitionSchema,
  modelDescriptorSchema,
  tierFeatureInputSchema,
  type ComponentDescriptor,
  type FeatureDefinition,
  type ModelDescriptor,
} from "@tierline/contracts";

const DATA_DIR = new URL("../../../data/", import.meta.url);

const defaultTierSchema = createTierSchema.extend({
  id: z.string().min(1),
  features: z.record(z.string(), tierFeatureInputSchema).default({}),
});

export type DefaultTier = z.infer<typeof defaultTierSchema>;

/** Reads a JSON file and validates it; errors name the file and the path. */
export function readJsonFile<T>(path: string | URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const file = typeof path === "string" ? path : fileURLToPath(path);
  const raw: unknown = JSON.parse(readFileSync(file, "utf8"));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Invalid catalogue ${file}: ${issue ? `${issue.path.join(".")}: ${issue.message}` : "unknown error"}`
    );
  }
  return parsed.data;
}

export function loadFeatureCatalog(): FeatureDefinition[] {
  return readJsonFile(new URL("features.json", DATA_DIR), z.array(featureDefinitionSchema));
}

export function loadDefaultTiers(): DefaultTier[] {
  return readJsonFile(new URL("tiers.json", DATA_DIR), z.array(defaultTierSchema));
}

export function loadModelRegistry(): ModelDescriptor[] {
  return readJsonFile(new URL("models.json", DATA_DIR), z.array(modelDescriptorSchema));
}

export function loadComponentRegistry(): ComponentDescriptor[] {
  return readJsonFile(new URL("components.json", DATA_DIR), z.array(componentDescriptorSchema));
}
