/**
 * @tierline/contracts
 *
 * Public API — the shared boundary between the entitlement platform
 * and the applications that host it.
 */

// Context
export type { Caller, Logger } from "./context.js";

// Callers and roles
export type { CallerType } from "./permission.js";
export { SUPERADMIN_ROLE, TENANT_ADMIN_ROLE } from "./permission.js";

// Authentication
export type { AuthProvider, AuthResult } from "./auth.js";

// Features
export type {
  FeatureKind,
  FeatureCategory,
  FeatureValue,
  BooleanFeatureValue,
  LimitFeatureValue,
  FeatureDefinition,
  TierFeatureOverride,
  TierFeatureInput,
  FeatureSource,
  ResolvedFeature,
  ResolvedFeatureSet,
  ModelDescriptor,
  ComponentDescriptor,
} from "./entitlement.js";
export {
  FEATURE_KEY_PATTERN,
  FEATURE_KINDS,
  FEATURE_CATEGORIES,
  featureKeySchema,
  featureValueSchema,
  featureDefinitionSchema,
  tierFeatureInputSchema,
  setTierFeaturesSchema,
  modelDescriptorSchema,
  componentDescriptorSchema,
} from "./entitlement.js";

// Licensing
export type {
  Tier,
  CreateTierInput,
  TenantLicensePool,
  UserLicenseState,
  TransactionType,
  LedgerTransaction,
} from "./licensing.js";
export {
  TRANSACTION_TYPES,
  creditsRemaining,
  createTierSchema,
  assignLicenseSchema,
  upgradeLicenseSchema,
  setPoolCapacitySchema,
  debitCreditsSchema,
  replenishCreditsSchema,
  transactionQuerySchema,
} from "./licensing.js";

// Enforcement
export type {
  WorkflowNode,
  WorkflowGraph,
  Operation,
  AllowReason,
  AuthorizationDecision,
} from "./enforcement.js";
export { workflowNodeSchema, workflowGraphSchema, operationSchema } from "./enforcement.js";
