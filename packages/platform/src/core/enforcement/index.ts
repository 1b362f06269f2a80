export { EnforcementPolicy, type EnforcementPolicyDeps, type Requirements } from "./policy.js";
export {
  compileRouteFeatureConfig,
  loadRouteFeatureConfig,
  isExemptPath,
  routeFeatures,
  routeFeatureConfigSchema,
  type RouteFeatureConfig,
  type RouteFeatureConfigInput,
  type RouteRule,
} from "./route-features.js";
export { detectModelProvider, isMcpNode, workflowRequirements, type WorkflowRequest } from "./workflow.js";
export { isSuperAdmin } from "./superadmin.js";
