/**
 * @tierline/platform
 *
 * The entitlement engine: feature registry, tier configuration,
 * resolution, the license and credit ledger, enforcement, auth
 * providers and the REST adapter.
 */

// Config
export { loadConfig, type AppConfig } from "./core/config/index.js";

// Observability
export {
  initObservability,
  captureException,
  captureMessage,
  flushObservability,
  setErrorReporter,
  ConsoleReporter,
  SentryReporter,
  type ErrorReporter,
  type ReportFields,
  type ReportLevel,
} from "./core/observability/index.js";
export { createLogger, silentLogger } from "./core/observability/logger.js";

// Database
export {
  initDatabase,
  getDatabase,
  closeDatabase,
  type Database,
  type SqlClient,
} from "./core/database/connection.js";
export {
  runPlatformMigrations,
  PLATFORM_TABLES,
  type MigrationClient,
} from "./core/database/migrate.js";

// Entitlements
export * from "./core/entitlements/index.js";

// Ledger
export * from "./core/ledger/index.js";

// Enforcement
export * from "./core/enforcement/index.js";

// Authentication
export {
  initAuthProvider,
  getAuthProvider,
  setAuthProvider,
  resetAuthProvider,
  SupabaseAuthProvider,
  createSupabaseAuthProvider,
  DevAuthProvider,
  DEV_TENANT_ID,
  DEV_USER_ID,
  parseDevRoles,
} from "./auth/index.js";

// Composition
export {
  createEntitlementServices,
  seedEntitlements,
  DEFAULT_ENTITLEMENT_SETTINGS,
  type EntitlementServices,
  type EntitlementSettings,
  type CreateEntitlementServicesOptions,
  type SeedOptions,
} from "./services.js";

// Protocol adapters
export { registerRESTRoutes } from "./adapters/rest/adapter.js";
export { authMiddleware, PUBLIC_ROUTES } from "./adapters/rest/auth-middleware.js";
export { createFeatureEnforcement, UPGRADE_URL } from "./adapters/rest/feature-middleware.js";
export {
  createUserRegistration,
  type UserRegistrationOptions,
} from "./adapters/rest/user-registration.js";
