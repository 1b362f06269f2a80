/**
 * Bootstrap
 *
 * Wires configuration, storage, authentication and the entitlement
 * services. This is the SINGLE place where the store is chosen.
 *
 * Sequence:
 *   1. Initialize observability
 *   2. Load config
 *   3. Connect to Postgres and run migrations, or fall back to the
 *      in-process store outside production
 *   4. Initialize the auth provider
 *   5. Build the entitlement services
 *   6. Seed the feature registry and default tiers (idempotent)
 */

import {
  createEntitlementServices,
  createLogger,
  initAuthProvider,
  initDatabase,
  initObservability,
  loadConfig,
  MemoryEntitlementStore,
  PostgresEntitlementStore,
  runPlatformMigrations,
  seedEntitlements,
  type AppConfig,
  type EntitlementServices,
  type EntitlementStore,
} from "@tierline/platform";
import { seedDevTenant } from "./dev-data.js";

const logger = createLogger("bootstrap");

export interface Bootstrapped {
  config: AppConfig;
  services: EntitlementServices;
}

/**
 * Initializes the entire application.
 * Call once at server startup.
 */
export async function bootstrap(env: NodeJS.ProcessEnv = process.env): Promise<Bootstrapped> {
  // Error reporting first, so failures in the steps below are captured
  const reporter = initObservability(env);
  logger.info("Error reporting ready", { reporter });

  const config = loadConfig(env);

  let store: EntitlementStore;
  if (config.database.url) {
    const { sql, db } = initDatabase(config.database.url);
    await runPlatformMigrations(sql, createLogger("migrate"));
    store = new PostgresEntitlementStore(db, {
      statementTimeoutMs: config.entitlements.storageTimeoutMs,
    });
  } else {
    logger.warn("No DATABASE_URL set, using the in-process store (data is lost on restart)");
    store = new MemoryEntitlementStore();
  }

  initAuthProvider(env);

  const services = createEntitlementServices({ store, settings: config.entitlements });

  const seeded = await seedEntitlements(services);
  logger.info("Entitlements seeded", seeded);

  if (!config.database.url) {
    await seedDevTenant(services, createLogger("seed"));
  }

  return { config, services };
}
