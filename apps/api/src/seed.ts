/**
 * Seed Script
 *
 * Seeds the feature registry and default tiers, then gives the
 * development tenant seat pools and a licensed dev user.
 *
 * Usage: npm run db:seed
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import { closeDatabase, createLogger } from "@tierline/platform";
import { bootstrap } from "./bootstrap.js";
import { seedDevTenant } from "./dev-data.js";

const logger = createLogger("seed");

async function seed() {
  const { config, services } = await bootstrap();

  // Without a database, bootstrap has already seeded the in-process store.
  if (config.database.url) {
    await seedDevTenant(services, logger);
  }

  logger.info("Seed done");
  await closeDatabase();
  process.exit(0);
}

seed().catch(async (err: unknown) => {
  logger.error("Seed failed", { error: err instanceof Error ? err.message : String(err) });
  await closeDatabase();
  process.exit(1);
});
