/**
 * Migration Script
 *
 * Creates the entitlement tables independently of server startup.
 *
 * Usage: npm run db:migrate
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

import {
  closeDatabase,
  createLogger,
  initDatabase,
  loadConfig,
  runPlatformMigrations,
} from "@tierline/platform";

const logger = createLogger("migrate");

async function migrate() {
  const config = loadConfig();
  if (!config.database.url) {
    throw new Error("DATABASE_URL is required to run migrations. See .env.example.");
  }
  logger.info("Starting migration", {
    database: config.database.url.replace(/\/\/.*@/, "//***@"),
  });

  const { sql } = initDatabase(config.database.url);
  const created = await runPlatformMigrations(sql, logger);

  logger.info("Migration done", { created });
  await closeDatabase();
  process.exit(0);
}

migrate().catch(async (err: unknown) => {
  logger.error("Migration failed", { error: err instanceof Error ? err.message : String(err) });
  await closeDatabase();
  process.exit(1);
});
