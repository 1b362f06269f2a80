/**
 * Tierline API Server
 *
 * Fastify entry point. Boots the platform, builds the app, starts listening.
 */

import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
dotenv.config({ path: path.resolve(__dirname, "../../../.env") });
import {
  captureException,
  closeDatabase,
  createLogger,
  flushObservability,
} from "@tierline/platform";
import { bootstrap } from "./bootstrap.js";
import { appOptionsFromEnv, buildApp } from "./app.js";

const logger = createLogger("server");

async function main() {
  const { config, services } = await bootstrap();

  const app = await buildApp(services, appOptionsFromEnv());

  await app.listen({
    port: config.api.port,
    host: config.api.host,
  });

  logger.info("API listening", { url: `http://localhost:${config.api.port}` });

  const shutdown = async () => {
    logger.info("Shutting down");
    await app.close();
    await services.store.close();
    await flushObservability(2000);
    await closeDatabase();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch(async (error: unknown) => {
  logger.error("Fatal error", { error: error instanceof Error ? error.message : String(error) });
  captureException(error, { operation: "startup" });
  await flushObservability(2000).catch(() => undefined);
  process.exit(1);
});
