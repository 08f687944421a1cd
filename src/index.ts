import { serve } from "@hono/node-server";
import { logger } from "./logger";
import {
  checkDatabaseIntegrity,
  closeDatabase,
  getDb,
  initializeDatabase,
} from "./db";
import { loadConfig, type AppConfig } from "./config";
import { createBrowserSources } from "./connectors";
import { createPipelineContext } from "./pipeline";
import { startScheduler } from "./scheduler";
import { createApp } from "./server";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Hotel Review Sampler");
logger.info("═══════════════════════════════════════════════════");

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  logger.error("Failed to load configuration:", error);
  process.exit(1);
}

try {
  initializeDatabase();
} catch (error) {
  logger.error("Failed to initialize database:", error);
  process.exit(1);
}

const integrity = checkDatabaseIntegrity();
if (!integrity.ok) {
  logger.error(`Database integrity check failed: ${integrity.result}`);
  logger.error(`Please restore from backup or delete ${config.env.dbPath} to recreate.`);
  process.exit(1);
}

const sources = createBrowserSources(config);
const ctx = createPipelineContext(config, getDb(), sources, { pacing: sources.pacing });
const app = createApp(ctx);
const port = config.env.port;

logger.info(`Starting server on port ${port}...`);
const tasks = startScheduler(ctx);

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info(`✅ Hotel Review Sampler started on http://localhost:${info.port}`);
  logger.info(`   Health: http://localhost:${info.port}/health`);
  logger.info(`   Status: http://localhost:${info.port}/status`);
  logger.info(`   Tasks:  http://localhost:${info.port}/api/tasks/stats`);
  logger.info("═══════════════════════════════════════════════════");
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down...`);
  for (const task of tasks) task.stop();
  server.close();
  await sources.driver.close();
  closeDatabase();
  process.exit(0);
}

process.on("SIGINT", () => {
  shutdown("SIGINT").catch((error) => {
    logger.error("Shutdown failed:", error);
    process.exit(1);
  });
});
process.on("SIGTERM", () => {
  shutdown("SIGTERM").catch((error) => {
    logger.error("Shutdown failed:", error);
    process.exit(1);
  });
});
