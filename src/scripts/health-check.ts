import { logger } from "../logger";
import {
  initializeDatabase,
  checkDatabaseIntegrity,
  getDatabaseStats,
} from "../db";
import { loadConfig } from "../config";
import { errorMessage } from "../errors";
import { calculateExpectedHotels, listBusinessZones } from "../planner/plan";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Health Check");
logger.info("═══════════════════════════════════════════════════");

const config = loadConfig();
initializeDatabase();

// Sampling plan
const expected = calculateExpectedHotels(config.plan);
logger.info(
  `Sampling plan: ${listBusinessZones(config.plan).length} business zones, ${expected.total} hotels expected`,
);
for (const [region, row] of Object.entries(expected.breakdown)) {
  logger.info(`  ${region}: ${row.zones} zones × ${row.hotelsPerZone} = ${row.total}`);
}

// Database integrity
const integrity = checkDatabaseIntegrity();
logger.info(
  `Database integrity: ${integrity.ok ? "✅ OK" : "❌ FAILED"} (${integrity.result})`,
);

// Database stats
const stats = getDatabaseStats();
logger.info("Database stats:");
for (const [table, count] of Object.entries(stats)) {
  logger.info(`  ${table}: ${count} rows`);
}

// Browser endpoint
logger.info("\nBrowser endpoint check:");
let browserOk = false;
try {
  const response = await fetch(`${config.env.cdpUrl}/json/version`, {
    signal: AbortSignal.timeout(5000),
  });
  browserOk = response.ok;
  logger.info(`  ${browserOk ? "✅" : "❌"} ${config.env.cdpUrl} (HTTP ${response.status})`);
} catch (error) {
  logger.info(`  ❌ ${config.env.cdpUrl} (${errorMessage(error)})`);
  logger.info(
    '  Start Chrome with: chrome --remote-debugging-port=9222 --user-data-dir="<profile dir>"',
  );
}

logger.info("═══════════════════════════════════════════════════");
process.exit(integrity.ok && browserOk ? 0 : 1);
