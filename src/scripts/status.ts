/**
 * Print the last run, task queue counts and per-region collection progress.
 */

import { logger } from "../logger";
import { getDatabaseStats, getDb, initializeDatabase } from "../db";
import { getConfig } from "../config";
import { getLatestRun, getRegionProgress } from "../db/operations";
import { TaskScheduler } from "../scheduler/tasks";

const config = getConfig();
initializeDatabase();
const db = getDb();

logger.info("═══════════════════════════════════════════════════");
logger.info("  System Status");
logger.info("═══════════════════════════════════════════════════");

const stats = getDatabaseStats(db);
logger.info(`🏨 Hotels: ${stats.hotels ?? 0}`);
logger.info(`💬 Reviews: ${stats.reviews ?? 0} (${stats.review_images ?? 0} images)`);

const tasks = new TaskScheduler(db).stats();
logger.info(`\n📋 Tasks: ${tasks.total} (list ${tasks.byKind.list_fetch}, review ${tasks.byKind.review_fetch})`);
for (const [status, count] of Object.entries(tasks.byStatus)) {
  logger.info(`   ${status}: ${count}`);
}

const lastRun = getLatestRun(db);
if (lastRun) {
  logger.info(`\n🕐 Last run:`);
  logger.info(`   Type: ${lastRun.runType}${lastRun.dryRun ? " (dry run)" : ""}`);
  logger.info(`   Started: ${lastRun.startedAt}`);
  logger.info(`   Finished: ${lastRun.finishedAt ?? "still running"}`);
  logger.info(`   Status: ${lastRun.status}`);
  logger.info(
    `   Hotels accepted: ${lastRun.hotelsAccepted}, zones short: ${lastRun.zonesShort}/${lastRun.zonesAttempted}`,
  );
} else {
  logger.info("\n🕐 No runs recorded yet");
}

logger.info("\n🗺️  Progress by region:");
for (const row of getRegionProgress(db)) {
  logger.info(
    `   ${row.region}: ${row.hotels} hotels, ${row.hotelsWithReviews} with reviews, ${row.reviewsStored} reviews`,
  );
}

logger.info(`\n⚙️  Environment: ${config.env.nodeEnv}`);
logger.info(`🧪 Dry run: ${config.env.dryRun}`);

logger.info("═══════════════════════════════════════════════════");
process.exit(0);
