import { logger } from "../logger";
import { getDb, initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { TaskScheduler } from "../scheduler/tasks";

const config = loadConfig();
initializeDatabase();

const scheduler = new TaskScheduler(getDb(), {
  maxRetries: config.env.maxRetries,
  reviewTarget: config.env.maxReviewsPerHotel,
});

logger.info(
  `Creating review tasks for hotels with at least ${config.env.reviewTaskMinReviews} reviews...`,
);
const created = scheduler.createReviewTasks(config.env.reviewTaskMinReviews);
const stats = scheduler.stats();

logger.info(`Created ${created.length} task(s)`);
logger.info(`Pending review tasks: ${stats.byStatus.pending} of ${stats.total} total`);

process.exit(0);
