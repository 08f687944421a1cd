import { logger } from "../logger";
import { getDb, initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { createBrowserSources } from "../connectors";
import {
  createPipelineContext,
  fetchReviewsForHotel,
  runPendingTasks,
} from "../pipeline";

const args = process.argv.slice(2);
const hotelIndex = args.indexOf("--hotel-id");
const limitIndex = args.indexOf("--limit");

const hotelId = hotelIndex !== -1 ? args[hotelIndex + 1] : undefined;
const all = args.includes("--all");
const limit = limitIndex !== -1 ? Number.parseInt(args[limitIndex + 1] ?? "", 10) : 10;

if ((!hotelId && !all) || !Number.isFinite(limit) || limit < 1) {
  logger.error("Usage: npm run reviews -- --hotel-id <id> | --all [--limit n]");
  process.exit(1);
}

const config = loadConfig();
initializeDatabase();

const sources = createBrowserSources(config);
const ctx = createPipelineContext(config, getDb(), sources, { pacing: sources.pacing });

try {
  const recovered = ctx.scheduler.recoverInterrupted();
  if (recovered > 0) logger.warn(`Recovered ${recovered} interrupted task(s)`);

  if (hotelId) {
    const task = await fetchReviewsForHotel(ctx, hotelId);
    logger.info(
      `Hotel ${hotelId}: task ${task.status}, ${task.itemsCrawled} reviews${task.errorReason ? ` (${task.errorReason})` : ""}`,
    );
  } else {
    const summary = await runPendingTasks(ctx, "review_fetch", limit);
    logger.info(`Reviews stored: ${summary.itemsCrawled} across ${summary.completed} hotels`);
  }
} finally {
  await sources.driver.close();
}

process.exit(0);
