import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { logger } from "../logger";
import { errorMessage } from "../errors";
import {
  createReviewTasksForEligibleItems,
  runPendingTasks,
} from "../pipeline";
import type { PipelineContext, TaskRunSummary } from "../pipeline";

// One browser session: never drain two batches at once.
let _drainRunning = false;

export async function drainReviewTasksGuarded(
  ctx: PipelineContext,
  limit: number,
): Promise<TaskRunSummary | null> {
  if (_drainRunning) {
    logger.warn("[LOCK] Task drain already running, skipping this tick");
    return null;
  }
  _drainRunning = true;
  try {
    return await runPendingTasks(ctx, "review_fetch", limit);
  } finally {
    _drainRunning = false;
  }
}

export function startScheduler(ctx: PipelineContext): ScheduledTask[] {
  const { schedules } = ctx.config.crawler;
  const timezone = ctx.config.env.timezone;

  logger.info("Starting scheduler...");

  const recovered = ctx.scheduler.recoverInterrupted();
  if (recovered > 0) {
    logger.warn(`[SCHEDULER] Recovered ${recovered} interrupted task(s)`);
  }

  const sweep = cron.schedule(
    schedules.reviewTaskSweep,
    () => {
      logger.info("[CRON] Creating review tasks for eligible hotels...");
      try {
        const created = createReviewTasksForEligibleItems(ctx);
        logger.info(`[CRON] Review task sweep complete: ${created.length} created`);
      } catch (error) {
        logger.error(`[CRON] Review task sweep failed: ${errorMessage(error)}`);
      }
    },
    { timezone },
  );
  logger.info(`  ✓ Review task sweep: ${schedules.reviewTaskSweep}`);

  const drain = cron.schedule(
    schedules.reviewDrain,
    async () => {
      logger.info("[CRON] Draining pending review tasks...");
      try {
        const summary = await drainReviewTasksGuarded(ctx, schedules.reviewDrainBatch);
        if (!summary) return;
        logger.info(
          `[CRON] Drain complete: ${summary.completed} completed, ${summary.itemsCrawled} reviews`,
        );
      } catch (error) {
        logger.error(`[CRON] Drain failed: ${errorMessage(error)}`);
      }
    },
    { timezone },
  );
  logger.info(
    `  ✓ Review drain: ${schedules.reviewDrain} (batch ${schedules.reviewDrainBatch})`,
  );

  logger.info("Scheduler started with 2 jobs.");
  return [sweep, drain];
}
