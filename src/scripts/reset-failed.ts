import { logger } from "../logger";
import { getDb, initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { TaskScheduler } from "../scheduler/tasks";
import type { TaskKind } from "../types";

const args = process.argv.slice(2);
const kindIndex = args.indexOf("--kind");
const rawKind = kindIndex !== -1 ? args[kindIndex + 1] : undefined;

let kind: TaskKind | undefined;
if (rawKind === "list") kind = "list_fetch";
else if (rawKind === "review") kind = "review_fetch";
else if (rawKind !== undefined) {
  logger.error("Usage: npm run reset-failed -- [--kind list|review]");
  process.exit(1);
}

const config = loadConfig();
initializeDatabase();

const scheduler = new TaskScheduler(getDb(), { maxRetries: config.env.maxRetries });
const reset = scheduler.resetFailed(kind);

logger.info(`Reset ${reset} failed ${rawKind ? `${rawKind} ` : ""}task(s) to pending`);
process.exit(0);
