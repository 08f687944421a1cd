import { logger } from "../logger";
import { getDb, initializeDatabase } from "../db";
import { loadConfig } from "../config";
import { createBrowserSources } from "../connectors";
import { createPipelineContext, planAndRun } from "../pipeline";
import { findRegion } from "../planner/plan";

const args = process.argv.slice(2);
const regionIndex = args.indexOf("--region");
const region = regionIndex !== -1 ? args[regionIndex + 1] : undefined;
const all = args.includes("--all");

if (!region && !all) {
  logger.error("Usage: npm run hotel-list -- --region <name> | --all");
  logger.error('Example: npm run hotel-list -- --region "Old Town"');
  process.exit(1);
}

const config = loadConfig();
initializeDatabase();

if (region && !findRegion(config.plan, region)) {
  logger.error(`Unknown region: ${region}`);
  logger.error(`Regions: ${config.plan.regions.map((r) => r.name).join(", ")}`);
  process.exit(1);
}

const sources = createBrowserSources(config);
const ctx = createPipelineContext(config, getDb(), sources, { pacing: sources.pacing });

try {
  const recovered = ctx.scheduler.recoverInterrupted();
  if (recovered > 0) logger.warn(`Recovered ${recovered} interrupted task(s)`);

  const summary = await planAndRun(ctx, config.plan, {
    regions: region ? [region] : undefined,
  });

  for (const warning of summary.warnings) {
    logger.warn(
      `  Short: ${warning.region} / ${warning.zoneName}: ${warning.actual}/${warning.target}`,
    );
  }
  logger.info(`Run #${summary.runId}: ${summary.accepted} hotels accepted`);
} finally {
  await sources.driver.close();
}

process.exit(0);
