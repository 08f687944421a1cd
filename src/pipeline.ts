import { logger } from "./logger";
import { DedupLedger } from "./dedup";
import { errorMessage } from "./errors";
import { PacingPolicy, sleep } from "./pacing";
import { planZone, toCandidateItem } from "./planner";
import type { TierFetcher } from "./planner";
import { findRegion } from "./planner/plan";
import { ReviewPoolAllocator } from "./reviews";
import {
  TaskScheduler,
  listTaskPriority,
  reviewTaskPriority,
} from "./scheduler/tasks";
import {
  createRun,
  finishRun,
  getHotel,
  getHotelIdsByRegion,
  upsertItem,
  upsertReview,
  withTransaction,
} from "./db/operations";
import type { Db } from "./db";
import type { AppConfig } from "./config";
import type {
  CandidateItem,
  CandidateSource,
  FetchTask,
  PlanRunSummary,
  RawCandidate,
  ReviewSource,
  SamplingPlan,
  TaskKind,
  TaskOutcome,
  TaskStats,
  ZonePlanResult,
} from "./types";

export interface PipelineContext {
  config: AppConfig;
  db: Db;
  scheduler: TaskScheduler;
  listSource: CandidateSource;
  reviewSource: ReviewSource;
  allocator: ReviewPoolAllocator;
  pacing: PacingPolicy;
  /** Used for retry backoff. */
  sleep: (ms: number) => Promise<void>;
}

export function createPipelineContext(
  config: AppConfig,
  db: Db,
  sources: { listSource: CandidateSource; reviewSource: ReviewSource },
  overrides: { pacing?: PacingPolicy; sleep?: (ms: number) => Promise<void> } = {},
): PipelineContext {
  const pacing = overrides.pacing ?? new PacingPolicy(config.crawler.pacing);
  return {
    config,
    db,
    scheduler: new TaskScheduler(db, {
      maxRetries: config.env.maxRetries,
      reviewTarget: config.env.maxReviewsPerHotel,
    }),
    listSource: sources.listSource,
    reviewSource: sources.reviewSource,
    allocator: new ReviewPoolAllocator(sources.reviewSource, {
      maxTotal: config.env.maxReviewsPerHotel,
      minReviews: config.env.minReviewsThreshold,
      negativeCap: config.crawler.pools.negativeCap,
      evidenceCap: config.crawler.pools.evidenceCap,
      stallPageLimit: config.crawler.pools.stallPageLimit,
      maxPages: config.crawler.pagination.reviewMaxPages,
      pause: () => pacing.pause("page"),
    }),
    pacing,
    sleep: overrides.sleep ?? sleep,
  };
}

function backoffMs(ctx: PipelineContext, retryCount: number): number {
  return ctx.config.env.retryBackoffMs * Math.pow(2, Math.max(0, retryCount - 1));
}

/**
 * Each tier attempt becomes a list_fetch task, retried through the task state
 * machine with exponential backoff. A task that ends failed yields nothing.
 */
export function taskBackedFetcher(ctx: PipelineContext): TierFetcher {
  return async (request) => {
    const region = findRegion(ctx.config.plan, request.region);
    const task = ctx.scheduler.enqueue({
      kind: "list_fetch",
      scope: {
        region: request.region,
        zoneCode: request.zone.code,
        zoneName: request.zone.name,
        tierLevel: request.tier.level,
      },
      priority: region ? listTaskPriority(region, request.tier) : request.tier.priorityWeight,
      itemsTarget: request.count,
    });

    for (;;) {
      let candidates: RawCandidate[] = [];
      const after = await ctx.scheduler.run(task.id, async () => {
        candidates = await ctx.listSource.fetchTier(request);
        return { status: "completed", itemsCrawled: candidates.length };
      });

      if (after.status === "completed") {
        return { candidates, taskId: task.id, failed: false, error: null };
      }
      if (after.status === "pending") {
        await ctx.sleep(backoffMs(ctx, after.retryCount));
        continue;
      }
      return { candidates: [], taskId: task.id, failed: true, error: after.errorReason };
    }
  };
}

function persistItems(ctx: PipelineContext, items: CandidateItem[]): void {
  if (ctx.config.env.dryRun) {
    logger.info(`[DRY RUN] Would store ${items.length} hotels`);
    return;
  }
  withTransaction(ctx.db, () => {
    for (const item of items) upsertItem(ctx.db, item);
  });
}

export async function planAndRun(
  ctx: PipelineContext,
  plan: SamplingPlan = ctx.config.plan,
  options: { regions?: string[] } = {},
): Promise<PlanRunSummary> {
  const startTime = Date.now();
  const wanted = options.regions?.map((r) => r.toLowerCase());
  const regions = plan.regions.filter(
    (r) => !wanted || wanted.includes(r.name.toLowerCase()),
  );

  logger.info("═══════════════════════════════════════════════════");
  logger.info(`  Hotel list run: ${regions.map((r) => r.name).join(", ") || "(no regions)"}`);
  logger.info("═══════════════════════════════════════════════════");

  const runId = createRun(ctx.db, "hotel_list", ctx.config.env.dryRun);
  const ledger = new DedupLedger();
  const fetch = taskBackedFetcher(ctx);
  const zones: ZonePlanResult[] = [];
  const errors: string[] = [];
  let zonesAttempted = 0;

  for (const [regionIndex, region] of regions.entries()) {
    if (regionIndex > 0) await ctx.pacing.pause("region");
    logger.info(`Region ${region.name}: ${region.zones.length} zones`);

    for (const [zoneIndex, zone] of region.zones.entries()) {
      if (zoneIndex > 0) await ctx.pacing.pause("zone");
      zonesAttempted++;
      try {
        const result = await planZone(zone, region.tiers, {
          region: region.name,
          cityCode: plan.cityCode,
          ledger,
          fetch,
        });
        persistItems(ctx, result.accepted);
        zones.push(result);
        for (const attempt of result.attempts) {
          if (attempt.failed) {
            errors.push(`${region.name}/${zone.name}/${attempt.tier} (${attempt.pass}): task ${attempt.taskId ?? "-"} failed`);
          }
        }
        logger.info(`  ${zone.name}: ${result.accepted.length}/${result.target}`);
      } catch (error) {
        const message = `${region.name}/${zone.name}: ${errorMessage(error)}`;
        logger.error(`Zone failed: ${message}`);
        errors.push(message);
      }
    }
  }

  const warnings = zones.flatMap((z) => (z.shortfall ? [z.shortfall] : []));
  const shortfallByZone: Record<string, number> = {};
  for (const warning of warnings) shortfallByZone[warning.zoneCode] = warning.shortfall;
  const accepted = zones.reduce((n, z) => n + z.accepted.length, 0);

  finishRun(ctx.db, runId, "completed", {
    zonesAttempted,
    hotelsAccepted: accepted,
    zonesShort: warnings.length,
    errors,
  });

  const durationMs = Date.now() - startTime;
  logger.info("Summary");
  logger.info(`  Hotels accepted: ${accepted}`);
  logger.info(`  Zones short: ${warnings.length}/${zonesAttempted}`);
  logger.info(`  Errors: ${errors.length}`);
  logger.info(`  Duration: ${(durationMs / 1000).toFixed(1)}s`);
  logger.info("═══════════════════════════════════════════════════");

  return { runId, accepted, shortfallByZone, warnings, zones, errors, durationMs };
}

export function createReviewTasksForEligibleItems(ctx: PipelineContext): string[] {
  return ctx.scheduler
    .createReviewTasks(ctx.config.env.reviewTaskMinReviews)
    .map((task) => task.id);
}

// Task execution

async function runReviewTask(ctx: PipelineContext, hotelId: string): Promise<TaskOutcome> {
  // Reviews reference hotels; crawling an unknown hotel could never be stored.
  if (!getHotel(ctx.db, hotelId)) {
    return { status: "skipped", reason: "hotel not stored" };
  }
  const result = await ctx.allocator.allocate(hotelId, ctx.config.env.maxReviewsPerHotel);
  if (result.status === "skipped") {
    return { status: "skipped", reason: result.reason };
  }
  if (result.records.length === 0) {
    return { status: "skipped", reason: "no reviews returned" };
  }

  if (ctx.config.env.dryRun) {
    logger.info(`[DRY RUN] Would store ${result.records.length} reviews for ${hotelId}`);
  } else {
    withTransaction(ctx.db, () => {
      for (const record of result.records) upsertReview(ctx.db, record);
    });
  }
  return { status: "completed", itemsCrawled: result.records.length };
}

async function runListTask(
  ctx: PipelineContext,
  task: FetchTask,
  ledger: DedupLedger,
): Promise<TaskOutcome> {
  if (task.kind !== "list_fetch") {
    return { status: "skipped", reason: `unexpected task kind ${task.kind}` };
  }
  const { scope } = task;
  const region = findRegion(ctx.config.plan, scope.region);
  const zone = region?.zones.find((z) => z.code === scope.zoneCode);
  const tier = region?.tiers.find((t) => t.level === scope.tierLevel);
  if (!region || !zone || !tier) {
    return { status: "skipped", reason: "scope no longer in sampling plan" };
  }

  if (ledger.size(region.name) === 0) {
    ledger.seed(region.name, getHotelIdsByRegion(ctx.db, region.name));
  }

  const count = task.itemsTarget ?? tier.targetCount;
  const candidates = await ctx.listSource.fetchTier({
    region: region.name,
    zone,
    tier,
    count,
    pass: "forward",
    seen: ledger.seen(region.name),
  });

  const accepted: CandidateItem[] = [];
  for (const raw of candidates) {
    if (accepted.length >= count) break;
    const item = toCandidateItem(raw, {
      region: region.name,
      cityCode: ctx.config.plan.cityCode,
      zone,
      tier,
      tiers: region.tiers,
    });
    if (item && ledger.accept(region.name, item.hotelId)) accepted.push(item);
  }
  persistItems(ctx, accepted);
  return { status: "completed", itemsCrawled: accepted.length };
}

/** Queues (or reuses) a review task for one hotel and runs it right away. */
export async function fetchReviewsForHotel(
  ctx: PipelineContext,
  hotelId: string,
): Promise<FetchTask> {
  const item = getHotel(ctx.db, hotelId);
  const open = ctx.scheduler
    .nextBatch("review_fetch", -1)
    .find((t) => t.kind === "review_fetch" && t.scope.hotelId === hotelId);
  const task =
    open ??
    ctx.scheduler.enqueue({
      kind: "review_fetch",
      scope: {
        hotelId,
        region: item?.region || null,
        zoneCode: item?.zoneCode || null,
      },
      priority: item ? reviewTaskPriority(item) : 0,
      itemsTarget: Math.min(
        item?.reviewCount ?? ctx.config.env.maxReviewsPerHotel,
        ctx.config.env.maxReviewsPerHotel,
      ),
    });
  return ctx.scheduler.run(task.id, () => runReviewTask(ctx, hotelId));
}

export interface TaskRunSummary {
  attempted: number;
  completed: number;
  skipped: number;
  retrying: number;
  failed: number;
  itemsCrawled: number;
}

/** Drains up to `limit` pending tasks, one at a time, in priority order. */
export async function runPendingTasks(
  ctx: PipelineContext,
  kind: TaskKind,
  limit = 10,
): Promise<TaskRunSummary> {
  const batch = ctx.scheduler.nextBatch(kind, limit);
  const summary: TaskRunSummary = {
    attempted: 0,
    completed: 0,
    skipped: 0,
    retrying: 0,
    failed: 0,
    itemsCrawled: 0,
  };
  const ledger = new DedupLedger();

  logger.info(`Running ${batch.length} pending ${kind} task(s)`);

  for (const [index, task] of batch.entries()) {
    if (index > 0) await ctx.pacing.pause("request");
    summary.attempted++;

    const after = await ctx.scheduler.run(task.id, (started) =>
      started.kind === "review_fetch"
        ? runReviewTask(ctx, started.scope.hotelId)
        : runListTask(ctx, started, ledger),
    );

    switch (after.status) {
      case "completed":
        summary.completed++;
        summary.itemsCrawled += after.itemsCrawled;
        break;
      case "skipped":
        summary.skipped++;
        break;
      case "pending":
        summary.retrying++;
        break;
      case "failed":
        summary.failed++;
        break;
      case "in_progress":
        break;
    }
  }

  logger.info(
    `Tasks: ${summary.completed} completed, ${summary.skipped} skipped, ${summary.retrying} retrying, ${summary.failed} failed`,
  );
  return summary;
}

export function stats(ctx: PipelineContext): TaskStats {
  return ctx.scheduler.stats();
}
