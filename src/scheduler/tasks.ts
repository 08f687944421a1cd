import { randomUUID } from "node:crypto";
import type { Db } from "../db";
import {
  countTasksByStatusAndKind,
  getOpenReviewTaskHotelIds,
  getTask,
  insertCrawlLog,
  insertTask,
  queryItemsByThreshold,
  saveTaskState,
  selectTasks,
  withTransaction,
} from "../db/operations";
import type { CrawlLogLevel } from "../db/operations";
import { TaskStateError, errorMessage } from "../errors";
import { logger } from "../logger";
import type {
  CandidateItem,
  FetchTask,
  ListFetchTask,
  ListTaskScope,
  PriceTier,
  Region,
  ReviewFetchTask,
  ReviewTaskScope,
  SamplingPlan,
  TaskKind,
  TaskOutcome,
  TaskStats,
  TaskStatus,
} from "../types";

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_REVIEW_TARGET = 300;

export type NewTask =
  | {
      kind: "list_fetch";
      scope: ListTaskScope;
      priority: number;
      itemsTarget: number | null;
    }
  | {
      kind: "review_fetch";
      scope: ReviewTaskScope;
      priority: number;
      itemsTarget: number | null;
    };

export interface TaskSchedulerOptions {
  maxRetries?: number;
  reviewTarget?: number;
  now?: () => Date;
  newId?: () => string;
}

// Priorities

export function listTaskPriority(region: Region, tier: PriceTier): number {
  return region.priorityWeight + tier.priorityWeight;
}

/** More reviews and a higher rating mean more value per scrape. */
export function reviewTaskPriority(item: CandidateItem): number {
  const reviews = item.reviewCount ?? 0;
  let priority = 0;
  if (reviews > 1000) priority += 10;
  else if (reviews > 500) priority += 8;
  else if (reviews > 200) priority += 5;

  if (item.ratingScore !== null) priority += Math.floor(item.ratingScore);
  return priority;
}

/**
 * Durable work queue over crawl_tasks.
 *
 *   pending ─start→ in_progress ─complete→ completed
 *                        │ ─skip→ skipped
 *                        └─fail→ pending (retryCount < max) | failed
 *
 * Every transition is written to crawl_logs with its reason.
 */
export class TaskScheduler {
  readonly maxRetries: number;
  private readonly reviewTarget: number;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly db: Db,
    options: TaskSchedulerOptions = {},
  ) {
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.reviewTarget = options.reviewTarget ?? DEFAULT_REVIEW_TARGET;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  enqueue(input: NewTask): FetchTask {
    const base: Omit<FetchTask, "kind" | "scope"> = {
      id: this.newId(),
      priority: input.priority,
      status: "pending",
      retryCount: 0,
      errorReason: null,
      createdAt: this.timestamp(),
      startedAt: null,
      completedAt: null,
      itemsCrawled: 0,
      itemsTarget: input.itemsTarget,
    };
    const task: FetchTask =
      input.kind === "list_fetch"
        ? { ...base, kind: input.kind, scope: input.scope }
        : { ...base, kind: input.kind, scope: input.scope };

    withTransaction(this.db, () => {
      insertTask(this.db, task);
      this.audit(task.id, "info", "created", null, "pending", describeScope(task));
    });
    return task;
  }

  get(id: string): FetchTask | null {
    return getTask(this.db, id);
  }

  private require(id: string): FetchTask {
    const task = getTask(this.db, id);
    if (!task) throw new Error(`Task not found: ${id}`);
    return task;
  }

  private audit(
    taskId: string,
    level: CrawlLogLevel,
    event: string,
    from: TaskStatus | null,
    to: TaskStatus | null,
    message: string | null,
  ): void {
    insertCrawlLog(this.db, {
      taskId,
      level,
      event,
      fromStatus: from,
      toStatus: to,
      message,
    });
  }

  private transition(
    current: FetchTask,
    next: FetchTask,
    event: string,
    level: CrawlLogLevel,
    reason: string | null,
  ): FetchTask {
    withTransaction(this.db, () => {
      saveTaskState(this.db, next);
      this.audit(next.id, level, event, current.status, next.status, reason);
    });

    const line = `[TASK] ${next.kind} ${next.id} ${current.status} → ${next.status}${reason ? `: ${reason}` : ""}`;
    if (level === "error") logger.error(line);
    else if (level === "warn") logger.warn(line);
    else logger.info(line);
    return next;
  }

  start(id: string): FetchTask {
    const task = this.require(id);
    if (task.status !== "pending") {
      throw new TaskStateError(id, task.status, "start");
    }
    return this.transition(
      task,
      { ...task, status: "in_progress", startedAt: this.timestamp() },
      "started",
      "info",
      task.retryCount > 0 ? `attempt ${task.retryCount + 1}` : null,
    );
  }

  complete(id: string, itemsCrawled: number): FetchTask {
    const task = this.require(id);
    if (task.status !== "in_progress") {
      throw new TaskStateError(id, task.status, "complete");
    }
    return this.transition(
      task,
      {
        ...task,
        status: "completed",
        itemsCrawled,
        errorReason: null,
        completedAt: this.timestamp(),
      },
      "completed",
      "info",
      `${itemsCrawled} items`,
    );
  }

  skip(id: string, reason: string): FetchTask {
    const task = this.require(id);
    if (task.status !== "in_progress") {
      throw new TaskStateError(id, task.status, "skip");
    }
    return this.transition(
      task,
      {
        ...task,
        status: "skipped",
        errorReason: reason,
        completedAt: this.timestamp(),
      },
      "skipped",
      "info",
      reason,
    );
  }

  fail(id: string, reason: string): FetchTask {
    const task = this.require(id);
    if (task.status !== "in_progress") {
      throw new TaskStateError(id, task.status, "fail");
    }

    const retryCount = task.retryCount + 1;
    if (retryCount < this.maxRetries) {
      return this.transition(
        task,
        { ...task, status: "pending", retryCount, errorReason: reason },
        "retry",
        "warn",
        `${reason} (retry ${retryCount}/${this.maxRetries})`,
      );
    }
    return this.transition(
      task,
      {
        ...task,
        status: "failed",
        retryCount,
        errorReason: reason,
        completedAt: this.timestamp(),
      },
      "failed",
      "error",
      `${reason} (gave up after ${retryCount} attempts)`,
    );
  }

  /**
   * Starts a pending task, runs `work` and records the outcome. A thrown
   * error becomes a failure transition rather than propagating.
   */
  async run(
    id: string,
    work: (task: FetchTask) => Promise<TaskOutcome>,
  ): Promise<FetchTask> {
    const started = this.start(id);
    let outcome: TaskOutcome;
    try {
      outcome = await work(started);
    } catch (error) {
      return this.fail(id, errorMessage(error));
    }
    return outcome.status === "completed"
      ? this.complete(id, outcome.itemsCrawled)
      : this.skip(id, outcome.reason);
  }

  nextBatch(kind?: TaskKind, limit = 10): FetchTask[] {
    return selectTasks(this.db, "pending", { kind, limit });
  }

  /** Operator recovery: every failed task back to pending with a clean slate. */
  resetFailed(kind?: TaskKind): number {
    const failed = selectTasks(this.db, "failed", { kind });
    withTransaction(this.db, () => {
      for (const task of failed) {
        saveTaskState(this.db, {
          ...task,
          status: "pending",
          retryCount: 0,
          errorReason: null,
          startedAt: null,
          completedAt: null,
        });
        this.audit(task.id, "info", "reset", "failed", "pending", "operator reset");
      }
    });
    if (failed.length > 0) {
      logger.info(`[TASK] Reset ${failed.length} failed task(s) to pending`);
    }
    return failed.length;
  }

  /** Tasks left in_progress by a crashed process count as a failed attempt. */
  recoverInterrupted(): number {
    const interrupted = selectTasks(this.db, "in_progress");
    for (const task of interrupted) {
      this.fail(task.id, "interrupted: process exited mid-task");
    }
    return interrupted.length;
  }

  stats(): TaskStats {
    const stats: TaskStats = {
      total: 0,
      byStatus: {
        pending: 0,
        in_progress: 0,
        completed: 0,
        failed: 0,
        skipped: 0,
      },
      byKind: { list_fetch: 0, review_fetch: 0 },
    };
    for (const row of countTasksByStatusAndKind(this.db)) {
      stats.total += row.count;
      stats.byStatus[row.status] += row.count;
      stats.byKind[row.kind] += row.count;
    }
    return stats;
  }

  createListTasks(plan: SamplingPlan): ListFetchTask[] {
    const created: ListFetchTask[] = [];
    withTransaction(this.db, () => {
      for (const region of plan.regions) {
        for (const zone of region.zones) {
          for (const tier of region.tiers) {
            const task = this.enqueue({
              kind: "list_fetch",
              scope: {
                region: region.name,
                zoneCode: zone.code,
                zoneName: zone.name,
                tierLevel: tier.level,
              },
              priority: listTaskPriority(region, tier),
              itemsTarget: tier.targetCount,
            });
            if (task.kind === "list_fetch") created.push(task);
          }
        }
      }
    });
    logger.info(`[TASK] Created ${created.length} list task(s)`);
    return created;
  }

  /** One review task per eligible hotel without an open review task. */
  createReviewTasks(minReviewCount: number): ReviewFetchTask[] {
    const eligible = [...queryItemsByThreshold(this.db, minReviewCount)];
    const open = getOpenReviewTaskHotelIds(this.db);
    const created: ReviewFetchTask[] = [];

    withTransaction(this.db, () => {
      for (const item of eligible) {
        if (open.has(item.hotelId)) continue;
        const task = this.enqueue({
          kind: "review_fetch",
          scope: {
            hotelId: item.hotelId,
            region: item.region || null,
            zoneCode: item.zoneCode || null,
          },
          priority: reviewTaskPriority(item),
          itemsTarget: Math.min(
            item.reviewCount ?? this.reviewTarget,
            this.reviewTarget,
          ),
        });
        if (task.kind === "review_fetch") created.push(task);
      }
    });

    logger.info(
      `[TASK] Created ${created.length} review task(s) (${eligible.length} eligible, ${eligible.length - created.length} already queued)`,
    );
    return created;
  }
}

function describeScope(task: FetchTask): string {
  if (task.kind === "list_fetch") {
    const { region, zoneName, zoneCode, tierLevel } = task.scope;
    return `${region} / ${zoneName} (${zoneCode}) / ${tierLevel}`;
  }
  return `hotel ${task.scope.hotelId}`;
}
