import { Hono } from "hono";
import { getDatabaseStats, quickHealthCheck } from "./db";
import {
  getCrawlLogs,
  getHotel,
  getHotelReviewStats,
  getHotels,
  getLatestRun,
  getRegionProgress,
  getReviewsForHotel,
} from "./db/operations";
import { calculateExpectedHotels } from "./planner/plan";
import type { PipelineContext } from "./pipeline";
import type { TaskKind } from "./types";

export type AppDeps = Pick<PipelineContext, "config" | "db" | "scheduler">;

const VERSION = "1.0.0";

function parseKind(raw: string | undefined): TaskKind | undefined | null {
  if (raw === undefined || raw === "") return undefined;
  if (raw === "list" || raw === "list_fetch") return "list_fetch";
  if (raw === "review" || raw === "review_fetch") return "review_fetch";
  return null;
}

function parseLimit(raw: string | undefined, fallback: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, max);
}

export function createApp(deps: AppDeps): Hono {
  const { config, db, scheduler } = deps;
  const app = new Hono();

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck(db);
    return c.json({
      status: dbOk ? "healthy" : "degraded",
      timestamp: new Date().toISOString(),
      version: VERSION,
      dryRun: config.env.dryRun,
      database: {
        ok: dbOk,
        stats: getDatabaseStats(db),
      },
    });
  });

  app.get("/status", (c) => {
    const expected = calculateExpectedHotels(config.plan);
    return c.json({
      timestamp: new Date().toISOString(),
      dryRun: config.env.dryRun,
      environment: config.env.nodeEnv,
      plan: {
        cityCode: config.plan.cityCode,
        regions: config.plan.regions.map((r) => r.name),
        expectedHotels: expected.total,
      },
      progress: getRegionProgress(db),
      tasks: scheduler.stats(),
      database: getDatabaseStats(db),
    });
  });

  app.get("/api/tasks/stats", (c) => c.json(scheduler.stats()));

  app.get("/api/tasks", (c) => {
    const kind = parseKind(c.req.query("kind"));
    if (kind === null) {
      return c.json({ error: "kind must be list or review" }, 400);
    }
    const limit = parseLimit(c.req.query("limit"), 10, 200);
    const tasks = scheduler.nextBatch(kind, limit);
    return c.json({ count: tasks.length, limit, tasks });
  });

  app.get("/api/tasks/:id", (c) => {
    const task = scheduler.get(c.req.param("id"));
    if (!task) {
      return c.json({ error: "Task not found" }, 404);
    }
    return c.json({ ...task, logs: getCrawlLogs(db, task.id) });
  });

  app.post("/api/tasks/reset-failed", (c) => {
    const kind = parseKind(c.req.query("kind"));
    if (kind === null) {
      return c.json({ error: "kind must be list or review" }, 400);
    }
    const reset = scheduler.resetFailed(kind);
    return c.json({ success: true, reset });
  });

  app.get("/api/hotels", (c) => {
    const minReviews = Number.parseInt(c.req.query("minReviews") ?? "", 10);
    const hotels = getHotels(db, {
      region: c.req.query("region") || undefined,
      minReviews: Number.isFinite(minReviews) ? minReviews : undefined,
      limit: parseLimit(c.req.query("limit"), 50, 500),
    });
    return c.json({ count: hotels.length, hotels });
  });

  app.get("/api/hotels/:id", (c) => {
    const id = c.req.param("id");
    const hotel = getHotel(db, id);
    if (!hotel) {
      return c.json({ error: "Hotel not found" }, 404);
    }
    const withReviews = c.req.query("reviews") === "true";
    return c.json({
      ...hotel,
      reviewStats: getHotelReviewStats(db, id),
      ...(withReviews ? { reviews: getReviewsForHotel(db, id) } : {}),
    });
  });

  app.get("/api/runs/latest", (c) => {
    const run = getLatestRun(db, c.req.query("type") || undefined);
    if (!run) {
      return c.json({ error: "No runs recorded" }, 404);
    }
    return c.json(run);
  });

  return app;
}
