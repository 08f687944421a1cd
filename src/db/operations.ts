import { z } from "zod";
import type { Db } from "./index";
import type {
  CandidateItem,
  FetchTask,
  ReviewRecord,
  SourcePool,
  TaskKind,
  TaskStatus,
} from "../types";

// Transactions

/**
 * Runs `fn` in one transaction: commit on return, rollback on throw.
 * Nested calls become savepoints. `fn` must be synchronous.
 */
export function withTransaction<T>(db: Db, fn: () => T): T {
  return db.transaction(fn)();
}

// Row decoding

const stringList = z.array(z.string());

function parseStringList(json: string | null): string[] {
  if (!json) return [];
  const parsed = stringList.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : [];
}

const TASK_STATUSES: readonly TaskStatus[] = [
  "pending",
  "in_progress",
  "completed",
  "failed",
  "skipped",
];
const TASK_KINDS: readonly TaskKind[] = ["list_fetch", "review_fetch"];
const SOURCE_POOLS: readonly SourcePool[] = ["negative", "evidence", "recency"];

function oneOf<T extends string>(
  allowed: readonly T[],
  value: string,
  column: string,
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value in database: ${value}`);
  }
  return match;
}

function required<T>(value: T | null, column: string, taskId: string): T {
  if (value === null) {
    throw new Error(`Task ${taskId} is missing ${column}`);
  }
  return value;
}

// Run Log

export interface RunLogEntry {
  id: number;
  runType: string;
  startedAt: string;
  finishedAt: string | null;
  status: string;
  zonesAttempted: number;
  hotelsAccepted: number;
  zonesShort: number;
  errors: string[];
  dryRun: boolean;
}

interface RunLogRow {
  id: number;
  run_type: string;
  started_at: string;
  finished_at: string | null;
  status: string;
  zones_attempted: number;
  hotels_accepted: number;
  zones_short: number;
  errors: string | null;
  dry_run: number;
}

export function createRun(db: Db, runType: string, dryRun: boolean): number {
  const result = db
    .prepare("INSERT INTO run_log (run_type, dry_run) VALUES (?, ?)")
    .run(runType, dryRun ? 1 : 0);
  return Number(result.lastInsertRowid);
}

export function finishRun(
  db: Db,
  runId: number,
  status: string,
  stats: {
    zonesAttempted: number;
    hotelsAccepted: number;
    zonesShort: number;
    errors: string[];
  },
): void {
  db.prepare(
    `UPDATE run_log SET
      finished_at = datetime('now'),
      status = ?,
      zones_attempted = ?,
      hotels_accepted = ?,
      zones_short = ?,
      errors = ?
    WHERE id = ?`,
  ).run(
    status,
    stats.zonesAttempted,
    stats.hotelsAccepted,
    stats.zonesShort,
    stats.errors.length > 0 ? JSON.stringify(stats.errors) : null,
    runId,
  );
}

export function getLatestRun(db: Db, runType?: string): RunLogEntry | null {
  const row = db
    .prepare<[string | null, string | null], RunLogRow>(
      `SELECT * FROM run_log
       WHERE (? IS NULL OR run_type = ?)
       ORDER BY id DESC LIMIT 1`,
    )
    .get(runType ?? null, runType ?? null);
  if (!row) return null;
  return {
    id: row.id,
    runType: row.run_type,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    status: row.status,
    zonesAttempted: row.zones_attempted,
    hotelsAccepted: row.hotels_accepted,
    zonesShort: row.zones_short,
    errors: parseStringList(row.errors),
    dryRun: row.dry_run === 1,
  };
}

// Hotels

interface HotelRow {
  hotel_id: string;
  name: string;
  address: string | null;
  city_code: string | null;
  latitude: number | null;
  longitude: number | null;
  star_level: string | null;
  rating_score: number | null;
  review_count: number | null;
  base_price: number | null;
  region: string | null;
  business_zone: string | null;
  zone_code: string | null;
  price_level: string | null;
  fetched_tier: string | null;
}

function rowToItem(row: HotelRow): CandidateItem {
  return {
    hotelId: row.hotel_id,
    name: row.name,
    address: row.address,
    cityCode: row.city_code ?? "",
    latitude: row.latitude,
    longitude: row.longitude,
    starLevel: row.star_level,
    ratingScore: row.rating_score,
    reviewCount: row.review_count,
    basePrice: row.base_price,
    region: row.region ?? "",
    zoneName: row.business_zone ?? "",
    zoneCode: row.zone_code ?? "",
    fetchedTier: row.fetched_tier ?? "",
    classifiedTier: row.price_level,
  };
}

const HOTEL_COLUMNS = `hotel_id, name, address, city_code, latitude, longitude,
  star_level, rating_score, review_count, base_price, region, business_zone,
  zone_code, price_level, fetched_tier`;

/** Idempotent on hotel_id; null incoming fields keep the stored value. */
export function upsertItem(db: Db, item: CandidateItem): void {
  db.prepare(
    `INSERT INTO hotels (${HOTEL_COLUMNS})
    VALUES (
      @hotelId, @name, @address, @cityCode, @latitude, @longitude,
      @starLevel, @ratingScore, @reviewCount, @basePrice, @region, @zoneName,
      @zoneCode, @classifiedTier, @fetchedTier
    )
    ON CONFLICT(hotel_id) DO UPDATE SET
      name = COALESCE(NULLIF(excluded.name, ''), name),
      address = COALESCE(excluded.address, address),
      city_code = COALESCE(NULLIF(excluded.city_code, ''), city_code),
      latitude = COALESCE(excluded.latitude, latitude),
      longitude = COALESCE(excluded.longitude, longitude),
      star_level = COALESCE(excluded.star_level, star_level),
      rating_score = COALESCE(excluded.rating_score, rating_score),
      review_count = COALESCE(excluded.review_count, review_count),
      base_price = COALESCE(excluded.base_price, base_price),
      region = COALESCE(NULLIF(excluded.region, ''), region),
      business_zone = COALESCE(NULLIF(excluded.business_zone, ''), business_zone),
      zone_code = COALESCE(NULLIF(excluded.zone_code, ''), zone_code),
      price_level = COALESCE(excluded.price_level, price_level),
      fetched_tier = COALESCE(NULLIF(excluded.fetched_tier, ''), fetched_tier),
      updated_at = datetime('now')`,
  ).run({
    hotelId: item.hotelId,
    name: item.name,
    address: item.address,
    cityCode: item.cityCode,
    latitude: item.latitude,
    longitude: item.longitude,
    starLevel: item.starLevel,
    ratingScore: item.ratingScore,
    reviewCount: item.reviewCount,
    basePrice: item.basePrice,
    region: item.region,
    zoneName: item.zoneName,
    zoneCode: item.zoneCode,
    classifiedTier: item.classifiedTier,
    fetchedTier: item.fetchedTier,
  });
}

export function getHotel(db: Db, hotelId: string): CandidateItem | null {
  const row = db
    .prepare<[string], HotelRow>(
      `SELECT ${HOTEL_COLUMNS} FROM hotels WHERE hotel_id = ?`,
    )
    .get(hotelId);
  return row ? rowToItem(row) : null;
}

export function getHotels(
  db: Db,
  filter: { region?: string; minReviews?: number; limit?: number } = {},
): CandidateItem[] {
  return db
    .prepare<[string | null, string | null, number, number], HotelRow>(
      `SELECT ${HOTEL_COLUMNS} FROM hotels
       WHERE (? IS NULL OR region = ?)
         AND COALESCE(review_count, 0) >= ?
       ORDER BY review_count DESC, hotel_id ASC
       LIMIT ?`,
    )
    .all(
      filter.region ?? null,
      filter.region ?? null,
      filter.minReviews ?? 0,
      filter.limit ?? -1,
    )
    .map(rowToItem);
}

export function getHotelIdsByRegion(db: Db, region: string): string[] {
  return db
    .prepare<[string], { hotel_id: string }>(
      "SELECT hotel_id FROM hotels WHERE region = ? ORDER BY hotel_id",
    )
    .all(region)
    .map((row) => row.hotel_id);
}

/**
 * Hotels with at least `minReviewCount` listed reviews, most reviewed first.
 * The connection stays busy while iterating: collect before writing.
 */
export function* queryItemsByThreshold(
  db: Db,
  minReviewCount: number,
): Generator<CandidateItem> {
  const stmt = db.prepare<[number], HotelRow>(
    `SELECT ${HOTEL_COLUMNS} FROM hotels
     WHERE review_count >= ?
     ORDER BY review_count DESC, hotel_id ASC`,
  );
  for (const row of stmt.iterate(minReviewCount)) {
    yield rowToItem(row);
  }
}

// Reviews

interface ReviewRow {
  review_id: string;
  hotel_id: string;
  author_handle: string | null;
  content: string;
  summary: string | null;
  score_clean: number | null;
  score_location: number | null;
  score_service: number | null;
  score_value: number | null;
  overall_score: number | null;
  tags: string | null;
  has_image: number;
  review_date: string | null;
  source_pool: string;
  reply_content: string | null;
  reply_date: string | null;
}

const REVIEW_SELECT = `
  SELECT r.*, rr.content AS reply_content, rr.reply_date AS reply_date
  FROM reviews r
  LEFT JOIN review_replies rr ON rr.review_id = r.review_id`;

function getImageUrls(db: Db, reviewId: string): string[] {
  return db
    .prepare<[string], { image_url: string }>(
      "SELECT image_url FROM review_images WHERE review_id = ? ORDER BY id",
    )
    .all(reviewId)
    .map((row) => row.image_url);
}

function rowToReview(db: Db, row: ReviewRow): ReviewRecord {
  return {
    reviewId: row.review_id,
    hotelId: row.hotel_id,
    authorHandle: row.author_handle,
    content: row.content,
    summary: row.summary,
    scores: {
      clean: row.score_clean,
      location: row.score_location,
      service: row.score_service,
      value: row.score_value,
    },
    overallScore: row.overall_score,
    tags: parseStringList(row.tags),
    hasImage: row.has_image === 1,
    imageUrls: getImageUrls(db, row.review_id),
    reviewDate: row.review_date,
    sourcePool: oneOf(SOURCE_POOLS, row.source_pool, "source_pool"),
    reply:
      row.reply_content !== null
        ? { content: row.reply_content, date: row.reply_date }
        : null,
  };
}

/** Idempotent on review_id, images and reply included. */
export function upsertReview(db: Db, review: ReviewRecord): void {
  withTransaction(db, () => {
    db.prepare(
      `INSERT INTO reviews (
        review_id, hotel_id, author_handle, content, summary,
        score_clean, score_location, score_service, score_value,
        overall_score, tags, has_image, review_date, source_pool
      ) VALUES (
        @reviewId, @hotelId, @authorHandle, @content, @summary,
        @clean, @location, @service, @value,
        @overallScore, @tags, @hasImage, @reviewDate, @sourcePool
      )
      ON CONFLICT(review_id) DO UPDATE SET
        author_handle = COALESCE(excluded.author_handle, author_handle),
        content = COALESCE(NULLIF(excluded.content, ''), content),
        summary = COALESCE(excluded.summary, summary),
        score_clean = COALESCE(excluded.score_clean, score_clean),
        score_location = COALESCE(excluded.score_location, score_location),
        score_service = COALESCE(excluded.score_service, score_service),
        score_value = COALESCE(excluded.score_value, score_value),
        overall_score = COALESCE(excluded.overall_score, overall_score),
        tags = COALESCE(excluded.tags, tags),
        has_image = MAX(has_image, excluded.has_image),
        review_date = COALESCE(excluded.review_date, review_date),
        source_pool = excluded.source_pool,
        updated_at = datetime('now')`,
    ).run({
      reviewId: review.reviewId,
      hotelId: review.hotelId,
      authorHandle: review.authorHandle,
      content: review.content,
      summary: review.summary,
      clean: review.scores.clean,
      location: review.scores.location,
      service: review.scores.service,
      value: review.scores.value,
      overallScore: review.overallScore,
      tags: review.tags.length > 0 ? JSON.stringify(review.tags) : null,
      hasImage: review.hasImage ? 1 : 0,
      reviewDate: review.reviewDate,
      sourcePool: review.sourcePool,
    });

    const insertImage = db.prepare(
      "INSERT OR IGNORE INTO review_images (review_id, image_url) VALUES (?, ?)",
    );
    for (const url of review.imageUrls) {
      insertImage.run(review.reviewId, url);
    }

    if (review.reply) {
      db.prepare(
        `INSERT INTO review_replies (review_id, content, reply_date)
        VALUES (?, ?, ?)
        ON CONFLICT(review_id) DO UPDATE SET
          content = excluded.content,
          reply_date = COALESCE(excluded.reply_date, reply_date)`,
      ).run(review.reviewId, review.reply.content, review.reply.date);
    }
  });
}

export function getReview(db: Db, reviewId: string): ReviewRecord | null {
  const row = db
    .prepare<[string], ReviewRow>(`${REVIEW_SELECT} WHERE r.review_id = ?`)
    .get(reviewId);
  return row ? rowToReview(db, row) : null;
}

export function getReviewsForHotel(db: Db, hotelId: string): ReviewRecord[] {
  return db
    .prepare<[string], ReviewRow>(
      `${REVIEW_SELECT} WHERE r.hotel_id = ? ORDER BY r.review_date DESC, r.review_id`,
    )
    .all(hotelId)
    .map((row) => rowToReview(db, row));
}

export function countReviews(db: Db, hotelId?: string): number {
  const row = db
    .prepare<[string | null, string | null], { count: number }>(
      "SELECT COUNT(*) AS count FROM reviews WHERE (? IS NULL OR hotel_id = ?)",
    )
    .get(hotelId ?? null, hotelId ?? null);
  return row?.count ?? 0;
}

// Crawl Tasks

interface TaskRow {
  id: string;
  kind: string;
  region: string | null;
  zone_code: string | null;
  zone_name: string | null;
  tier_level: string | null;
  hotel_id: string | null;
  priority: number;
  status: string;
  retry_count: number;
  error_reason: string | null;
  items_crawled: number;
  items_target: number | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

function rowToTask(row: TaskRow): FetchTask {
  const base = {
    id: row.id,
    priority: row.priority,
    status: oneOf(TASK_STATUSES, row.status, "status"),
    retryCount: row.retry_count,
    errorReason: row.error_reason,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    itemsCrawled: row.items_crawled,
    itemsTarget: row.items_target,
  };

  const kind = oneOf(TASK_KINDS, row.kind, "kind");
  if (kind === "list_fetch") {
    return {
      ...base,
      kind,
      scope: {
        region: required(row.region, "region", row.id),
        zoneCode: required(row.zone_code, "zone_code", row.id),
        zoneName: required(row.zone_name, "zone_name", row.id),
        tierLevel: required(row.tier_level, "tier_level", row.id),
      },
    };
  }
  return {
    ...base,
    kind,
    scope: {
      hotelId: required(row.hotel_id, "hotel_id", row.id),
      region: row.region,
      zoneCode: row.zone_code,
    },
  };
}

export function insertTask(db: Db, task: FetchTask): void {
  const scope =
    task.kind === "list_fetch"
      ? {
          region: task.scope.region,
          zoneCode: task.scope.zoneCode,
          zoneName: task.scope.zoneName,
          tierLevel: task.scope.tierLevel,
          hotelId: null,
        }
      : {
          region: task.scope.region,
          zoneCode: task.scope.zoneCode,
          zoneName: null,
          tierLevel: null,
          hotelId: task.scope.hotelId,
        };

  db.prepare(
    `INSERT INTO crawl_tasks (
      id, kind, region, zone_code, zone_name, tier_level, hotel_id,
      priority, status, retry_count, error_reason, items_crawled, items_target,
      created_at, started_at, completed_at
    ) VALUES (
      @id, @kind, @region, @zoneCode, @zoneName, @tierLevel, @hotelId,
      @priority, @status, @retryCount, @errorReason, @itemsCrawled, @itemsTarget,
      @createdAt, @startedAt, @completedAt
    )`,
  ).run({
    id: task.id,
    kind: task.kind,
    ...scope,
    priority: task.priority,
    status: task.status,
    retryCount: task.retryCount,
    errorReason: task.errorReason,
    itemsCrawled: task.itemsCrawled,
    itemsTarget: task.itemsTarget,
    createdAt: task.createdAt,
    startedAt: task.startedAt,
    completedAt: task.completedAt,
  });
}

export function getTask(db: Db, id: string): FetchTask | null {
  const row = db
    .prepare<[string], TaskRow>("SELECT * FROM crawl_tasks WHERE id = ?")
    .get(id);
  return row ? rowToTask(row) : null;
}

/** Persists the mutable lifecycle fields of a task. */
export function saveTaskState(db: Db, task: FetchTask): void {
  db.prepare(
    `UPDATE crawl_tasks SET
      status = ?,
      retry_count = ?,
      error_reason = ?,
      items_crawled = ?,
      started_at = ?,
      completed_at = ?
    WHERE id = ?`,
  ).run(
    task.status,
    task.retryCount,
    task.errorReason,
    task.itemsCrawled,
    task.startedAt,
    task.completedAt,
    task.id,
  );
}

/** Highest priority first, oldest first within a priority. */
export function selectTasks(
  db: Db,
  status: TaskStatus,
  options: { kind?: TaskKind; limit?: number } = {},
): FetchTask[] {
  return db
    .prepare<[string, string | null, string | null, number], TaskRow>(
      `SELECT * FROM crawl_tasks
       WHERE status = ? AND (? IS NULL OR kind = ?)
       ORDER BY priority DESC, created_at ASC, rowid ASC
       LIMIT ?`,
    )
    .all(status, options.kind ?? null, options.kind ?? null, options.limit ?? -1)
    .map(rowToTask);
}

export function countTasksByStatusAndKind(
  db: Db,
): Array<{ status: TaskStatus; kind: TaskKind; count: number }> {
  return db
    .prepare<[], { status: string; kind: string; count: number }>(
      `SELECT status, kind, COUNT(*) AS count
       FROM crawl_tasks GROUP BY status, kind`,
    )
    .all()
    .map((row) => ({
      status: oneOf(TASK_STATUSES, row.status, "status"),
      kind: oneOf(TASK_KINDS, row.kind, "kind"),
      count: row.count,
    }));
}

export function getOpenReviewTaskHotelIds(db: Db): Set<string> {
  const rows = db
    .prepare<[], { hotel_id: string }>(
      `SELECT DISTINCT hotel_id FROM crawl_tasks
       WHERE kind = 'review_fetch'
         AND status IN ('pending', 'in_progress')
         AND hotel_id IS NOT NULL`,
    )
    .all();
  return new Set(rows.map((row) => row.hotel_id));
}

// Crawl Logs

export type CrawlLogLevel = "info" | "warn" | "error";

const CRAWL_LOG_LEVELS: readonly CrawlLogLevel[] = ["info", "warn", "error"];

export interface CrawlLogEntry {
  taskId: string | null;
  level: CrawlLogLevel;
  event: string;
  fromStatus: TaskStatus | null;
  toStatus: TaskStatus | null;
  message: string | null;
}

export function insertCrawlLog(db: Db, entry: CrawlLogEntry): void {
  db.prepare(
    `INSERT INTO crawl_logs (task_id, level, event, from_status, to_status, message)
    VALUES (?, ?, ?, ?, ?, ?)`,
  ).run(
    entry.taskId,
    entry.level,
    entry.event,
    entry.fromStatus,
    entry.toStatus,
    entry.message,
  );
}

export function getCrawlLogs(db: Db, taskId: string): CrawlLogEntry[] {
  return db
    .prepare<
      [string],
      {
        task_id: string | null;
        level: string;
        event: string;
        from_status: string | null;
        to_status: string | null;
        message: string | null;
      }
    >(
      `SELECT task_id, level, event, from_status, to_status, message
       FROM crawl_logs WHERE task_id = ? ORDER BY id`,
    )
    .all(taskId)
    .map((row) => ({
      taskId: row.task_id,
      level: oneOf(CRAWL_LOG_LEVELS, row.level, "level"),
      event: row.event,
      fromStatus:
        row.from_status === null
          ? null
          : oneOf(TASK_STATUSES, row.from_status, "from_status"),
      toStatus:
        row.to_status === null
          ? null
          : oneOf(TASK_STATUSES, row.to_status, "to_status"),
      message: row.message,
    }));
}

// Progress Views

export interface RegionProgress {
  region: string;
  hotels: number;
  hotelsWithReviews: number;
  reviewsStored: number;
}

export function getRegionProgress(db: Db): RegionProgress[] {
  return db
    .prepare<
      [],
      {
        region: string | null;
        hotels: number;
        hotels_with_reviews: number;
        reviews_stored: number;
      }
    >("SELECT * FROM v_region_crawl_progress ORDER BY region")
    .all()
    .map((row) => ({
      region: row.region ?? "(unassigned)",
      hotels: row.hotels,
      hotelsWithReviews: row.hotels_with_reviews,
      reviewsStored: row.reviews_stored,
    }));
}

export interface HotelReviewStats {
  hotelId: string;
  name: string;
  region: string | null;
  priceLevel: string | null;
  reviewCount: number | null;
  reviewsStored: number;
  negativeCount: number;
  evidenceCount: number;
  recencyCount: number;
  avgOverallScore: number | null;
}

export function getHotelReviewStats(db: Db, hotelId: string): HotelReviewStats | null {
  const row = db
    .prepare<
      [string],
      {
        hotel_id: string;
        name: string;
        region: string | null;
        price_level: string | null;
        review_count: number | null;
        reviews_stored: number;
        negative_count: number | null;
        evidence_count: number | null;
        recency_count: number | null;
        avg_overall_score: number | null;
      }
    >("SELECT * FROM v_hotel_review_stats WHERE hotel_id = ?")
    .get(hotelId);
  if (!row) return null;
  return {
    hotelId: row.hotel_id,
    name: row.name,
    region: row.region,
    priceLevel: row.price_level,
    reviewCount: row.review_count,
    reviewsStored: row.reviews_stored,
    negativeCount: row.negative_count ?? 0,
    evidenceCount: row.evidence_count ?? 0,
    recencyCount: row.recency_count ?? 0,
    avgOverallScore: row.avg_overall_score,
  };
}
