/**
 * Waterfall review allocation.
 * Pools are filled strictly in order under one shared budget:
 *   1. negative: bad, then medium ratings (cap 100)
 *   2. evidence: all ratings, image-bearing only (cap 150)
 *   3. recency: all ratings, newest first (whatever budget is left)
 */

import { logger } from "../logger";
import {
  cleanText,
  extractTags,
  overallScore,
  parseReviewDate,
  reviewId,
} from "../normalizer";
import { validateReview } from "../validation";
import type { ValidationResult } from "../validation";
import type {
  RawReview,
  ReviewFilter,
  ReviewRecord,
  ReviewSource,
  SourcePool,
} from "../types";

export const DEFAULT_MAX_TOTAL = 300;
export const DEFAULT_MIN_REVIEWS = 200;

export interface PoolSpec {
  pool: SourcePool;
  filters: ReviewFilter[];
  cap: number;
}

export function poolPlan(caps: { negativeCap: number; evidenceCap: number }): PoolSpec[] {
  return [
    {
      pool: "negative",
      filters: [
        { rating: "bad", withImages: false },
        { rating: "medium", withImages: false },
      ],
      cap: caps.negativeCap,
    },
    {
      pool: "evidence",
      filters: [{ rating: "all", withImages: true }],
      cap: caps.evidenceCap,
    },
    {
      pool: "recency",
      filters: [{ rating: "all", withImages: false }],
      cap: Number.POSITIVE_INFINITY,
    },
  ];
}

export interface AllocatorOptions {
  maxTotal?: number;
  minReviews?: number;
  negativeCap?: number;
  evidenceCap?: number;
  /** Consecutive pages without a new id before a filter is abandoned. */
  stallPageLimit?: number;
  maxPages?: number;
  /** Think time between review pages. */
  pause?: () => Promise<unknown>;
}

export type AllocationResult =
  | {
      status: "allocated";
      hotelId: string;
      totalReviews: number | null;
      records: ReviewRecord[];
      byPool: Record<SourcePool, number>;
      dropped: number;
    }
  | {
      status: "skipped";
      hotelId: string;
      totalReviews: number | null;
      reason: string;
    };

export function buildReviewRecord(
  hotelId: string,
  raw: RawReview,
  pool: SourcePool,
): ValidationResult<ReviewRecord> {
  const content = cleanText(raw.content);
  const summary = raw.summary ? cleanText(raw.summary) || null : null;
  const authorHandle = raw.authorHandle?.trim() || null;
  const tags = [...new Set([...extractTags(content), ...extractTags(summary)])];

  return validateReview({
    reviewId: reviewId(hotelId, content, authorHandle),
    hotelId,
    authorHandle,
    content,
    summary,
    scores: raw.scores,
    overallScore: overallScore(raw.scores),
    tags,
    hasImage: raw.imageUrls.length > 0,
    imageUrls: raw.imageUrls,
    reviewDate: parseReviewDate(raw.date),
    sourcePool: pool,
    reply: raw.reply
      ? { content: cleanText(raw.reply.content), date: parseReviewDate(raw.reply.date) }
      : null,
  });
}

export class ReviewPoolAllocator {
  private readonly maxTotal: number;
  private readonly minReviews: number;
  private readonly pools: PoolSpec[];
  private readonly stallPageLimit: number;
  private readonly maxPages: number;
  private readonly pause: () => Promise<unknown>;

  constructor(
    private readonly source: ReviewSource,
    options: AllocatorOptions = {},
  ) {
    this.maxTotal = options.maxTotal ?? DEFAULT_MAX_TOTAL;
    this.minReviews = options.minReviews ?? DEFAULT_MIN_REVIEWS;
    this.pools = poolPlan({
      negativeCap: options.negativeCap ?? 100,
      evidenceCap: options.evidenceCap ?? 150,
    });
    this.stallPageLimit = options.stallPageLimit ?? 2;
    this.maxPages = options.maxPages ?? 30;
    this.pause = options.pause ?? (() => Promise.resolve());
  }

  async allocate(
    hotelId: string,
    maxTotal: number = this.maxTotal,
  ): Promise<AllocationResult> {
    const { totalReviews } = await this.source.open(hotelId);

    if (totalReviews === null) {
      logger.warn(`[REVIEWS] Review count unknown for ${hotelId}, allocating anyway`);
    } else if (totalReviews < this.minReviews) {
      const reason = `${totalReviews} reviews, below threshold ${this.minReviews}`;
      logger.info(`[REVIEWS] Skipping ${hotelId}: ${reason}`);
      return { status: "skipped", hotelId, totalReviews, reason };
    }

    const records: ReviewRecord[] = [];
    const seen = new Set<string>();
    const byPool: Record<SourcePool, number> = { negative: 0, evidence: 0, recency: 0 };
    let dropped = 0;

    for (const step of this.pools) {
      const budget = Math.min(step.cap, maxTotal - records.length);
      if (budget <= 0) break;

      let taken = 0;
      for (const filter of step.filters) {
        if (taken >= budget) break;

        let stalls = 0;
        for (let page = 0; page < this.maxPages && taken < budget; page++) {
          if (page > 0) await this.pause();
          const result = await this.source.fetchPage({ hotelId, filter, page });

          let added = 0;
          for (const raw of result.records) {
            if (taken >= budget) break;
            const built = buildReviewRecord(hotelId, raw, step.pool);
            if (!built.ok) {
              dropped++;
              logger.warn(`[REVIEWS] Dropped invalid review: ${built.error.message}`);
              continue;
            }
            if (seen.has(built.value.reviewId)) continue;
            seen.add(built.value.reviewId);
            records.push(built.value);
            taken++;
            added++;
          }

          if (added === 0) {
            stalls++;
            if (stalls >= this.stallPageLimit) {
              logger.debug(
                `[REVIEWS] ${hotelId} ${step.pool}/${filter.rating}: ${stalls} pages without new reviews, moving on`,
              );
              break;
            }
          } else {
            stalls = 0;
          }
          if (!result.pagination.hasNext) break;
        }
      }

      byPool[step.pool] = taken;
      logger.info(`[REVIEWS] ${hotelId} ${step.pool} pool: ${taken}`);
    }

    logger.info(`[REVIEWS] ${hotelId}: ${records.length} reviews allocated`);
    return { status: "allocated", hotelId, totalReviews, records, byPool, dropped };
  }
}
