import { openDatabase, initializeDatabase } from "../db";
import type { Db } from "../db";
import type { AppConfig } from "../config";
import { PacingPolicy } from "../pacing";
import { createPipelineContext } from "../pipeline";
import type { PipelineContext } from "../pipeline";
import type {
  CandidateItem,
  CandidateSource,
  PriceTier,
  RawCandidate,
  RawReview,
  Region,
  ReviewPage,
  ReviewPageRequest,
  ReviewSource,
  SamplingPlan,
  TierFetchRequest,
} from "../types";

export const TIERS: PriceTier[] = [
  { level: "economy", min: 0, max: 300, targetCount: 4, priorityWeight: 3 },
  { level: "comfort", min: 300, max: 600, targetCount: 6, priorityWeight: 4 },
  { level: "upscale", min: 600, max: 900, targetCount: 3, priorityWeight: 2 },
  { level: "luxury", min: 900, max: 99999, targetCount: 2, priorityWeight: 1 },
];

/** Price that classifies into each tier of TIERS. */
export const TIER_PRICE: Record<string, number> = {
  economy: 100,
  comfort: 400,
  upscale: 700,
  luxury: 1000,
};

export function makeRegion(overrides: Partial<Region> = {}): Region {
  return {
    name: "Old Town",
    description: "",
    priorityWeight: 9,
    keywords: [],
    aspectFocus: [],
    zones: [
      { name: "Beijing Road", code: "z1" },
      { name: "Shamian Island", code: "z2" },
    ],
    tiers: TIERS,
    ...overrides,
  };
}

export function makePlan(regions: Region[] = [makeRegion()]): SamplingPlan {
  return { cityCode: "440100", regions };
}

export function makeConfig(plan: SamplingPlan = makePlan()): AppConfig {
  return {
    env: {
      dbPath: ":memory:",
      cdpUrl: "http://127.0.0.1:9222",
      maxRetries: 3,
      retryBackoffMs: 0,
      maxReviewsPerHotel: 300,
      minReviewsThreshold: 200,
      reviewTaskMinReviews: 50,
      requestTimeoutMs: 1000,
      port: 3000,
      timezone: "Asia/Shanghai",
      nodeEnv: "test",
      dryRun: false,
    },
    plan,
    crawler: {
      pacing: {
        page: { minMs: 0, maxMs: 0 },
        request: { minMs: 0, maxMs: 0 },
        zone: { minMs: 0, maxMs: 0 },
        region: { minMs: 0, maxMs: 0 },
      },
      pools: { negativeCap: 100, evidenceCap: 150, stallPageLimit: 2 },
      pagination: { listMaxPages: 5, reviewMaxPages: 30 },
      schedules: {
        reviewTaskSweep: "0 2 * * *",
        reviewDrain: "*/30 * * * *",
        reviewDrainBatch: 10,
      },
    },
    source: {
      listUrl: "https://hotels.example.com/list",
      detailUrlTemplate: "https://hotels.example.com/detail?shid={hotelId}&city={cityCode}",
      defaultSort: "default",
    },
  };
}

export function memoryDb(): Db {
  const db = openDatabase(":memory:");
  initializeDatabase(db);
  return db;
}

/**
 * Pipeline over a fresh in-memory database. Pacing never waits; retry
 * backoff is recorded in `slept` instead of slept.
 */
export function pipelineContext(
  config: AppConfig,
  sources: { listSource?: CandidateSource; reviewSource?: ReviewSource } = {},
): PipelineContext & { slept: number[] } {
  const slept: number[] = [];
  const ctx = createPipelineContext(
    config,
    memoryDb(),
    {
      listSource: sources.listSource ?? new FakeListSource({}),
      reviewSource: sources.reviewSource ?? new FakeReviewSource(0, () => EMPTY_PAGE),
    },
    {
      pacing: new PacingPolicy(config.crawler.pacing, () => 0, async () => undefined),
      sleep: async (ms) => {
        slept.push(ms);
      },
    },
  );
  return { ...ctx, slept };
}

export function rawCandidate(
  hotelId: string,
  price: number,
  overrides: Partial<RawCandidate> = {},
): RawCandidate {
  return {
    hotelId,
    name: `Hotel ${hotelId}`,
    address: null,
    latitude: null,
    longitude: null,
    starLevel: null,
    ratingScore: 4.5,
    reviewCount: 500,
    basePrice: price,
    ...overrides,
  };
}

export function candidateItem(
  hotelId: string,
  overrides: Partial<CandidateItem> = {},
): CandidateItem {
  return {
    hotelId,
    name: `Hotel${hotelId}`,
    address: null,
    cityCode: "440100",
    latitude: null,
    longitude: null,
    starLevel: null,
    ratingScore: 4.5,
    reviewCount: 500,
    basePrice: 400,
    region: "Old Town",
    zoneName: "Beijing Road",
    zoneCode: "z1",
    fetchedTier: "comfort",
    classifiedTier: "comfort",
    ...overrides,
  };
}

/**
 * Per-tier inventory. Each request gets the first `count` records of its tier
 * that the ledger has not seen yet.
 */
export class FakeListSource implements CandidateSource {
  readonly requests: Array<{ tier: string; count: number; pass: string; zone: string }> = [];

  constructor(private readonly supply: Record<string, RawCandidate[]>) {}

  static ofSizes(sizes: Record<string, number>): FakeListSource {
    const supply: Record<string, RawCandidate[]> = {};
    for (const [level, size] of Object.entries(sizes)) {
      supply[level] = Array.from({ length: size }, (_, i) =>
        rawCandidate(`${level}-${i + 1}`, TIER_PRICE[level]),
      );
    }
    return new FakeListSource(supply);
  }

  async fetchTier(request: TierFetchRequest): Promise<RawCandidate[]> {
    this.requests.push({
      tier: request.tier.level,
      count: request.count,
      pass: request.pass,
      zone: request.zone.code,
    });
    return (this.supply[request.tier.level] ?? [])
      .filter((r) => r.hotelId === null || !request.seen.has(r.hotelId))
      .slice(0, request.count);
  }
}

export function rawReview(content: string, overrides: Partial<RawReview> = {}): RawReview {
  return {
    authorHandle: "guest",
    content,
    summary: null,
    scores: { clean: 4, location: 4, service: 4, value: 4 },
    date: "[2026-01-11 20:34]",
    imageUrls: [],
    reply: null,
    ...overrides,
  };
}

type PageFn = (request: ReviewPageRequest) => ReviewPage;

export class FakeReviewSource implements ReviewSource {
  readonly pageRequests: ReviewPageRequest[] = [];
  opened: string[] = [];

  constructor(
    private readonly totalReviews: number | null,
    private readonly pageFn: PageFn,
  ) {}

  async open(hotelId: string): Promise<{ totalReviews: number | null }> {
    this.opened.push(hotelId);
    return { totalReviews: this.totalReviews };
  }

  async fetchPage(request: ReviewPageRequest): Promise<ReviewPage> {
    this.pageRequests.push(request);
    return this.pageFn(request);
  }
}

/** Ten fresh reviews per page, forever, for the given filter. */
export function endlessPage(request: ReviewPageRequest): ReviewPage {
  const { rating, withImages } = request.filter;
  return {
    records: Array.from({ length: 10 }, (_, i) =>
      rawReview(`${rating}-${withImages ? "img" : "txt"}-${request.page}-${i}`, {
        imageUrls: withImages ? [`https://img.example.com/${request.page}-${i}.jpg`] : [],
      }),
    ),
    pagination: { page: request.page + 1, hasNext: true },
  };
}

export const EMPTY_PAGE: ReviewPage = {
  records: [],
  pagination: { page: 1, hasNext: false },
};
