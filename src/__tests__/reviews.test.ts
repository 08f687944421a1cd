import { describe, expect, it, vi } from "vitest";
import { ReviewPoolAllocator, poolPlan } from "../reviews";
import {
  EMPTY_PAGE,
  FakeReviewSource,
  endlessPage,
  rawReview,
} from "./helpers";
import type { ReviewPageRequest } from "../types";

function negativeOnly(request: ReviewPageRequest) {
  if (request.filter.withImages) return EMPTY_PAGE;
  return endlessPage(request);
}

describe("poolPlan", () => {
  it("orders negative, evidence, recency", () => {
    const plan = poolPlan({ negativeCap: 100, evidenceCap: 150 });
    expect(plan.map((p) => [p.pool, p.cap])).toEqual([
      ["negative", 100],
      ["evidence", 150],
      ["recency", Number.POSITIVE_INFINITY],
    ]);
    expect(plan[0].filters.map((f) => f.rating)).toEqual(["bad", "medium"]);
    expect(plan[1].filters).toEqual([{ rating: "all", withImages: true }]);
  });
});

describe("ReviewPoolAllocator", () => {
  it("fills pools in order under the shared budget", async () => {
    const source = new FakeReviewSource(1000, negativeOnly);
    const allocator = new ReviewPoolAllocator(source);

    const result = await allocator.allocate("h1", 300);

    expect(result.status).toBe("allocated");
    if (result.status !== "allocated") return;
    expect(result.byPool).toEqual({ negative: 100, evidence: 0, recency: 200 });
    expect(result.records).toHaveLength(300);
    expect(result.records.slice(0, 100).every((r) => r.sourcePool === "negative")).toBe(true);
    expect(result.records.slice(100).every((r) => r.sourcePool === "recency")).toBe(true);
    // the bad filter alone fills the negative pool
    expect(source.pageRequests.some((r) => r.filter.rating === "medium")).toBe(false);
  });

  it("never exceeds maxTotal", async () => {
    const source = new FakeReviewSource(1000, endlessPage);
    const allocator = new ReviewPoolAllocator(source);

    const result = await allocator.allocate("h1", 50);

    if (result.status !== "allocated") throw new Error("expected allocation");
    expect(result.byPool).toEqual({ negative: 50, evidence: 0, recency: 0 });
    expect(new Set(result.records.map((r) => r.reviewId)).size).toBe(50);
  });

  it("fills the evidence pool from image-bearing reviews", async () => {
    const source = new FakeReviewSource(1000, endlessPage);
    const allocator = new ReviewPoolAllocator(source);

    const result = await allocator.allocate("h1", 300);

    if (result.status !== "allocated") throw new Error("expected allocation");
    expect(result.byPool).toEqual({ negative: 100, evidence: 150, recency: 50 });
    expect(result.records.filter((r) => r.sourcePool === "evidence").every((r) => r.hasImage)).toBe(
      true,
    );
  });

  it("skips items below the review threshold before fetching pages", async () => {
    const source = new FakeReviewSource(150, endlessPage);
    const allocator = new ReviewPoolAllocator(source);

    const result = await allocator.allocate("h1");

    expect(result).toEqual({
      status: "skipped",
      hotelId: "h1",
      totalReviews: 150,
      reason: "150 reviews, below threshold 200",
    });
    expect(source.pageRequests).toEqual([]);
  });

  it("allocates when the review count is unknown", async () => {
    const source = new FakeReviewSource(null, negativeOnly);
    const result = await new ReviewPoolAllocator(source).allocate("h1", 20);
    expect(result.status).toBe("allocated");
  });

  it("abandons a filter after two pages without new ids", async () => {
    const repeated = {
      records: Array.from({ length: 5 }, (_, i) => rawReview(`same review ${i}`)),
      pagination: { page: 1, hasNext: true },
    };
    const source = new FakeReviewSource(1000, () => repeated);

    const result = await new ReviewPoolAllocator(source).allocate("h1", 300);

    if (result.status !== "allocated") throw new Error("expected allocation");
    expect(result.byPool).toEqual({ negative: 5, evidence: 0, recency: 0 });
    const calls = (rating: string, withImages: boolean) =>
      source.pageRequests.filter(
        (r) => r.filter.rating === rating && r.filter.withImages === withImages,
      ).length;
    expect(calls("bad", false)).toBe(3);
    expect(calls("medium", false)).toBe(2);
    expect(calls("all", true)).toBe(2);
    expect(calls("all", false)).toBe(2);
  });

  it("stops a filter when pagination runs out", async () => {
    const source = new FakeReviewSource(1000, (request) => ({
      records: [rawReview(`${request.filter.rating}-${request.filter.withImages}-${request.page}`)],
      pagination: { page: request.page + 1, hasNext: request.page < 2 },
    }));

    const result = await new ReviewPoolAllocator(source).allocate("h1", 300);

    if (result.status !== "allocated") throw new Error("expected allocation");
    // three pages for each of the four filters
    expect(source.pageRequests).toHaveLength(12);
    expect(result.byPool).toEqual({ negative: 6, evidence: 3, recency: 3 });
  });

  it("drops invalid reviews and counts them", async () => {
    const source = new FakeReviewSource(1000, (request) =>
      request.filter.rating === "bad" && request.page === 0
        ? { records: [rawReview("   "), rawReview("usable")], pagination: { page: 1, hasNext: false } }
        : EMPTY_PAGE,
    );

    const result = await new ReviewPoolAllocator(source).allocate("h1", 300);

    if (result.status !== "allocated") throw new Error("expected allocation");
    expect(result.dropped).toBe(1);
    expect(result.records.map((r) => r.content)).toEqual(["usable"]);
  });

  it("pauses between pages but not before the first", async () => {
    const pause = vi.fn(async () => undefined);
    const source = new FakeReviewSource(1000, (request) => ({
      records: [rawReview(`r-${request.filter.rating}-${request.filter.withImages}-${request.page}`)],
      pagination: { page: request.page + 1, hasNext: request.page < 1 },
    }));

    await new ReviewPoolAllocator(source, { pause }).allocate("h1", 300);

    // two pages per filter, four filters
    expect(pause).toHaveBeenCalledTimes(4);
  });
});
