import { describe, expect, it } from "vitest";
import {
  classifyTier,
  cleanText,
  extractPrice,
  extractTags,
  normalizeHotelName,
  overallScore,
  parseReviewDate,
  parseStarScore,
  reviewId,
} from "../normalizer";
import { validateCandidate, validateReview } from "../validation";
import { RecordValidationError } from "../errors";
import { buildReviewRecord } from "../reviews";
import { TIERS, rawCandidate, rawReview } from "./helpers";

describe("text cleaning", () => {
  it("strips markup, entities, whitespace and decorative quotes", () => {
    expect(cleanText('  "Hello&nbsp;<i>world</i>"  ')).toBe("Hello world");
    expect(cleanText("line one\n\n  line two")).toBe("line one line two");
    expect(cleanText(null)).toBe("");
  });

  it("removes emoji on request", () => {
    expect(cleanText("nice 😀 room", { removeEmoji: true })).toBe("nice room");
    expect(cleanText("nice 😀 room")).toBe("nice 😀 room");
  });

  it("removes all whitespace from hotel names", () => {
    expect(normalizeHotelName(" Grand  Hotel \n Canton ")).toBe("GrandHotelCanton");
  });

  it("collects hashtags and common tags once each", () => {
    expect(extractTags("#quiet room, 交通便利 and #quiet again, 早餐丰盛")).toEqual([
      "quiet",
      "交通便利",
      "早餐丰盛",
    ]);
    expect(extractTags(null)).toEqual([]);
  });
});

describe("field parsing", () => {
  it("maps star widths onto five points", () => {
    expect(parseStarScore("width:80%")).toBe(4);
    expect(parseStarScore("width: 90%")).toBe(4.5);
    expect(parseStarScore("color:red")).toBe(0);
    expect(parseStarScore("")).toBe(0);
  });

  it("parses bracketed review dates", () => {
    expect(parseReviewDate("[2026-01-11 20:34]")).toBe("2026-01-11 20:34:00");
    expect(parseReviewDate("2026-01-11")).toBe("2026-01-11 00:00:00");
    expect(parseReviewDate("yesterday")).toBeNull();
  });

  it("extracts prices", () => {
    expect(extractPrice("¥1,857起")).toBe(1857);
    expect(extractPrice("sold out")).toBeNull();
    expect(extractPrice(null)).toBeNull();
  });

  it("averages the present axis scores", () => {
    expect(overallScore({ clean: 4, location: 5, service: 3, value: null })).toBe(4);
    expect(overallScore({ clean: 4, location: 4, service: 5, value: null })).toBe(4.3);
    expect(overallScore({ clean: null, location: null, service: null, value: null })).toBeNull();
  });
});

describe("classifyTier", () => {
  it("uses min-inclusive, max-exclusive bounds", () => {
    expect(classifyTier(0, TIERS)).toBe("economy");
    expect(classifyTier(299, TIERS)).toBe("economy");
    expect(classifyTier(300, TIERS)).toBe("comfort");
    expect(classifyTier(900, TIERS)).toBe("luxury");
  });

  it("includes the max of the last tier only", () => {
    expect(classifyTier(99999, TIERS)).toBe("luxury");
    expect(classifyTier(100000, TIERS)).toBeNull();
    expect(classifyTier(null, TIERS)).toBeNull();
  });
});

describe("reviewId", () => {
  it("is stable for the same inputs", () => {
    expect(reviewId("h1", "Great stay", "amy")).toBe(reviewId("h1", "Great stay", "amy"));
    expect(reviewId("h1", "Great stay", "amy")).toMatch(/^h1_[0-9a-f]{16}$/);
  });

  it("ignores whitespace differences in content", () => {
    expect(reviewId("h1", " Great   stay ", "amy")).toBe(reviewId("h1", "Great stay", "amy"));
  });

  it("changes when any input changes", () => {
    const base = reviewId("h1", "Great stay", "amy");
    expect(reviewId("h2", "Great stay", "amy")).not.toBe(base);
    expect(reviewId("h1", "Great stay!", "amy")).not.toBe(base);
    expect(reviewId("h1", "Great stay", "bob")).not.toBe(base);
    expect(reviewId("h1", "Great stay", null)).not.toBe(base);
  });

  it("produces no collisions across generated records", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(reviewId(`h${i % 7}`, `review number ${i}`, `guest${i % 13}`));
    }
    expect(ids.size).toBe(1000);
  });
});

describe("validation", () => {
  it("trims and accepts a well-formed candidate", () => {
    const result = validateCandidate(rawCandidate(" h1 ", 400));
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.hotelId).toBe("h1");
  });

  it("rejects out-of-range coordinates", () => {
    const result = validateCandidate(rawCandidate("h1", 400, { latitude: 91 }));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RecordValidationError);
      expect(result.error.issues).toHaveLength(1);
      expect(result.error.issues[0]).toMatch(/^latitude: /);
    }
  });

  it("rejects missing ids and over-long names", () => {
    expect(validateCandidate(rawCandidate("", 400)).ok).toBe(false);
    expect(validateCandidate(rawCandidate("h1", 400, { name: "x".repeat(201) })).ok).toBe(false);
    expect(validateCandidate(rawCandidate("h1", -1)).ok).toBe(false);
  });

  it("rejects reviews without content", () => {
    const built = buildReviewRecord("h1", rawReview("   "), "recency");
    expect(built.ok).toBe(false);
    if (!built.ok) expect(built.error.issues).toEqual(["content: content is required"]);
  });

  it("rejects reviews with scores above five", () => {
    const built = buildReviewRecord(
      "h1",
      rawReview("fine", { scores: { clean: 6, location: null, service: null, value: null } }),
      "recency",
    );
    expect(built.ok).toBe(false);
  });

  it("passes a valid review through unchanged", () => {
    const built = buildReviewRecord("h1", rawReview("fine"), "recency");
    expect(built.ok).toBe(true);
    if (built.ok) expect(validateReview(built.value)).toEqual({ ok: true, value: built.value });
  });
});

describe("buildReviewRecord", () => {
  it("normalises a raw review into a record", () => {
    const built = buildReviewRecord(
      "h1",
      rawReview("<b>Great</b> stay #quiet 交通便利", {
        authorHandle: " amy ",
        summary: "Would return",
        scores: { clean: 4, location: 5, service: null, value: 3 },
        imageUrls: ["https://img.example.com/1.jpg"],
        reply: { content: "Thank you!", date: "[2026-01-12 09:00]" },
      }),
      "evidence",
    );

    expect(built.ok).toBe(true);
    if (!built.ok) return;
    expect(built.value).toEqual({
      reviewId: reviewId("h1", "Great stay #quiet 交通便利", "amy"),
      hotelId: "h1",
      authorHandle: "amy",
      content: "Great stay #quiet 交通便利",
      summary: "Would return",
      scores: { clean: 4, location: 5, service: null, value: 3 },
      overallScore: 4,
      tags: ["quiet", "交通便利"],
      hasImage: true,
      imageUrls: ["https://img.example.com/1.jpg"],
      reviewDate: "2026-01-11 20:34:00",
      sourcePool: "evidence",
      reply: { content: "Thank you!", date: "2026-01-12 09:00:00" },
    });
  });
});
