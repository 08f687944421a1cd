import * as cheerio from "cheerio";
import {
  cleanText,
  extractInteger,
  extractPrice,
  parseStarScore,
} from "../normalizer";
import type {
  ListPage,
  Pagination,
  RatingFilter,
  RawCandidate,
  RawReview,
  ReviewPage,
  ReviewScores,
} from "../types";

export const SELECTORS = {
  listRow: ".list-row.J_ListRow",
  listScore: ".comment-score .score",
  listReviewCount: ".comment-score .count",
  listPrice: ".pi-price",
  listAddress: ".row-address",
  listStar: ".row-subtitle",
  reviewSection: "#hotel-review",
  review: "li.tb-r-comment",
  reviewAuthor: ".tb-r-nick a",
  reviewContent: ".tb-r-cnt",
  reviewSummary: ".comment-name",
  reviewStars: ".starscore li",
  reviewDate: ".tb-r-date",
  reviewPhotos: ".tb-r-photos img",
  reviewReply: ".tb-r-seller",
  reviewReplyDates: ".tb-r-info .tb-r-date",
  reviewCount: ["#J_ReviewCount", ".comments a", "li.comments a"],
  nextPage: ".pi-pagination-next:not(.pi-pagination-disabled)",
  currentPage: ".pi-pagination-current",
  withImages: "#review-addreply",
  challenge: [
    "#nc_1_n1z",
    ".nc-container",
    ".nc_wrapper",
    "#baxia-dialog-content",
    ".J_MIDDLEWARE_FRAME_WIDGET",
  ],
  challengeHandle: ["#nc_1_n1z", ".nc-lang-cnt"],
  challengeTrack: [".nc_scale", ".nc-container"],
  challengePassed: [".nc_ok", ".nc-success"],
} as const;

export const RATING_FILTER_SELECTORS: Record<RatingFilter, readonly string[]> = {
  all: ["#review-t-1", 'input[value="0"]', ".review-filter-all"],
  good: ["#review-t-2", 'input[value="1"]', ".review-filter-good"],
  medium: ["#review-t-4", 'input[value="2"]', ".review-filter-medium"],
  bad: ["#review-t-5", 'input[value="3"]', ".review-filter-bad"],
};

function parseFloatOrNull(value: string | undefined): number | null {
  if (!value) return null;
  const parsed = Number.parseFloat(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
}

function parsePagination($: cheerio.CheerioAPI): Pagination {
  const current = extractInteger($(SELECTORS.currentPage).first().text());
  return {
    page: current ?? 1,
    hasNext: $(SELECTORS.nextPage).length > 0,
  };
}

// Listing

export function parseListPage(html: string): ListPage {
  const $ = cheerio.load(html);
  const records: RawCandidate[] = [];

  $(SELECTORS.listRow).each((_, el) => {
    const row = $(el);
    const star = row.find(SELECTORS.listStar).first();
    const address = cleanText(row.find(SELECTORS.listAddress).first().text());

    records.push({
      hotelId: row.attr("data-shid")?.trim() || null,
      name: row.attr("data-name")?.trim() || null,
      address: address || null,
      latitude: parseFloatOrNull(row.attr("data-lat")),
      longitude: parseFloatOrNull(row.attr("data-lng")),
      starLevel: star.length > 0 ? star.attr("title") || cleanText(star.text()) || null : null,
      ratingScore: parseFloatOrNull(row.find(SELECTORS.listScore).first().text()),
      reviewCount: extractInteger(row.find(SELECTORS.listReviewCount).first().text()),
      basePrice: extractPrice(row.find(SELECTORS.listPrice).first().text()),
    });
  });

  return { records, pagination: parsePagination($) };
}

// Reviews

const SCORE_AXES = ["clean", "location", "service", "value"] as const;

export function parseReviewPage(html: string): ReviewPage {
  const $ = cheerio.load(html);
  const records: RawReview[] = [];

  $(SELECTORS.review).each((_, el) => {
    const item = $(el);
    const content = cleanText(item.find(SELECTORS.reviewContent).first().text());
    if (!content) return;

    const author = item.find(SELECTORS.reviewAuthor).first();
    const summary = cleanText(item.find(SELECTORS.reviewSummary).first().text());
    const reply = item.find(SELECTORS.reviewReply).first();
    const replyDates = item.find(SELECTORS.reviewReplyDates);

    const scores: ReviewScores = {
      clean: null,
      location: null,
      service: null,
      value: null,
    };
    item
      .find(SELECTORS.reviewStars)
      .slice(0, SCORE_AXES.length)
      .each((i, li) => {
        const style = $(li).find("em").first().attr("style");
        if (style) scores[SCORE_AXES[i]] = parseStarScore(style);
      });

    const imageUrls: string[] = [];
    item.find(SELECTORS.reviewPhotos).each((_, img) => {
      const url = $(img).attr("data-val");
      if (url) imageUrls.push(url);
    });

    records.push({
      authorHandle:
        author.length > 0 ? author.attr("title") || author.text().trim() || null : null,
      content,
      summary: summary || null,
      scores,
      date: item.find(SELECTORS.reviewDate).first().text().trim() || null,
      imageUrls,
      reply:
        reply.length > 0 && cleanText(reply.text())
          ? {
              content: cleanText(reply.text()),
              date: replyDates.length > 1 ? replyDates.last().text().trim() : null,
            }
          : null,
    });
  });

  return { records, pagination: parsePagination($) };
}

export function parseReviewCount(html: string): number | null {
  const $ = cheerio.load(html);
  for (const selector of SELECTORS.reviewCount) {
    const count = extractInteger($(selector).first().text());
    if (count !== null) return count;
  }
  return null;
}
