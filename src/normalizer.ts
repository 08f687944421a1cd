import { createHash } from "node:crypto";
import * as cheerio from "cheerio";
import type { PriceTier, ReviewScores } from "./types";

// Text cleaning

const DECORATIVE_QUOTES = /^["“”]+|["“”]+$/g;
const EMOJI = /\p{Extended_Pictographic}/gu;

export function cleanText(
  text: string | null | undefined,
  options: { removeEmoji?: boolean } = {},
): string {
  if (!text) return "";

  let cleaned = cheerio.load(text, null, false).root().text();
  cleaned = cleaned
    .replace(/&[a-zA-Z]+;/g, "")
    .replace(/&#\d+;/g, "")
    .replace(/\s+/g, " ")
    .trim()
    .replace(DECORATIVE_QUOTES, "")
    .trim();

  if (options.removeEmoji) {
    cleaned = cleaned.replace(EMOJI, "").replace(/\s+/g, " ").trim();
  }
  return cleaned;
}

export function normalizeHotelName(name: string | null | undefined): string {
  return cleanText(name).replace(/\s+/g, "");
}

const COMMON_TAGS = [
  "交通便利",
  "位置好",
  "服务热情",
  "干净卫生",
  "设施齐全",
  "早餐丰盛",
  "性价比高",
  "安静舒适",
  "停车方便",
  "环境优雅",
  "前台热情",
  "住宿舒适",
  "吃饭方便",
  "体验感强",
  "设施很好",
] as const;

export function extractTags(text: string | null | undefined): string[] {
  if (!text) return [];

  const tags = new Set<string>();
  for (const match of text.matchAll(/#([^\s#,，]+)/g)) {
    tags.add(match[1]);
  }
  for (const tag of COMMON_TAGS) {
    if (text.includes(tag)) tags.add(tag);
  }
  return [...tags];
}

// Field parsing

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

/** "width:80%" → 4.0 on a five point scale. */
export function parseStarScore(style: string | null | undefined): number {
  if (!style) return 0;
  const match = style.match(/(\d+(?:\.\d+)?)%/);
  if (!match) return 0;
  return roundOne((Number.parseFloat(match[1]) / 100) * 5);
}

/** "[2026-01-11 20:34]" → "2026-01-11 20:34:00". */
export function parseReviewDate(text: string | null | undefined): string | null {
  if (!text) return null;
  const match = text
    .replace(/^\[|\]$/g, "")
    .match(/(\d{4}-\d{2}-\d{2})\s*(\d{2}:\d{2})?/);
  if (!match) return null;
  return `${match[1]} ${match[2] ?? "00:00"}:00`;
}

export function extractPrice(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = text.replace(/,/g, "").match(/(\d+)/);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function extractInteger(text: string | null | undefined): number | null {
  return extractPrice(text);
}

export function overallScore(scores: ReviewScores): number | null {
  const present = [scores.clean, scores.location, scores.service, scores.value]
    .filter((s): s is number => s !== null);
  if (present.length === 0) return null;
  return roundOne(present.reduce((sum, s) => sum + s, 0) / present.length);
}

// Identity

/**
 * Content-addressed review key. Re-fetching the same review yields the same
 * id; any change to hotel, content or author yields a different one.
 */
export function reviewId(
  hotelId: string,
  content: string,
  authorHandle: string | null,
): string {
  const normalizedContent = content.replace(/\s+/g, " ").trim();
  const hash = createHash("sha256")
    .update([hotelId, normalizedContent, authorHandle ?? ""].join("\u001f"))
    .digest("hex");
  return `${hotelId}_${hash.slice(0, 16)}`;
}

// Tiering

export function classifyTier(
  price: number | null,
  tiers: PriceTier[],
): string | null {
  if (price === null) return null;
  for (let i = 0; i < tiers.length; i++) {
    const tier = tiers[i];
    const isLast = i === tiers.length - 1;
    if (price >= tier.min && (price < tier.max || (isLast && price === tier.max))) {
      return tier.level;
    }
  }
  return null;
}
