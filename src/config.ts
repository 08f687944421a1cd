import { readFileSync, existsSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./logger";
import type { PriceTier, Region, SamplingPlan } from "./types";

export type DelayKind = "page" | "request" | "zone" | "region";

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface PoolConfig {
  negativeCap: number;
  evidenceCap: number;
  stallPageLimit: number;
}

export interface CrawlerConfig {
  pacing: Record<DelayKind, DelayRange>;
  pools: PoolConfig;
  pagination: {
    listMaxPages: number;
    reviewMaxPages: number;
  };
  schedules: {
    reviewTaskSweep: string;
    reviewDrain: string;
    reviewDrainBatch: number;
  };
}

export type ListSort = "default" | "sales" | "score" | "price";

export interface SourceConfig {
  listUrl: string;
  detailUrlTemplate: string;
  defaultSort: ListSort;
}

export interface EnvConfig {
  dbPath: string;
  cdpUrl: string;
  maxRetries: number;
  retryBackoffMs: number;
  maxReviewsPerHotel: number;
  minReviewsThreshold: number;
  reviewTaskMinReviews: number;
  requestTimeoutMs: number;
  port: number;
  timezone: string;
  nodeEnv: string;
  dryRun: boolean;
}

export interface AppConfig {
  env: EnvConfig;
  plan: SamplingPlan;
  crawler: CrawlerConfig;
  source: SourceConfig;
}

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");
const CONFIG_DIR = join(PROJECT_ROOT, "config");

// ─── File schemas ───────────────────────────────────────────────────────────

const priceTierSchema = z.object({
  level: z.string().min(1),
  min: z.number().nonnegative(),
  max: z.number().positive(),
  targetCount: z.number().int().nonnegative(),
  priorityWeight: z.number().int().default(0),
});

const priceTiersSchema = z
  .array(priceTierSchema)
  .min(1)
  .refine(
    (tiers) => tiers.every((t, i) => i === 0 || tiers[i - 1].min <= t.min),
    { message: "price tiers must be listed in ascending price order" },
  );

const samplingPlanFileSchema = z.object({
  cityCode: z.string().min(1),
  priceTiers: priceTiersSchema,
  regions: z
    .array(
      z.object({
        name: z.string().min(1),
        description: z.string().default(""),
        priorityWeight: z.number().int().default(0),
        keywords: z.array(z.string()).default([]),
        aspectFocus: z.array(z.string()).default([]),
        zones: z
          .array(z.object({ name: z.string().min(1), code: z.string().min(1) }))
          .min(1),
        priceTiers: priceTiersSchema.optional(),
      }),
    )
    .min(1),
});

const delayRangeSchema = z
  .object({ minMs: z.number().nonnegative(), maxMs: z.number().nonnegative() })
  .refine((r) => r.minMs <= r.maxMs, { message: "minMs must not exceed maxMs" });

const crawlerFileSchema = z.object({
  pacing: z.object({
    page: delayRangeSchema,
    request: delayRangeSchema,
    zone: delayRangeSchema,
    region: delayRangeSchema,
  }),
  pools: z.object({
    negativeCap: z.number().int().positive(),
    evidenceCap: z.number().int().positive(),
    stallPageLimit: z.number().int().positive(),
  }),
  pagination: z.object({
    listMaxPages: z.number().int().positive(),
    reviewMaxPages: z.number().int().positive(),
  }),
  schedules: z.object({
    reviewTaskSweep: z.string(),
    reviewDrain: z.string(),
    reviewDrainBatch: z.number().int().positive(),
  }),
});

const sourceFileSchema = z.object({
  listUrl: z.string().url(),
  detailUrlTemplate: z.string().includes("{hotelId}"),
  defaultSort: z.enum(["default", "sales", "score", "price"]),
});

// ─── Loading ────────────────────────────────────────────────────────────────

export function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

export function stripJsonComments(raw: string): string {
  // Strip comments while preserving string contents (avoid corrupting URLs).
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match, comment) => (comment ? "" : match),
  );
}

export function loadJsonConfig<T>(
  filename: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  configDir: string = CONFIG_DIR,
): T {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new Error(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(readFileSync(filepath, "utf-8")));
  } catch (error) {
    throw new Error(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid config file ${filename}: ${issues}`);
  }
  return result.data;
}

export function resolveSamplingPlan(
  file: z.infer<typeof samplingPlanFileSchema>,
): SamplingPlan {
  const regions: Region[] = file.regions.map((region) => {
    const tiers: PriceTier[] = (region.priceTiers ?? file.priceTiers).map(
      (tier) => ({ ...tier }),
    );
    return {
      name: region.name,
      description: region.description,
      priorityWeight: region.priorityWeight,
      keywords: region.keywords,
      aspectFocus: region.aspectFocus,
      zones: region.zones,
      tiers,
    };
  });
  return { cityCode: file.cityCode, regions };
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    dbPath: env.DB_PATH ?? join(PROJECT_ROOT, "data", "hotel-reviews.db"),
    cdpUrl: env.CDP_URL ?? "http://127.0.0.1:9222",
    maxRetries: parseEnvInt(env.MAX_RETRIES, 3, 1, 10),
    retryBackoffMs: parseEnvInt(env.RETRY_BACKOFF_MS, 2000, 0),
    maxReviewsPerHotel: parseEnvInt(env.MAX_REVIEWS_PER_HOTEL, 300, 1),
    minReviewsThreshold: parseEnvInt(env.MIN_REVIEWS_THRESHOLD, 200, 0),
    reviewTaskMinReviews: parseEnvInt(env.REVIEW_TASK_MIN_REVIEWS, 50, 0),
    requestTimeoutMs: parseEnvInt(env.REQUEST_TIMEOUT_MS, 30_000, 1000),
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    timezone: env.TZ ?? "Asia/Shanghai",
    nodeEnv: env.NODE_ENV ?? "development",
    dryRun: env.DRY_RUN === "true",
  };
}

export function loadConfig(options: { configDir?: string } = {}): AppConfig {
  dotenv.config({ path: join(PROJECT_ROOT, ".env") });
  logger.info("Loading configuration...");

  const configDir = options.configDir ?? CONFIG_DIR;
  const env = loadEnvConfig();
  const plan = resolveSamplingPlan(
    loadJsonConfig("sampling-plan.json", samplingPlanFileSchema, configDir),
  );
  const crawler = loadJsonConfig("crawler.json", crawlerFileSchema, configDir);
  const source = loadJsonConfig("source.json", sourceFileSchema, configDir);

  if (env.dryRun) {
    logger.info("🧪 DRY RUN MODE: fetched records will not be persisted");
  }

  const zoneCount = plan.regions.reduce((n, r) => n + r.zones.length, 0);

  logger.info(`Config loaded successfully:`);
  logger.info(`  - ${plan.regions.length} regions, ${zoneCount} zones`);
  logger.info(`  - Database: ${env.dbPath}`);
  logger.info(`  - Browser endpoint: ${env.cdpUrl}`);
  logger.info(
    `  - Reviews: max ${env.maxReviewsPerHotel}/hotel, skip below ${env.minReviewsThreshold}`,
  );
  logger.info(`  - Environment: ${env.nodeEnv}`);
  logger.info(`  - Timezone: ${env.timezone}`);

  return { env, plan, crawler, source };
}

let _config: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}
