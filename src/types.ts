import type { TransientCause } from "./errors";

// ─── Sampling plan ──────────────────────────────────────────────────────────

export interface PriceTier {
  level: string;
  min: number;
  max: number;
  targetCount: number;
  priorityWeight: number;
}

export interface Zone {
  name: string;
  code: string;
}

export interface Region {
  name: string;
  description: string;
  priorityWeight: number;
  keywords: string[];
  aspectFocus: string[];
  zones: Zone[];
  tiers: PriceTier[]; // ascending price order
}

export interface SamplingPlan {
  cityCode: string;
  regions: Region[];
}

// ─── Records ────────────────────────────────────────────────────────────────

export interface RawCandidate {
  hotelId: string | null;
  name: string | null;
  address: string | null;
  latitude: number | null;
  longitude: number | null;
  starLevel: string | null;
  ratingScore: number | null;
  reviewCount: number | null;
  basePrice: number | null;
}

export interface CandidateItem {
  hotelId: string;
  name: string;
  address: string | null;
  cityCode: string;
  latitude: number | null;
  longitude: number | null;
  starLevel: string | null;
  ratingScore: number | null;
  reviewCount: number | null;
  basePrice: number | null;
  region: string;
  zoneName: string;
  zoneCode: string;
  fetchedTier: string; // provenance
  classifiedTier: string | null; // authoritative, by price
}

export type SourcePool = "negative" | "evidence" | "recency";

export type RatingFilter = "all" | "good" | "medium" | "bad";

export interface ReviewFilter {
  rating: RatingFilter;
  withImages: boolean;
}

export interface ReviewScores {
  clean: number | null;
  location: number | null;
  service: number | null;
  value: number | null;
}

export interface MerchantReply {
  content: string;
  date: string | null;
}

export interface RawReview {
  authorHandle: string | null;
  content: string | null;
  summary: string | null;
  scores: ReviewScores;
  date: string | null;
  imageUrls: string[];
  reply: MerchantReply | null;
}

export interface ReviewRecord {
  reviewId: string;
  hotelId: string;
  authorHandle: string | null;
  content: string;
  summary: string | null;
  scores: ReviewScores;
  overallScore: number | null;
  tags: string[];
  hasImage: boolean;
  imageUrls: string[];
  reviewDate: string | null;
  sourcePool: SourcePool;
  reply: MerchantReply | null;
}

// ─── Tasks ──────────────────────────────────────────────────────────────────

export type TaskKind = "list_fetch" | "review_fetch";

export type TaskStatus =
  | "pending"
  | "in_progress"
  | "completed"
  | "failed"
  | "skipped";

export interface ListTaskScope {
  region: string;
  zoneCode: string;
  zoneName: string;
  tierLevel: string;
}

export interface ReviewTaskScope {
  hotelId: string;
  region: string | null;
  zoneCode: string | null;
}

interface TaskBase {
  id: string;
  priority: number;
  status: TaskStatus;
  retryCount: number;
  errorReason: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  itemsCrawled: number;
  itemsTarget: number | null;
}

export interface ListFetchTask extends TaskBase {
  kind: "list_fetch";
  scope: ListTaskScope;
}

export interface ReviewFetchTask extends TaskBase {
  kind: "review_fetch";
  scope: ReviewTaskScope;
}

export type FetchTask = ListFetchTask | ReviewFetchTask;

export interface TaskStats {
  total: number;
  byStatus: Record<TaskStatus, number>;
  byKind: Record<TaskKind, number>;
}

/** What a unit of task work reports back to the scheduler. */
export type TaskOutcome =
  | { status: "completed"; itemsCrawled: number }
  | { status: "skipped"; reason: string };

// ─── Page-driving collaborator ──────────────────────────────────────────────

export type NavigateResult =
  | { ok: true }
  | { ok: false; reason: TransientCause; error: string };

export interface Pagination {
  page: number;
  hasNext: boolean;
}

export interface ListPage {
  records: RawCandidate[];
  pagination: Pagination;
}

export interface ReviewPage {
  records: RawReview[];
  pagination: Pagination;
}

export interface PageDriver {
  navigate(url: string): Promise<NavigateResult>;
  extractListPage(): Promise<ListPage>;
  /** Applies `filter`, which restarts pagination at the first page. */
  applyFilter(filter: ReviewFilter): Promise<boolean>;
  /** Reads the current page; applies `filter` first if another one is active. */
  extractReviewPage(filter: ReviewFilter): Promise<ReviewPage>;
  nextPage(): Promise<boolean>;
  readReviewCount(): Promise<number | null>;
  solveChallenge(): Promise<boolean>;
}

export type PlanPass = "forward" | "reverse";

export interface TierFetchRequest {
  region: string;
  zone: Zone;
  tier: PriceTier;
  count: number;
  pass: PlanPass;
  seen: ReadonlySet<string>;
}

export interface CandidateSource {
  fetchTier(request: TierFetchRequest): Promise<RawCandidate[]>;
}

export interface ReviewPageRequest {
  hotelId: string;
  filter: ReviewFilter;
  page: number; // 0 applies the filter, later pages paginate
}

export interface ReviewSource {
  open(hotelId: string): Promise<{ totalReviews: number | null }>;
  fetchPage(request: ReviewPageRequest): Promise<ReviewPage>;
}

// ─── Run results ────────────────────────────────────────────────────────────

export interface TierAttempt {
  tier: string;
  pass: PlanPass;
  requested: number;
  actual: number;
  taskId: string | null;
  failed: boolean;
}

export interface QuotaShortfallWarning {
  region: string;
  zoneCode: string;
  zoneName: string;
  target: number;
  actual: number;
  shortfall: number;
}

export interface ZonePlanResult {
  region: string;
  zone: Zone;
  target: number;
  accepted: CandidateItem[];
  attempts: TierAttempt[];
  shortfall: QuotaShortfallWarning | null;
}

export interface PlanRunSummary {
  runId: number;
  accepted: number;
  shortfallByZone: Record<string, number>;
  warnings: QuotaShortfallWarning[];
  zones: ZonePlanResult[];
  errors: string[];
  durationMs: number;
}
