import { ChallengeUnresolvedError, TransientFetchError } from "../errors";
import { logger } from "../logger";
import type { ListSort, SourceConfig } from "../config";
import type {
  CandidateSource,
  NavigateResult,
  PageDriver,
  RawCandidate,
  TierFetchRequest,
} from "../types";

const SORT_PARAMS: Record<ListSort, [string, string] | null> = {
  default: null,
  sales: ["sortType", "1"],
  score: ["sortType", "2"],
  price: ["sortType", "3"],
};

export interface SearchUrlParams {
  cityCode: string;
  zoneCode?: string;
  priceMin?: number;
  priceMax?: number;
  sort?: ListSort;
  checkIn?: string;
  checkOut?: string;
}

/** YYYY-MM-DD, `days` from `from`, in the given timezone. */
export function stayDate(from: Date, days: number, timeZone: string): string {
  const date = new Date(from.getTime() + days * 24 * 60 * 60 * 1000);
  return date.toLocaleDateString("en-CA", { timeZone });
}

/** Check-in defaults to tomorrow, check-out to the day after. */
export function buildSearchUrl(
  listUrl: string,
  params: SearchUrlParams,
  options: { now?: Date; timeZone?: string } = {},
): string {
  const now = options.now ?? new Date();
  const timeZone = options.timeZone ?? "Asia/Shanghai";

  const query = new URLSearchParams({
    city: params.cityCode,
    checkIn: params.checkIn ?? stayDate(now, 1, timeZone),
    checkOut: params.checkOut ?? stayDate(now, 2, timeZone),
  });
  if (params.zoneCode) query.set("businessZone", params.zoneCode);
  if (params.priceMin !== undefined && params.priceMax !== undefined) {
    query.set("priceRange", `${params.priceMin}-${params.priceMax}`);
  }
  const sort = SORT_PARAMS[params.sort ?? "default"];
  if (sort) query.set(sort[0], sort[1]);

  return `${listUrl}?${query.toString()}`;
}

export function assertNavigated(result: NavigateResult, url: string): void {
  if (result.ok) return;
  if (result.reason === "challenge") {
    throw new ChallengeUnresolvedError(`Challenge unresolved at ${url}`);
  }
  throw new TransientFetchError(result.reason, `Navigation failed (${url}): ${result.error}`);
}

export interface ListSourceOptions {
  source: SourceConfig;
  cityCode: string;
  maxPages: number;
  timeZone?: string;
  now?: () => Date;
}

/**
 * Serves tier requests from the listing pages, skipping hotels the ledger has
 * already taken so a backfill request is not spent on known ids.
 */
export class DriverListSource implements CandidateSource {
  constructor(
    private readonly driver: PageDriver,
    private readonly options: ListSourceOptions,
  ) {}

  searchUrl(request: TierFetchRequest): string {
    return buildSearchUrl(
      this.options.source.listUrl,
      {
        cityCode: this.options.cityCode,
        zoneCode: request.zone.code,
        priceMin: request.tier.min,
        priceMax: request.tier.max,
        sort: this.options.source.defaultSort,
      },
      { now: this.options.now?.(), timeZone: this.options.timeZone },
    );
  }

  async fetchTier(request: TierFetchRequest): Promise<RawCandidate[]> {
    const url = this.searchUrl(request);
    logger.info(
      `[LIST] ${request.region} / ${request.zone.name} / ${request.tier.level} (${request.pass}): want ${request.count}`,
    );
    assertNavigated(await this.driver.navigate(url), url);

    const collected: RawCandidate[] = [];
    const taken = new Set<string>();
    let fresh = 0;

    for (let page = 1; page <= this.options.maxPages; page++) {
      const result = await this.driver.extractListPage();
      for (const record of result.records) {
        if (record.hotelId) {
          if (request.seen.has(record.hotelId) || taken.has(record.hotelId)) continue;
          taken.add(record.hotelId);
          fresh++;
        }
        collected.push(record);
      }

      if (fresh >= request.count) break;
      if (!result.pagination.hasNext) break;
      if (!(await this.driver.nextPage())) break;
    }

    logger.info(`[LIST] ${request.zone.name} / ${request.tier.level}: ${fresh} new candidates`);
    return collected;
  }
}
