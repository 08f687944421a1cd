import { logger } from "../logger";
import { assertNavigated } from "./listing";
import type { SourceConfig } from "../config";
import type {
  PageDriver,
  ReviewPage,
  ReviewPageRequest,
  ReviewSource,
} from "../types";

export function buildDetailUrl(
  template: string,
  hotelId: string,
  cityCode: string,
): string {
  return template
    .replace("{hotelId}", encodeURIComponent(hotelId))
    .replace("{cityCode}", encodeURIComponent(cityCode));
}

/**
 * Review pages of one hotel. `open` loads the detail page; page 0 of a
 * request applies its filter, later pages click through pagination.
 */
export class DriverReviewSource implements ReviewSource {
  constructor(
    private readonly driver: PageDriver,
    private readonly options: { source: SourceConfig; cityCode: string },
  ) {}

  async open(hotelId: string): Promise<{ totalReviews: number | null }> {
    const url = buildDetailUrl(
      this.options.source.detailUrlTemplate,
      hotelId,
      this.options.cityCode,
    );
    assertNavigated(await this.driver.navigate(url), url);
    const totalReviews = await this.driver.readReviewCount();
    logger.info(`[REVIEWS] ${hotelId}: ${totalReviews ?? "unknown"} reviews listed`);
    return { totalReviews };
  }

  async fetchPage(request: ReviewPageRequest): Promise<ReviewPage> {
    if (request.page === 0) {
      const { filter } = request;
      const applied = await this.driver.applyFilter(filter);
      // The unfiltered list is only a valid answer for the unfiltered request.
      if (!applied && (filter.rating !== "all" || filter.withImages)) {
        logger.warn(
          `[REVIEWS] ${request.hotelId}: filter ${filter.rating}${filter.withImages ? "+images" : ""} unavailable, skipping it`,
        );
        return { records: [], pagination: { page: 0, hasNext: false } };
      }
      return this.driver.extractReviewPage(filter);
    }
    if (!(await this.driver.nextPage())) {
      return { records: [], pagination: { page: request.page + 1, hasNext: false } };
    }
    return this.driver.extractReviewPage(request.filter);
  }
}
