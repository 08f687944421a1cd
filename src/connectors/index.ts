import { BrowserPageDriver } from "./browser";
import { DriverListSource } from "./listing";
import { DriverReviewSource } from "./reviews";
import { PacingPolicy } from "../pacing";
import type { AppConfig } from "../config";

export { BrowserPageDriver, waitForEnter } from "./browser";
export { DriverListSource, buildSearchUrl } from "./listing";
export { DriverReviewSource, buildDetailUrl } from "./reviews";

export interface BrowserSources {
  driver: BrowserPageDriver;
  listSource: DriverListSource;
  reviewSource: DriverReviewSource;
  pacing: PacingPolicy;
}

/** Wires both sources onto one Chrome session; call `driver.close()` when done. */
export function createBrowserSources(config: AppConfig): BrowserSources {
  const pacing = new PacingPolicy(config.crawler.pacing);
  const driver = new BrowserPageDriver({
    cdpUrl: config.env.cdpUrl,
    timeoutMs: config.env.requestTimeoutMs,
    pacing,
  });
  return {
    driver,
    pacing,
    listSource: new DriverListSource(driver, {
      source: config.source,
      cityCode: config.plan.cityCode,
      maxPages: config.crawler.pagination.listMaxPages,
      timeZone: config.env.timezone,
    }),
    reviewSource: new DriverReviewSource(driver, {
      source: config.source,
      cityCode: config.plan.cityCode,
    }),
  };
}
