import { createInterface } from "node:readline/promises";
import { chromium } from "playwright-core";
import type { Browser, Locator, Page } from "playwright-core";
import { ChallengeUnresolvedError, errorMessage } from "../errors";
import { logger } from "../logger";
import { synthesizeMotion } from "../pacing";
import type { PacingPolicy, Random } from "../pacing";
import {
  RATING_FILTER_SELECTORS,
  SELECTORS,
  parseListPage,
  parseReviewCount,
  parseReviewPage,
} from "./page-parser";
import type {
  ListPage,
  NavigateResult,
  PageDriver,
  ReviewFilter,
  ReviewPage,
} from "../types";

const DEFAULT_TRACK_WIDTH = 300;

export interface BrowserDriverOptions {
  cdpUrl: string;
  timeoutMs: number;
  pacing: PacingPolicy;
  /** Blocks until the operator says the challenge has been dealt with. */
  waitForOperator?: (prompt: string) => Promise<void>;
  random?: Random;
}

export async function waitForEnter(prompt: string): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await rl.question(prompt);
  } finally {
    rl.close();
  }
}

/**
 * Drives an already running Chrome over the DevTools protocol. Start it with
 * `--remote-debugging-port=9222` and a dedicated profile; the driver reuses
 * its first tab so the session's cookies stay in play.
 */
export class BrowserPageDriver implements PageDriver {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private activeFilter: ReviewFilter | null = null;
  private readonly waitForOperator: (prompt: string) => Promise<void>;
  private readonly random: Random;

  constructor(private readonly options: BrowserDriverOptions) {
    this.waitForOperator = options.waitForOperator ?? waitForEnter;
    this.random = options.random ?? Math.random;
  }

  async connect(): Promise<void> {
    if (this.page) return;
    try {
      this.browser = await chromium.connectOverCDP(this.options.cdpUrl, {
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      logger.error(`Failed to connect to Chrome at ${this.options.cdpUrl}:`, error);
      logger.info(
        'Start Chrome first: chrome --remote-debugging-port=9222 --user-data-dir="<profile dir>"',
      );
      throw error;
    }

    const context = this.browser.contexts()[0] ?? (await this.browser.newContext());
    this.page = context.pages()[0] ?? (await context.newPage());
    this.page.setDefaultTimeout(this.options.timeoutMs);
    logger.info(`Connected to Chrome at ${this.options.cdpUrl}`);
  }

  /** Drops the CDP connection; the browser itself keeps running. */
  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      logger.info("Disconnected from Chrome");
    }
    this.browser = null;
    this.page = null;
  }

  private async currentPage(): Promise<Page> {
    if (!this.page) await this.connect();
    if (!this.page) throw new Error("Browser page unavailable");
    return this.page;
  }

  async navigate(url: string): Promise<NavigateResult> {
    const page = await this.currentPage();
    logger.info(`Navigating to: ${url}`);
    this.activeFilter = null;

    try {
      await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.options.timeoutMs,
      });
    } catch (error) {
      const message = errorMessage(error);
      return {
        ok: false,
        reason: /timeout/i.test(message) ? "timeout" : "navigation",
        error: message,
      };
    }

    await this.options.pacing.pause("page");
    if (!(await this.solveChallenge())) {
      return { ok: false, reason: "challenge", error: "challenge unresolved" };
    }
    return { ok: true };
  }

  private async scrollToBottom(step = 500, maxScrolls = 10): Promise<void> {
    const page = await this.currentPage();
    for (let i = 0; i < maxScrolls; i++) {
      const before = await page.evaluate<number>("document.body.scrollHeight");
      await page.mouse.wheel(0, step);
      await this.options.pacing.pause("page");
      const after = await page.evaluate<number>("document.body.scrollHeight");
      if (after === before) break;
    }
  }

  async extractListPage(): Promise<ListPage> {
    const page = await this.currentPage();
    try {
      await page.locator(SELECTORS.listRow).first().waitFor({ timeout: 10_000 });
    } catch (error) {
      logger.debug(`No listing rows rendered: ${errorMessage(error)}`);
    }
    await this.scrollToBottom();
    const result = parseListPage(await page.content());
    logger.info(`Found ${result.records.length} hotels on page ${result.pagination.page}`);
    return result;
  }

  private async firstPresent(selectors: readonly string[]): Promise<Locator | null> {
    const page = await this.currentPage();
    for (const selector of selectors) {
      const locator = page.locator(selector).first();
      if ((await locator.count()) > 0) return locator;
    }
    return null;
  }

  async applyFilter(filter: ReviewFilter): Promise<boolean> {
    const page = await this.currentPage();

    const section = page.locator(SELECTORS.reviewSection).first();
    if ((await section.count()) > 0) await section.scrollIntoViewIfNeeded();

    let applied = false;
    const target = await this.firstPresent(RATING_FILTER_SELECTORS[filter.rating]);
    if (target) {
      const id = await target.getAttribute("id");
      const label = id ? page.locator(`label[for="${id}"]`).first() : null;
      if (label && (await label.count()) > 0) await label.click();
      else await target.click();
      applied = true;
      await this.options.pacing.pause("page");
    } else {
      logger.warn(`Review filter control not found: ${filter.rating}`);
    }

    const checkbox = page.locator(SELECTORS.withImages).first();
    if ((await checkbox.count()) > 0) {
      if ((await checkbox.isChecked()) !== filter.withImages) {
        await checkbox.click();
        await this.options.pacing.pause("page");
      }
    } else if (filter.withImages) {
      logger.warn("Image filter control not found");
    }

    this.activeFilter = filter;
    return applied;
  }

  async extractReviewPage(filter: ReviewFilter): Promise<ReviewPage> {
    const active = this.activeFilter;
    if (
      !active ||
      active.rating !== filter.rating ||
      active.withImages !== filter.withImages
    ) {
      await this.applyFilter(filter);
    }
    const page = await this.currentPage();
    return parseReviewPage(await page.content());
  }

  async nextPage(): Promise<boolean> {
    const next = await this.firstPresent([SELECTORS.nextPage]);
    if (!next) return false;

    await next.click();
    await this.options.pacing.pause("page");
    if (!(await this.solveChallenge())) {
      throw new ChallengeUnresolvedError();
    }
    return true;
  }

  async readReviewCount(): Promise<number | null> {
    const page = await this.currentPage();
    return parseReviewCount(await page.content());
  }

  async detectChallenge(): Promise<boolean> {
    return (await this.firstPresent(SELECTORS.challenge)) !== null;
  }

  private async challengePassed(): Promise<boolean> {
    if ((await this.firstPresent(SELECTORS.challengePassed)) !== null) return true;
    return !(await this.detectChallenge());
  }

  private async dragSlider(): Promise<boolean> {
    const page = await this.currentPage();
    const handle = await this.firstPresent(SELECTORS.challengeHandle);
    const track = await this.firstPresent(SELECTORS.challengeTrack);
    if (!handle || !track) {
      logger.debug("Slider handle or track not found");
      return false;
    }

    const handleBox = await handle.boundingBox();
    const trackBox = await track.boundingBox();
    if (!handleBox) return false;

    const startX = handleBox.x + handleBox.width / 2;
    const startY = handleBox.y + handleBox.height / 2;
    const steps = synthesizeMotion(
      trackBox?.width ?? DEFAULT_TRACK_WIDTH,
      Math.floor(this.random() * 0xffffffff),
    );

    await page.mouse.move(startX, startY);
    await page.mouse.down();
    let x = startX;
    for (const step of steps) {
      x += step.dx;
      await page.mouse.move(x, startY + step.dy);
      await page.waitForTimeout(step.dt);
    }
    await page.mouse.up();
    await page.waitForTimeout(2000);

    return this.challengePassed();
  }

  /**
   * Returns true when no challenge is showing or once it is passed. Tries the
   * slider first, then waits for the operator; false if still blocked.
   */
  async solveChallenge(): Promise<boolean> {
    if (!(await this.detectChallenge())) return true;

    logger.warn("Challenge detected, attempting slider");
    try {
      if (await this.dragSlider()) {
        logger.info("Slider challenge passed");
        return true;
      }
    } catch (error) {
      logger.warn(`Slider attempt failed: ${errorMessage(error)}`);
    }

    logger.warn("=".repeat(50));
    logger.warn("Manual verification required: finish it in the browser, then press Enter");
    logger.warn("=".repeat(50));
    await this.waitForOperator("Press Enter to continue...");
    await this.options.pacing.pause("page");

    if (await this.challengePassed()) {
      logger.info("Manual verification passed");
      return true;
    }
    logger.error("Challenge still present after operator resume");
    return false;
  }
}
