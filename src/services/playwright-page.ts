/// <reference lib="dom" />
import type { Page } from "playwright-core";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { NavigationError } from "../core/errors";
import type { BrowserPage, ClickTarget, ScreenshotOptions } from "../domain/scrape-types";

const BLOCK_CHALLENGE_PATTERNS = [
  /\/challenge\//i,
  /\/checkpoint\//i,
  /\/sorry\//i,
  /captcha/i,
  /\/consent/i,
  /blocked/i,
  /verify.*human/i,
  /security.*check/i,
];

export function detectBlockChallenge(url: string): { isBlocked: boolean; reason: string | null } {
  for (const pattern of BLOCK_CHALLENGE_PATTERNS) {
    const match = url.match(pattern);
    if (match) {
      return { isBlocked: true, reason: `BLOCK_DETECTED:url_pattern:${match[0]}` };
    }
  }
  return { isBlocked: false, reason: null };
}

const SETTLE_MS = 2000;
const CLICK_TIMEOUT_MS = 5000;

export class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(url: string): Promise<void> {
    try {
      await this.page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: env.SCRAPER_NAVIGATION_TIMEOUT_MS,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new NavigationError(`Navigation to ${url} failed: ${message}`, "navigation_failed");
    }

    await this.page.waitForLoadState("domcontentloaded", { timeout: 5000 }).catch((error: unknown) => {
      logger.debug({ error, url }, "Load state wait timed out, continuing with current DOM");
    });
    await this.page.waitForTimeout(SETTLE_MS);

    const block = detectBlockChallenge(this.page.url());
    if (block.isBlocked) {
      logger.warn({ url, landedOn: this.page.url(), reason: block.reason }, "Page looks like a challenge or consent wall");
    }
  }

  async screenshot(options: ScreenshotOptions = {}): Promise<Buffer> {
    for (const selector of options.containerSelectors ?? []) {
      try {
        const element = await this.page.$(selector);
        if (!element || !(await element.isVisible())) continue;
        const childCount = await element.evaluate((el) => el.children.length);
        if (childCount === 0) continue;
        logger.debug({ selector }, "Capturing results container");
        return await element.screenshot({ type: "png" });
      } catch (error) {
        logger.debug({ selector, error }, "Container screenshot failed, trying next selector");
      }
    }

    return this.page.screenshot({ type: "png", fullPage: options.fullPage ?? false });
  }

  async clickFirstVisible(target: ClickTarget): Promise<boolean> {
    for (const text of target.texts ?? []) {
      try {
        const locator = this.page.getByText(text, { exact: false });
        const count = await locator.count();
        for (let i = 0; i < count; i++) {
          const candidate = locator.nth(i);
          if (!(await candidate.isVisible())) continue;
          const tag = await candidate.evaluate((el) => el.tagName.toLowerCase());
          if (tag !== "a" && tag !== "button") continue;
          await candidate.click({ timeout: CLICK_TIMEOUT_MS });
          await this.page.waitForTimeout(SETTLE_MS);
          logger.debug({ text }, "Clicked control by text");
          return true;
        }
      } catch (error) {
        logger.debug({ text, error }, "Text control not clickable");
      }
    }

    for (const selector of target.selectors ?? []) {
      try {
        const element = await this.page.$(selector);
        if (!element || !(await element.isVisible())) continue;
        await element.click({ timeout: CLICK_TIMEOUT_MS });
        await this.page.waitForTimeout(SETTLE_MS);
        logger.debug({ selector }, "Clicked control by selector");
        return true;
      } catch (error) {
        logger.debug({ selector, error }, "Selector control not clickable");
      }
    }

    return false;
  }

  async scrollDown(): Promise<void> {
    await this.page.evaluate(() => window.scrollBy(0, window.innerHeight * 2));
    await this.page.waitForTimeout(SETTLE_MS);
  }

  async hasVisible(selectors: string[], timeoutMs: number): Promise<boolean> {
    if (selectors.length === 0) return false;
    try {
      await this.page.locator(selectors.join(", ")).first().waitFor({ state: "visible", timeout: timeoutMs });
      return true;
    } catch (error) {
      logger.debug({ selectors, error }, "No visible match before timeout");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}
