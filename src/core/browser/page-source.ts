/**
 * Page fetching through a shared Playwright browser session
 */

import type { Browser, BrowserContext } from "playwright";
import { DEFAULT_SELECTORS, parseLastSoldPage } from "../extraction/last-sold";
import type { BrowserOptions, LastSoldSelectors } from "../types/config";
import type { ScrapedPage } from "../types/page";
import { errorMessage, Logger } from "../utils/logger";
import { launchBrowser, newMonitorContext } from "./launcher";
import { optimizePage } from "./optimization";

/** Fetches the last-sold fragments of one monitored page */
export interface PageSource {
  open(): Promise<void>;
  /** @throws on navigation failure or when not opened */
  fetch(url: string): Promise<ScrapedPage>;
  close(): Promise<void>;
}

export class PlaywrightPageSource implements PageSource {
  browser: Browser | null = null;
  context: BrowserContext | null = null;

  constructor(
    private readonly options: BrowserOptions,
    private readonly selectors: LastSoldSelectors = DEFAULT_SELECTORS,
  ) {}

  async open(): Promise<void> {
    if (this.context) return;
    this.browser = await launchBrowser(this.options.headless);
    this.context = await newMonitorContext(this.browser);
    Logger.info(`Browser started`, { headless: this.options.headless });
  }

  async fetch(url: string): Promise<ScrapedPage> {
    if (!this.context) {
      throw new Error("Browser context not initialized");
    }

    const page = await this.context.newPage();
    try {
      await optimizePage(page);
      await page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.options.navigationTimeoutMs,
      });
      if (this.options.settleMs > 0) {
        await page.waitForTimeout(this.options.settleMs);
      }
      const html = await page.content();
      return parseLastSoldPage(html, this.selectors);
    } finally {
      await page.close().catch((e: unknown) => {
        Logger.debug(`Page close failed`, { url, error: errorMessage(e) });
      });
    }
  }

  /** Safe to call when nothing is open */
  async close(): Promise<void> {
    const { context, browser } = this;
    this.context = null;
    this.browser = null;
    if (context) {
      await context.close().catch((e: unknown) => {
        Logger.warn(`Browser context close failed`, { error: errorMessage(e) });
      });
    }
    if (browser) {
      await browser.close().catch((e: unknown) => {
        Logger.warn(`Browser close failed`, { error: errorMessage(e) });
      });
    }
  }
}
