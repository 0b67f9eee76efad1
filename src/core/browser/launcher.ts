/**
 * Browser launching and configuration
 */

import { type Browser, type BrowserContext, chromium } from "playwright";
import { BROWSER_CONSTANTS } from "../constants";

/**
 * Launches a Chromium browser instance with optimized settings
 * @param headless - Run without a visible window
 * @returns Promise resolving to the browser instance
 */
export async function launchBrowser(headless: boolean): Promise<Browser> {
  return await chromium.launch({
    headless,
    args: [
      "--disable-dev-shm-usage",
      "--no-sandbox",
      "--disable-blink-features=AutomationControlled",
    ],
  });
}

/**
 * Opens the single context shared by every page in a session
 */
export async function newMonitorContext(
  browser: Browser,
): Promise<BrowserContext> {
  return await browser.newContext({
    userAgent: BROWSER_CONSTANTS.USER_AGENT,
    viewport: BROWSER_CONSTANTS.VIEWPORT,
    locale: BROWSER_CONSTANTS.LOCALE,
  });
}
