/**
 * Browser optimization utilities
 */

import type { Page } from "playwright";
import { Logger, errorMessage } from "../utils/logger";

const BLOCKED_RESOURCE_TYPES = new Set(["image", "font", "stylesheet", "media"]);

/**
 * Blocks heavy resources (images, fonts, stylesheets, media); the sales
 * table only needs markup and scripts
 * @param page - Playwright page instance to optimize
 */
export async function optimizePage(page: Page): Promise<void> {
  try {
    await page.route("**/*", (route) => {
      if (BLOCKED_RESOURCE_TYPES.has(route.request().resourceType()))
        return route.abort();
      return route.continue();
    });
  } catch (e) {
    Logger.debug(`Resource blocking unavailable`, { error: errorMessage(e) });
  }
}
