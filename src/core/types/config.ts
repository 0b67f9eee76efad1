/**
 * Configuration-related types
 */

import type { AlertPolicy } from "../detection/alert-policy";

/** CSS selectors used to read the last-sold section of a product page */
export interface LastSoldSelectors {
  /** Product title, first match wins */
  title: string[];
  /** One element per sale row; the first selector with any hits is used */
  saleRows: string[];
  /** Cells inside a sale row; missing cells fall back to the row text */
  rowPrice: string[];
  rowCondition: string[];
  rowDate: string[];
  /** Price shown when the page has no sales table */
  marketPrice: string[];
}

export interface BrowserOptions {
  headless: boolean;
  navigationTimeoutMs: number;
  /** Wait after navigation so client-rendered tables can appear */
  settleMs: number;
}

/** Everything the monitor needs, read once and frozen */
export interface MonitorConfig {
  readonly urls: readonly string[];
  readonly intervalSeconds: number;
  readonly browser: Readonly<BrowserOptions>;
  readonly alerts: Readonly<AlertPolicy & { discordWebhookUrl: string }>;
  readonly storage: Readonly<{ dataFile: string; logFile: string }>;
  readonly selectors: Readonly<LastSoldSelectors>;
}
