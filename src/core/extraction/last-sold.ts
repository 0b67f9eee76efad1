/**
 * Last-sold page extraction: HTML → text fragments → records
 */

import { load as loadHtml } from "cheerio";
import { MOST_RECENT_SALE } from "../constants";
import type { LastSoldSelectors } from "../types/config";
import type { SaleFragment, ScrapedPage } from "../types/page";
import { LastSoldRecord } from "../types/record";
import {
  extractConditionFromText,
  extractDateFromText,
  extractPriceFromText,
} from "./text-parsing";

export const DEFAULT_SELECTORS: LastSoldSelectors = {
  title: ["h1.product-details__name", '[data-testid="product-name"]', "h1"],
  saleRows: [
    ".latest-sales-table__tbody__row",
    ".latest-sales-table tbody tr",
    '[data-testid="latest-sale"]',
  ],
  rowPrice: [".latest-sales-table__tbody__price", '[data-testid="sale-price"]'],
  rowCondition: [
    ".latest-sales-table__tbody__condition",
    '[data-testid="sale-condition"]',
  ],
  rowDate: [".latest-sales-table__tbody__date", '[data-testid="sale-date"]'],
  marketPrice: [".price-points__upper__price", ".spotlight__price"],
};

const clean = (s: string): string => s.replace(/\s+/g, " ").trim();

/**
 * Reads the title and sale rows out of a product page's HTML.
 * When no sale rows exist but a market price does, that price becomes a
 * single "Most Recent Sale" fragment.
 */
export function parseLastSoldPage(
  html: string,
  selectors: LastSoldSelectors = DEFAULT_SELECTORS,
): ScrapedPage {
  const $ = loadHtml(html);

  const firstText = (sels: string[]): string => {
    for (const s of sels) {
      const txt = clean($(s).first().text());
      if (txt) return txt;
    }
    return "";
  };

  const title = firstText(selectors.title);

  let fragments: SaleFragment[] = [];
  for (const rowSel of selectors.saleRows) {
    const rows = $(rowSel).toArray();
    if (rows.length === 0) continue;
    fragments = rows
      .map((el) => {
        const row = $(el);
        const cell = (sels: string[]): string | undefined => {
          for (const s of sels) {
            const txt = clean(row.find(s).first().text());
            if (txt) return txt;
          }
          return undefined;
        };
        // Join child nodes with a space so adjacent cells stay separate words
        const text = row
          .contents()
          .toArray()
          .map((n) => $(n).text())
          .join(" ");
        return {
          text: clean(text),
          price: cell(selectors.rowPrice),
          condition: cell(selectors.rowCondition),
          date: cell(selectors.rowDate),
        };
      })
      .filter((f) => f.text !== "");
    break;
  }

  if (fragments.length === 0) {
    const market = firstText(selectors.marketPrice);
    if (market) {
      fragments = [{ text: market, price: market, condition: MOST_RECENT_SALE }];
    }
  }

  return { title, fragments };
}

/**
 * Turns fragments into records. Cell text is tried first, the whole row text
 * second; each field falls back to its extractor's default.
 */
export function extractRecords(page: ScrapedPage, url: string): LastSoldRecord[] {
  return page.fragments.map((f) => {
    const condition =
      f.condition === MOST_RECENT_SALE
        ? MOST_RECENT_SALE
        : extractConditionFromText(f.condition ?? f.text);
    return new LastSoldRecord({
      title: page.title,
      price: extractPriceFromText(f.price ?? f.text),
      condition,
      soldDate: extractDateFromText(f.date ?? f.text),
      url,
    });
  });
}
