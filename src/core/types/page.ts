/**
 * Page-related types
 */

/** Text of one sale row as it appeared on the page */
export interface SaleFragment {
  text: string; // whole row
  price?: string;
  condition?: string;
  date?: string;
}

/** What a page fetch hands to extraction */
export interface ScrapedPage {
  title: string;
  fragments: SaleFragment[];
}
