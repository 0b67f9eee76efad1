/**
 * Text parsing heuristics for last-sold listings.
 *
 * Each extractor takes a text fragment that the page parser already pulled
 * out of the DOM and returns the first thing that looks like the wanted
 * value, or a fixed fallback.
 */

import { UNKNOWN_CONDITION, UNKNOWN_DATE } from "../constants";

const PRICE_RE = /\$(\d[\d,]*(?:\.\d{2})?)/;

const MONTHS =
  "January|February|March|April|May|June|July|August|September|October|November|December";
const MONTH_ABBREVIATIONS = "Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sept|Sep|Oct|Nov|Dec";

/** Date shapes, longest first so a full date wins over its own prefix. */
const DATE_SHAPES = [
  String.raw`\b\d{1,2}/\d{1,2}/\d{4}\b`,
  String.raw`\b\d{1,2}/\d{1,2}/\d{2}\b`,
  String.raw`\b\d{4}-\d{2}-\d{2}(?!\d)`,
  String.raw`\b(?:${MONTHS})\s+\d{1,2}(?:,\s*\d{4})?\b`,
  String.raw`\b(?:${MONTH_ABBREVIATIONS})\.?\s+\d{1,2}(?:,\s*\d{4})?\b`,
  String.raw`\b\d{1,2}/\d{1,2}\b`,
];

const DATE_RE = new RegExp(DATE_SHAPES.join("|"));

/**
 * Condition vocabulary in canonical casing. Order is the tie-break when two
 * terms match at the same position, so a term must come before any term it
 * contains.
 */
export const CONDITION_VOCABULARY = [
  "Near Mint",
  "Lightly Played",
  "Moderately Played",
  "Heavily Played",
  "Damaged",
  "Non-Foil",
  "Non-Holo",
  "Japanese",
  "English",
  "Foil",
  "Holo",
  "Mint",
  "NM",
  "LP",
  "MP",
  "HP",
  "DMG",
] as const;

export type ConditionLabel = (typeof CONDITION_VOCABULARY)[number];

const escapeRegExp = (s: string): string =>
  s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const CONDITION_RE = new RegExp(
  `\\b(?:${CONDITION_VOCABULARY.map((c) => `(${escapeRegExp(c)})`).join("|")})\\b`,
  "i",
);

/**
 * Returns the first dollar amount in the text, thousands separators removed.
 * Returns 0 when there is no `$` followed by digits.
 */
export function extractPriceFromText(text: string): number {
  const m = text.match(PRICE_RE);
  if (!m) return 0;
  const v = parseFloat(m[1].replace(/,/g, ""));
  return Number.isFinite(v) ? v : 0;
}

/**
 * Returns the first date-looking token exactly as written, or
 * {@link UNKNOWN_DATE}.
 */
export function extractDateFromText(text: string): string {
  const m = text.match(DATE_RE);
  return m ? m[0] : UNKNOWN_DATE;
}

/**
 * Returns the first condition, grade, language or finish label found in the
 * text, case-insensitively, in its canonical casing. Falls back to
 * {@link UNKNOWN_CONDITION}.
 */
export function extractConditionFromText(text: string): string {
  const m = CONDITION_RE.exec(text);
  if (!m) return UNKNOWN_CONDITION;
  // Group i + 1 holds vocabulary entry i
  const idx = m.slice(1).findIndex((g) => g !== undefined);
  return idx >= 0 ? CONDITION_VOCABULARY[idx] : UNKNOWN_CONDITION;
}
