/**
 * Validation for data read back from the state file
 */

import type { LastSoldMapping } from "../types/record";

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Narrows an unknown value to a plain (non-array) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireString(r: Record<string, unknown>, field: string): string {
  const v = r[field];
  if (typeof v !== "string") {
    throw new ValidationError(
      `Record ${field} is required and must be a string`,
      field,
    );
  }
  return v;
}

/**
 * Validates a serialized last-sold record
 * @param record - Raw value parsed from JSON
 * @returns The validated mapping, without any unknown keys
 * @throws ValidationError if a field is missing or has the wrong type
 */
export function validateRecordMapping(record: unknown): LastSoldMapping {
  if (!isPlainObject(record)) {
    throw new ValidationError("Record must be an object");
  }

  const title = requireString(record, "title");
  const condition = requireString(record, "condition");
  const soldDate = requireString(record, "sold_date");
  const url = requireString(record, "url");
  const timestamp = requireString(record, "timestamp");

  const price = record.price;
  if (typeof price !== "number" || !Number.isFinite(price) || price < 0) {
    throw new ValidationError(
      "Record price is required and must be a non-negative finite number",
      "price",
    );
  }

  if (Number.isNaN(new Date(timestamp).getTime())) {
    throw new ValidationError(
      `Record timestamp is not a valid ISO-8601 date: ${timestamp}`,
      "timestamp",
    );
  }

  return {
    title,
    price,
    condition,
    sold_date: soldDate,
    url,
    timestamp,
  };
}

/**
 * Sanitizes a URL string
 * @param url - The URL to sanitize
 * @returns The sanitized URL or null if invalid
 */
export function sanitizeUrl(url: string): string | null {
  if (!url) {
    return null;
  }

  try {
    const parsed = new URL(url);
    // Only allow http and https protocols
    if (!["http:", "https:"].includes(parsed.protocol)) {
      return null;
    }
    return parsed.toString();
  } catch {
    return null;
  }
}
