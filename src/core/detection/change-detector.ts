/**
 * Change detection: compares a fresh scrape of one page against the
 * records stored for it and reports the sales that were not there before.
 */

import type { LastSoldRecord } from "../types/record";

export type ChangeType = "new_sale";

export interface Change {
  type: ChangeType;
  record: LastSoldRecord;
  message: string;
}

export function newSaleMessage(record: LastSoldRecord): string {
  return `💰 New Sale: ${record.describe()}`;
}

/**
 * Detect sales present in `current` but not in `previous`.
 *
 * Membership uses title, price, condition, sold date and url; timestamps are
 * ignored. Output follows the order of `current`, and a novel record that
 * appears twice is reported twice. Sales that disappeared, or whose fields
 * changed, only show up as new records.
 */
export function compareRecords(
  previous: readonly LastSoldRecord[] | undefined,
  current: readonly LastSoldRecord[],
): Change[] {
  const known = new Set((previous ?? []).map((r) => r.identityKey()));
  const changes: Change[] = [];

  for (const record of current) {
    if (known.has(record.identityKey())) continue;
    changes.push({
      type: "new_sale",
      record,
      message: newSaleMessage(record),
    });
  }

  return changes;
}
