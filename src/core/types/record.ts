/**
 * Last-sold record types
 */

import { validateRecordMapping } from "../validation/record-validator";

/** Fields that identify one observed sale */
export interface LastSoldFields {
  title: string;
  price: number;
  condition: string;
  soldDate: string;
  url: string; // monitored page, shared by every sale on it
}

/** Shape of one record in the state file */
export interface LastSoldMapping {
  title: string;
  price: number;
  condition: string;
  sold_date: string;
  url: string;
  timestamp: string; // ISO-8601
}

/**
 * One sale seen on a monitored page.
 *
 * Two records are the same sale when every field except `timestamp` is
 * equal; `timestamp` only says when the scrape happened.
 */
export class LastSoldRecord implements LastSoldFields {
  readonly title: string;
  readonly price: number;
  readonly condition: string;
  readonly soldDate: string;
  readonly url: string;
  readonly timestamp: Date;

  /**
   * @param timestamp - Only passed when restoring a stored record; fresh
   * scrapes get the current time
   */
  constructor(fields: LastSoldFields, timestamp: Date = new Date()) {
    this.title = fields.title;
    this.price = fields.price;
    this.condition = fields.condition;
    this.soldDate = fields.soldDate;
    this.url = fields.url;
    this.timestamp = timestamp;
  }

  /**
   * Rebuilds a record from its stored mapping
   * @throws ValidationError if a field is missing or malformed
   */
  static fromMapping(data: unknown): LastSoldRecord {
    const m = validateRecordMapping(data);
    return new LastSoldRecord(
      {
        title: m.title,
        price: m.price,
        condition: m.condition,
        soldDate: m.sold_date,
        url: m.url,
      },
      new Date(m.timestamp),
    );
  }

  toMapping(): LastSoldMapping {
    return {
      title: this.title,
      price: this.price,
      condition: this.condition,
      sold_date: this.soldDate,
      url: this.url,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /** Key used for set membership; equal keys mean the same sale */
  identityKey(): string {
    return JSON.stringify([
      this.title,
      this.price,
      this.condition,
      this.soldDate,
      this.url,
    ]);
  }

  sameSaleAs(other: LastSoldFields): boolean {
    return (
      this.title === other.title &&
      this.price === other.price &&
      this.condition === other.condition &&
      this.soldDate === other.soldDate &&
      this.url === other.url
    );
  }

  /** e.g. `Test Card - $25.99 (Near Mint) - 2024-01-15` */
  describe(): string {
    return `${this.title} - $${this.price.toFixed(2)} (${this.condition}) - ${this.soldDate}`;
  }
}

/** Monitored URL → records from its latest scrape, in page order */
export type RecordStore = Map<string, LastSoldRecord[]>;
