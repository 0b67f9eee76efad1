/**
 * Monitor loop: fetch → extract → compare → persist → notify → sleep
 */

import { performance } from "node:perf_hooks";
import type { PageSource } from "../browser/page-source";
import { shouldAlert } from "../detection/alert-policy";
import { type Change, compareRecords } from "../detection/change-detector";
import { extractRecords } from "../extraction/last-sold";
import { buildStartupMessage, type Notifier } from "../notify/discord";
import type { RecordRepository } from "../storage";
import type { MonitorConfig } from "../types/config";
import type { LastSoldRecord, RecordStore } from "../types/record";
import { errorMessage, Logger } from "../utils/logger";
import { formatDuration, sleep } from "../utils/sleep";

export enum MonitorState {
  IDLE = "idle",
  FETCHING = "fetching",
  EXTRACTING = "extracting",
  COMPARING = "comparing",
  PERSISTING = "persisting",
  NOTIFYING = "notifying",
  SLEEPING = "sleeping",
}

export interface MonitorDeps {
  config: MonitorConfig;
  repository: RecordRepository;
  source: PageSource;
  notifier: Notifier;
}

export interface CycleResult {
  changes: Change[];
  /** Messages the notifier accepted */
  alerted: number;
  failedUrls: string[];
}

export class LastSoldMonitor {
  state: MonitorState = MonitorState.IDLE;
  private store: RecordStore = new Map();
  private loaded = false;

  constructor(private readonly deps: MonitorDeps) {}

  /** Records currently held for a URL */
  recordsFor(url: string): readonly LastSoldRecord[] | undefined {
    return this.store.get(url);
  }

  async loadStore(): Promise<void> {
    this.store = await this.deps.repository.load();
    this.loaded = true;
  }

  /**
   * One pass over every configured URL, then a single save and the
   * notifications. A failing URL is skipped and keeps its stored records.
   * @throws StorageWriteError when the save fails, after notifying
   */
  async runCycle(signal?: AbortSignal): Promise<CycleResult> {
    if (!this.loaded) await this.loadStore();
    const t0 = performance.now();
    const { config, repository } = this.deps;

    const changes: Change[] = [];
    const failedUrls: string[] = [];

    for (const url of config.urls) {
      if (signal?.aborted) break;

      const records = await this.scrape(url);
      if (!records) {
        failedUrls.push(url);
        continue;
      }

      this.state = MonitorState.COMPARING;
      changes.push(...compareRecords(this.store.get(url), records));
      this.store.set(url, records);
    }

    this.state = MonitorState.PERSISTING;
    let saveFailure: { error: unknown } | null = null;
    try {
      await repository.save(this.store);
    } catch (e) {
      Logger.error(`Failed to persist records`, e);
      saveFailure = { error: e };
    }

    this.state = MonitorState.NOTIFYING;
    const alerted = await this.notifyChanges(changes);

    Logger.cycleComplete(
      config.urls.length,
      failedUrls.length,
      changes.length,
      Math.round(performance.now() - t0),
    );

    if (saveFailure) throw saveFailure.error;
    return { changes, alerted, failedUrls };
  }

  /**
   * Runs cycles until the signal aborts. Returns normally on abort; rethrows
   * browser startup and storage write failures. The page source is closed
   * either way.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const { config, source } = this.deps;
    if (!this.loaded) await this.loadStore();

    try {
      await source.open();
      await this.safeSend(buildStartupMessage(config.urls, config.intervalSeconds));
      Logger.info(`Monitoring started`, {
        count: config.urls.length,
        interval: config.intervalSeconds,
      });

      while (!signal?.aborted) {
        await this.runCycle(signal);
        if (signal?.aborted) break;

        this.state = MonitorState.SLEEPING;
        Logger.info(`Next check in ${formatDuration(config.intervalSeconds)}`);
        const completed = await sleep(config.intervalSeconds * 1000, signal);
        if (!completed) break;
      }
      Logger.info(`Monitoring stopped`);
    } finally {
      this.state = MonitorState.IDLE;
      await source.close();
    }
  }

  /** Fetch and extract one URL; null means "no records this cycle" */
  private async scrape(url: string): Promise<LastSoldRecord[] | null> {
    try {
      this.state = MonitorState.FETCHING;
      const page = await this.deps.source.fetch(url);

      this.state = MonitorState.EXTRACTING;
      const records = extractRecords(page, url);
      if (records.length === 0) {
        Logger.warn(`No sales found, keeping previous records: ${url}`, { url });
        return null;
      }
      Logger.debug(`Scraped ${records.length} sales`, {
        url,
        count: records.length,
      });
      return records;
    } catch (e) {
      Logger.fetchFailed(url, e);
      return null;
    }
  }

  private async notifyChanges(changes: Change[]): Promise<number> {
    let alerted = 0;
    for (const change of changes) {
      Logger.newSale(change.record.url, change.record);
      if (!shouldAlert(change.record, this.deps.config.alerts)) {
        Logger.debug(`Alert filtered by policy`, { url: change.record.url });
        continue;
      }
      if (await this.safeSend(change.message)) alerted++;
    }
    return alerted;
  }

  private async safeSend(message: string): Promise<boolean> {
    try {
      return await this.deps.notifier.send(message);
    } catch (e) {
      Logger.warn(`Notification failed`, { error: errorMessage(e) });
      return false;
    }
  }
}
