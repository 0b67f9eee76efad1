/**
 * YAML configuration loading
 *
 * The file is parsed into a frozen MonitorConfig that is handed to the
 * monitor. Nothing is cached at module level: a ConfigSource caches its
 * own result and `reload()` re-reads the file on request.
 */

import { promises as fs } from "node:fs";
import { parse as parseYaml } from "yaml";
import { MONITOR_CONSTANTS } from "../constants";
import { DEFAULT_SELECTORS } from "../extraction/last-sold";
import type { LastSoldSelectors, MonitorConfig } from "../types/config";
import { errorMessage } from "../utils/logger";
import { isPlainObject, sanitizeUrl } from "../validation/record-validator";
import { envBool, envStr } from "./env";

export class ConfigError extends Error {
  constructor(message: string, public path: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

// YAML keys under `selectors:` → config field
const SELECTOR_KEYS: Record<string, keyof LastSoldSelectors> = {
  title: "title",
  sale_rows: "saleRows",
  row_price: "rowPrice",
  row_condition: "rowCondition",
  row_date: "rowDate",
  market_price: "marketPrice",
};

/**
 * Resolves a dotted path such as `monitoring.interval_seconds` against a
 * parsed document. Returns `undefined` when any segment is missing.
 */
export function resolvePath(doc: unknown, dotPath: string): unknown {
  let node: unknown = doc;
  for (const key of dotPath.split(".")) {
    if (!isPlainObject(node) || !Object.hasOwn(node, key)) return undefined;
    node = node[key];
  }
  return node;
}

export class ConfigSource {
  private raw: Record<string, unknown> | null = null;
  private config: MonitorConfig | null = null;

  constructor(
    readonly filePath: string,
    private readonly env: Env = process.env,
  ) {}

  /** Parsed config, read from disk on first call only */
  async load(): Promise<MonitorConfig> {
    if (this.config) return this.config;
    return this.reload();
  }

  /** Re-reads the file and replaces the cached config */
  async reload(): Promise<MonitorConfig> {
    const raw = await this.readDocument();
    const config = this.build(raw);
    this.raw = raw;
    this.config = config;
    return config;
  }

  /**
   * Looks up a raw value by dotted path in the last loaded document
   * @param dotPath - e.g. `alerts.discord_webhook_url`; a partial path
   * returns the nested mapping
   * @param defaultValue - Returned when the path does not exist
   */
  async getValue(dotPath: string, defaultValue?: unknown): Promise<unknown> {
    if (!this.raw) await this.load();
    const v = resolvePath(this.raw, dotPath);
    return v === undefined ? defaultValue : v;
  }

  private async readDocument(): Promise<Record<string, unknown>> {
    let txt: string;
    try {
      txt = await fs.readFile(this.filePath, "utf8");
    } catch (e: unknown) {
      if (e instanceof Error && "code" in e && e.code === "ENOENT") {
        throw new ConfigError(
          `Configuration file not found: ${this.filePath}`,
          this.filePath,
        );
      }
      throw new ConfigError(
        `Failed to load configuration: ${errorMessage(e)}`,
        this.filePath,
      );
    }

    let doc: unknown;
    try {
      doc = parseYaml(txt);
    } catch (e: unknown) {
      throw new ConfigError(
        `Invalid YAML configuration: ${errorMessage(e)}`,
        this.filePath,
      );
    }
    if (doc === null || doc === undefined) return {};
    if (!isPlainObject(doc)) {
      throw new ConfigError(
        `Invalid YAML configuration: top level must be a mapping`,
        this.filePath,
      );
    }
    return doc;
  }

  private build(doc: Record<string, unknown>): MonitorConfig {
    const num = (key: string, d: number): number => {
      const v = resolvePath(doc, key);
      if (v === undefined || v === null) return d;
      if (typeof v !== "number" || !Number.isFinite(v) || v < 0) {
        throw this.invalid(key, "a non-negative number");
      }
      return v;
    };
    const bool = (key: string, d: boolean): boolean => {
      const v = resolvePath(doc, key);
      if (v === undefined || v === null) return d;
      if (typeof v !== "boolean") throw this.invalid(key, "true or false");
      return v;
    };
    const str = (key: string, d: string): string => {
      const v = resolvePath(doc, key);
      if (v === undefined || v === null) return d;
      if (typeof v !== "string") throw this.invalid(key, "a string");
      return v;
    };

    const intervalKey = "monitoring.interval_seconds";
    const intervalSeconds = num(
      intervalKey,
      MONITOR_CONSTANTS.DEFAULT_INTERVAL_SECONDS,
    );
    if (
      intervalSeconds <= 0 ||
      intervalSeconds > MONITOR_CONSTANTS.MAX_INTERVAL_SECONDS
    ) {
      throw this.invalid(
        intervalKey,
        `a number of seconds above 0 and at most ${MONITOR_CONSTANTS.MAX_INTERVAL_SECONDS}`,
      );
    }

    const config: MonitorConfig = {
      urls: Object.freeze(this.readUrls(doc)),
      intervalSeconds,
      browser: Object.freeze({
        headless: envBool(
          "HEADLESS",
          bool("monitoring.headless_mode", true),
          this.env,
        ),
        navigationTimeoutMs: num(
          "monitoring.navigation_timeout_ms",
          MONITOR_CONSTANTS.DEFAULT_NAV_TIMEOUT_MS,
        ),
        settleMs: num("monitoring.settle_ms", MONITOR_CONSTANTS.DEFAULT_SETTLE_MS),
      }),
      alerts: Object.freeze({
        discordWebhookUrl: str("alerts.discord_webhook_url", ""),
        alertAllNewSales: bool("alerts.alert_all_new_sales", true),
        maxPriceAlert: num(
          "monitoring.max_price_alert",
          MONITOR_CONSTANTS.DEFAULT_MAX_PRICE_ALERT,
        ),
        minCondition: str(
          "monitoring.min_condition",
          MONITOR_CONSTANTS.DEFAULT_MIN_CONDITION,
        ),
      }),
      storage: Object.freeze({
        dataFile: envStr(
          "DATA_FILE",
          str("storage.data_file", MONITOR_CONSTANTS.DEFAULT_DATA_FILE),
          this.env,
        ),
        logFile: str("storage.log_file", MONITOR_CONSTANTS.DEFAULT_LOG_FILE),
      }),
      selectors: Object.freeze(this.readSelectors(doc)),
    };
    return Object.freeze(config);
  }

  private readUrls(doc: Record<string, unknown>): string[] {
    const key = "tcgplayer_pages_to_monitor";
    const v = doc[key];
    if (v === undefined || v === null) return [];
    if (!Array.isArray(v)) throw this.invalid(key, "a list of URLs");
    return v.map((item: unknown, i) => {
      const url = typeof item === "string" ? sanitizeUrl(item.trim()) : null;
      if (!url) throw this.invalid(`${key}[${i}]`, "an http(s) URL");
      return url;
    });
  }

  private readSelectors(doc: Record<string, unknown>): LastSoldSelectors {
    const out: LastSoldSelectors = { ...DEFAULT_SELECTORS };
    const section = doc.selectors;
    if (section === undefined || section === null) return out;
    if (!isPlainObject(section)) throw this.invalid("selectors", "a mapping");

    for (const [yamlKey, field] of Object.entries(SELECTOR_KEYS)) {
      const v = section[yamlKey];
      if (v === undefined || v === null) continue;
      const list = typeof v === "string" ? [v] : v;
      if (
        !Array.isArray(list) ||
        !list.every((s: unknown): s is string => typeof s === "string")
      ) {
        throw this.invalid(`selectors.${yamlKey}`, "a selector or list of selectors");
      }
      out[field] = list;
    }
    return out;
  }

  private invalid(key: string, expected: string): ConfigError {
    return new ConfigError(
      `Invalid configuration value for ${key}: expected ${expected}`,
      this.filePath,
    );
  }
}
