import pino from "pino";
import type { LastSoldRecord } from "../types/record";

// Set log level via env LOG_LEVEL (default: info, silent under tests)
const defaultLevel = (): string =>
  process.env.LOG_LEVEL ||
  (process.env.NODE_ENV === "test" ? "silent" : "info");

const pretty = (): boolean =>
  process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

function createBaseLogger(level: string, logFile?: string): pino.Logger {
  const targets: pino.TransportTargetOptions[] = [];
  if (pretty()) {
    targets.push({
      target: "pino-pretty",
      level,
      options: { colorize: true },
    });
  } else if (logFile) {
    targets.push({ target: "pino/file", level, options: { destination: 1 } });
  }
  if (logFile) {
    targets.push({
      target: "pino/file",
      level,
      options: { destination: logFile, mkdir: true },
    });
  }
  if (targets.length === 0) return pino({ level });
  return pino({ level }, pino.transport({ targets }));
}

let logger = createBaseLogger(defaultLevel());

export interface LogMeta {
  url?: string;
  duration?: number;
  count?: number;
  error?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: string;
  /** Also append JSON lines to this file */
  logFile?: string;
}

export class Logger {
  /** Rebuilds the underlying pino instance, e.g. once config is known */
  static configure(options: LoggerOptions): void {
    logger = createBaseLogger(
      options.level || defaultLevel(),
      options.logFile || undefined,
    );
  }
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: unknown, meta?: LogMeta): void {
    logger.error({ ...meta, ...errorMeta(error) }, message);
  }
  static fatal(message: string, error?: unknown, meta?: LogMeta): void {
    logger.fatal({ ...meta, ...errorMeta(error) }, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static fetchFailed(url: string, error: unknown): void {
    this.warn(`Scrape failed, keeping previous records: ${url}`, {
      url,
      error: errorMessage(error),
    });
  }
  static newSale(url: string, record: LastSoldRecord): void {
    this.info(`New sale: ${record.describe()}`, {
      url,
      price: record.price,
      condition: record.condition,
      soldDate: record.soldDate,
    });
  }
  static cycleComplete(
    urls: number,
    failed: number,
    changes: number,
    duration: number,
  ): void {
    this.info(`Cycle complete`, { urls, failed, changes, duration });
  }
}

/** Message of an Error, or the value itself as a string */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorMeta(error: unknown): LogMeta {
  if (error === undefined) return {};
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
