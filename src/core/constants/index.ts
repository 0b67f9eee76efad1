/**
 * Application constants
 */

// Extraction sentinels
export const UNKNOWN_DATE = "Unknown Date";
export const UNKNOWN_CONDITION = "Unknown Condition";
export const MOST_RECENT_SALE = "Most Recent Sale";

// Monitor constants
export const MONITOR_CONSTANTS = {
  DEFAULT_INTERVAL_SECONDS: 60,
  // Longest delay setTimeout accepts (2^31 - 1 ms), in whole seconds
  MAX_INTERVAL_SECONDS: 2147483,
  DEFAULT_NAV_TIMEOUT_MS: 30000,
  DEFAULT_SETTLE_MS: 3000,
  DEFAULT_MAX_PRICE_ALERT: 100.0,
  DEFAULT_MIN_CONDITION: "Lightly Played",
  DEFAULT_DATA_FILE: "card_data.json",
  DEFAULT_LOG_FILE: "monitor.log",
  DEFAULT_CONFIG_FILE: "config.yaml",
} as const;

// Notification constants
export const DISCORD_CONSTANTS = {
  USERNAME: "TCGPlayer Last Sold Monitor",
  TIMEOUT_MS: 10000,
  MAX_CONTENT_LENGTH: 2000,
} as const;

// Browser constants
export const BROWSER_CONSTANTS = {
  USER_AGENT:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36",
  VIEWPORT: { width: 1920, height: 1080 },
  LOCALE: "en-US",
} as const;
