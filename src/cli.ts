#!/usr/bin/env node
import "dotenv/config";
import { PlaywrightPageSource } from "./core/browser/page-source";
import { ConfigSource } from "./core/config/config-source";
import { envInt, envStr } from "./core/config/env";
import { MONITOR_CONSTANTS } from "./core/constants";
import { LastSoldMonitor } from "./core/execution/monitor";
import { DiscordNotifier } from "./core/notify/discord";
import { JsonRecordStore } from "./core/storage";
import { startHealthServer } from "./core/utils/health";
import { Logger } from "./core/utils/logger";

const USAGE = `Usage:
node dist/cli.js [--config <path>] [--once]

Polls the configured product pages for last-sold listings and posts new
sales to the configured Discord webhook.

Options:
  --config   YAML config file (default: $CONFIG_PATH or ${MONITOR_CONSTANTS.DEFAULT_CONFIG_FILE})
  --once     Run a single cycle and exit
  --help     Show this message

Environment Variables:
  CONFIG_PATH   Config file path when --config is not given
  DATA_FILE     Overrides storage.data_file
  HEADLESS      Overrides monitoring.headless_mode
  LOG_LEVEL     pino log level (default: info)
  HEALTH_PORT   Serve /healthz on this port when set

Examples:
  npm start -- --config config.yaml
  npm run once -- --config config.yaml`;

async function main(): Promise<number> {
  const argv = process.argv.slice(2);

  const hasFlag = (flag: string) => argv.includes(flag);
  const getArg = (flag: string) => {
    const i = argv.lastIndexOf(flag);
    return i >= 0 ? argv[i + 1] : undefined;
  };

  if (hasFlag("--help") || hasFlag("-h")) {
    console.log(USAGE);
    return 0;
  }

  const configPath =
    getArg("--config") ||
    envStr("CONFIG_PATH", MONITOR_CONSTANTS.DEFAULT_CONFIG_FILE);
  const config = await new ConfigSource(configPath).load();
  Logger.configure({ logFile: config.storage.logFile });
  Logger.info(`Loaded configuration`, {
    file: configPath,
    count: config.urls.length,
    interval: config.intervalSeconds,
  });

  const source = new PlaywrightPageSource(config.browser, config.selectors);
  const monitor = new LastSoldMonitor({
    config,
    repository: new JsonRecordStore(config.storage.dataFile),
    source,
    notifier: new DiscordNotifier(config.alerts.discordWebhookUrl),
  });

  const controller = new AbortController();
  const shutdown = (sig: string) => {
    if (controller.signal.aborted) return;
    Logger.info(`Graceful shutdown initiated (${sig})`);
    controller.abort();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  const server = startHealthServer(envInt("HEALTH_PORT", 0));
  try {
    if (hasFlag("--once")) {
      try {
        await source.open();
        const result = await monitor.runCycle(controller.signal);
        Logger.info(`Single cycle finished`, {
          changes: result.changes.length,
          alerted: result.alerted,
          failed: result.failedUrls.length,
        });
      } finally {
        await source.close();
      }
    } else {
      await monitor.run(controller.signal);
    }
  } finally {
    server?.close();
  }
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((e: unknown) => {
    Logger.fatal(`Monitor terminated`, e);
    process.exit(1);
  });
