import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_SELECTORS } from "../extraction/last-sold";
import { ConfigError, ConfigSource, resolvePath } from "./config-source";

const FULL_CONFIG = `
tcgplayer_pages_to_monitor:
  - https://www.tcgplayer.com/product/123456/test-card
  - " https://www.tcgplayer.com/product/654321/other-card "
monitoring:
  interval_seconds: 300
  headless_mode: false
  max_price_alert: 50.5
  min_condition: Near Mint
alerts:
  discord_webhook_url: https://discord.test/api/webhooks/1/test-token
  alert_all_new_sales: false
storage:
  data_file: state/cards.json
  log_file: logs/monitor.log
selectors:
  sale_rows: li.sale
  row_price: [".price", ".amount"]
`;

describe("ConfigSource", () => {
  let dir: string;
  let file: string;

  const write = (txt: string) => fs.writeFile(file, txt);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "last-sold-config-"));
    file = path.join(dir, "config.yaml");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should read every section", async () => {
    await write(FULL_CONFIG);
    const config = await new ConfigSource(file, {}).load();

    expect(config.urls).toEqual([
      "https://www.tcgplayer.com/product/123456/test-card",
      "https://www.tcgplayer.com/product/654321/other-card",
    ]);
    expect(config.intervalSeconds).toBe(300);
    expect(config.browser.headless).toBe(false);
    expect(config.alerts).toEqual({
      discordWebhookUrl: "https://discord.test/api/webhooks/1/test-token",
      alertAllNewSales: false,
      maxPriceAlert: 50.5,
      minCondition: "Near Mint",
    });
    expect(config.storage).toEqual({
      dataFile: "state/cards.json",
      logFile: "logs/monitor.log",
    });
    expect(config.selectors.saleRows).toEqual(["li.sale"]);
    expect(config.selectors.rowPrice).toEqual([".price", ".amount"]);
    expect(config.selectors.title).toEqual(DEFAULT_SELECTORS.title);
  });

  it("should apply defaults to an empty file", async () => {
    await write("");
    const config = await new ConfigSource(file, {}).load();

    expect(config.urls).toEqual([]);
    expect(config.intervalSeconds).toBe(60);
    expect(config.browser.headless).toBe(true);
    expect(config.alerts).toEqual({
      discordWebhookUrl: "",
      alertAllNewSales: true,
      maxPriceAlert: 100,
      minCondition: "Lightly Played",
    });
    expect(config.storage).toEqual({
      dataFile: "card_data.json",
      logFile: "monitor.log",
    });
  });

  it("should return a frozen config", async () => {
    await write(FULL_CONFIG);
    const config = await new ConfigSource(file, {}).load();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.urls)).toBe(true);
    expect(Object.isFrozen(config.alerts)).toBe(true);
  });

  it("should let the environment override headless mode and the data file", async () => {
    await write(FULL_CONFIG);
    const config = await new ConfigSource(file, {
      HEADLESS: "true",
      DATA_FILE: "/tmp/other.json",
    }).load();

    expect(config.browser.headless).toBe(true);
    expect(config.storage.dataFile).toBe("/tmp/other.json");
  });

  it("should fail when the file is missing", async () => {
    const source = new ConfigSource(path.join(dir, "nope.yaml"), {});

    await expect(source.load()).rejects.toThrow(
      `Configuration file not found: ${path.join(dir, "nope.yaml")}`,
    );
  });

  it("should fail on malformed YAML", async () => {
    await write("monitoring: [unclosed");

    await expect(new ConfigSource(file, {}).load()).rejects.toThrow(
      /^Invalid YAML configuration: /,
    );
  });

  it("should fail when the top level is not a mapping", async () => {
    await write("- just\n- a list\n");

    await expect(new ConfigSource(file, {}).load()).rejects.toBeInstanceOf(
      ConfigError,
    );
  });

  it("should name the key holding a value of the wrong type", async () => {
    await write("monitoring:\n  interval_seconds: soon\n");

    await expect(new ConfigSource(file, {}).load()).rejects.toThrow(
      "Invalid configuration value for monitoring.interval_seconds: expected a non-negative number",
    );
  });

  it("should reject intervals the scheduler cannot wait for", async () => {
    for (const bad of ["0", "2147484", "3000000"]) {
      await write(`monitoring:\n  interval_seconds: ${bad}\n`);

      await expect(new ConfigSource(file, {}).load()).rejects.toThrow(
        "Invalid configuration value for monitoring.interval_seconds: expected a number of seconds above 0 and at most 2147483",
      );
    }
  });

  it("should accept the longest supported interval", async () => {
    await write("monitoring:\n  interval_seconds: 2147483\n");

    expect((await new ConfigSource(file, {}).load()).intervalSeconds).toBe(
      2147483,
    );
  });

  it("should reject entries that are not URLs", async () => {
    await write("tcgplayer_pages_to_monitor:\n  - not a url\n");

    await expect(new ConfigSource(file, {}).load()).rejects.toThrow(
      "Invalid configuration value for tcgplayer_pages_to_monitor[0]: expected an http(s) URL",
    );
  });

  describe("getValue", () => {
    it("should resolve dotted paths with a default for missing keys", async () => {
      await write(FULL_CONFIG);
      const source = new ConfigSource(file, {});

      expect(await source.getValue("monitoring.interval_seconds")).toBe(300);
      expect(await source.getValue("monitoring")).toEqual({
        interval_seconds: 300,
        headless_mode: false,
        max_price_alert: 50.5,
        min_condition: "Near Mint",
      });
      expect(await source.getValue("monitoring.missing", 42)).toBe(42);
      expect(await source.getValue("nothing.here")).toBeUndefined();
    });
  });

  describe("caching", () => {
    it("should keep the first read until reload is called", async () => {
      await write("monitoring:\n  interval_seconds: 10\n");
      const source = new ConfigSource(file, {});
      const first = await source.load();

      await write("monitoring:\n  interval_seconds: 20\n");
      expect(await source.load()).toBe(first);
      expect((await source.reload()).intervalSeconds).toBe(20);
      expect(await source.getValue("monitoring.interval_seconds")).toBe(20);
    });
  });
});

describe("resolvePath", () => {
  it("should stop at values that are not mappings", () => {
    expect(resolvePath({ a: { b: 1 } }, "a.b")).toBe(1);
    expect(resolvePath({ a: 1 }, "a.b")).toBeUndefined();
    expect(resolvePath({ a: [1] }, "a.0")).toBeUndefined();
  });

  it("should ignore inherited properties", () => {
    expect(resolvePath({}, "constructor")).toBeUndefined();
    expect(resolvePath({ a: {} }, "a.toString")).toBeUndefined();
  });
});
