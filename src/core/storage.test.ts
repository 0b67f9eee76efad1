import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { JsonRecordStore, StorageWriteError, parseStore } from "./storage";
import { LastSoldRecord, type RecordStore } from "./types/record";
import { Logger } from "./utils/logger";

const URL_A = "https://test.com/card1";

const record = (price: number, soldDate: string) =>
  new LastSoldRecord({
    title: "Test Card",
    price,
    condition: "Near Mint",
    soldDate,
    url: URL_A,
  });

describe("JsonRecordStore", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "last-sold-store-"));
    file = path.join(dir, "card_data.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("load", () => {
    it("should return an empty store when the file does not exist", async () => {
      const store = new JsonRecordStore(path.join(dir, "missing", "file.json"));
      expect((await store.load()).size).toBe(0);
    });

    it("should return an empty store for invalid JSON and log a warning", async () => {
      const warn = vi.spyOn(Logger, "warn");
      await fs.writeFile(file, "not json");

      const loaded = await new JsonRecordStore(file).load();

      expect(loaded.size).toBe(0);
      expect(warn).toHaveBeenCalledWith(
        "State file is corrupt, starting empty",
        expect.objectContaining({ file }),
      );
    });

    it("should return an empty store when a record is malformed", async () => {
      await fs.writeFile(
        file,
        JSON.stringify({ [URL_A]: [{ title: "Only a title" }] }),
      );
      expect((await new JsonRecordStore(file).load()).size).toBe(0);
    });

    it("should return an empty store when the top level is not an object", async () => {
      await fs.writeFile(file, "[]");
      expect((await new JsonRecordStore(file).load()).size).toBe(0);
    });

    it("should read an empty object as an empty store", async () => {
      await fs.writeFile(file, "{}");
      expect((await new JsonRecordStore(file).load()).size).toBe(0);
    });

    it("should rebuild records from the file", async () => {
      await fs.writeFile(
        file,
        JSON.stringify({
          [URL_A]: [
            {
              title: "Test Card 1",
              price: 25.99,
              condition: "Near Mint",
              sold_date: "2024-01-15",
              url: URL_A,
              timestamp: "2024-01-15T10:30:00.000Z",
            },
          ],
        }),
      );

      const loaded = await new JsonRecordStore(file).load();
      const records = loaded.get(URL_A);

      expect(loaded.size).toBe(1);
      expect(records).toHaveLength(1);
      expect(records?.[0]).toBeInstanceOf(LastSoldRecord);
      expect(records?.[0].title).toBe("Test Card 1");
      expect(records?.[0].timestamp.toISOString()).toBe(
        "2024-01-15T10:30:00.000Z",
      );
    });
  });

  describe("save", () => {
    it("should write every URL's records in order", async () => {
      const store: RecordStore = new Map([
        [URL_A, [record(10, "d1"), record(12, "d2")]],
      ]);

      await new JsonRecordStore(file).save(store);
      const saved = JSON.parse(await fs.readFile(file, "utf8"));

      expect(Object.keys(saved)).toEqual([URL_A]);
      expect(saved[URL_A].map((r: { price: number }) => r.price)).toEqual([
        10, 12,
      ]);
      expect(saved[URL_A][0].sold_date).toBe("d1");
    });

    it("should write an empty object for an empty store", async () => {
      await new JsonRecordStore(file).save(new Map());
      expect(JSON.parse(await fs.readFile(file, "utf8"))).toEqual({});
    });

    it("should replace the previous file entirely and leave no temp files", async () => {
      const store = new JsonRecordStore(file);
      await store.save(new Map([[URL_A, [record(10, "d1")]]]));
      await store.save(new Map([["https://test.com/card2", [record(5, "d3")]]]));

      const saved = JSON.parse(await fs.readFile(file, "utf8"));
      expect(Object.keys(saved)).toEqual(["https://test.com/card2"]);
      expect(await fs.readdir(dir)).toEqual(["card_data.json"]);
    });

    it("should create the parent directory", async () => {
      const nested = path.join(dir, "state", "card_data.json");
      await new JsonRecordStore(nested).save(new Map());
      expect(await fs.readFile(nested, "utf8")).toBe("{}");
    });

    it("should round-trip through load", async () => {
      const original = record(10, "d1");
      const store = new JsonRecordStore(file);
      await store.save(new Map([[URL_A, [original]]]));

      const loaded = (await store.load()).get(URL_A) ?? [];
      expect(loaded).toHaveLength(1);
      expect(loaded[0].sameSaleAs(original)).toBe(true);
      expect(loaded[0].timestamp.getTime()).toBe(original.timestamp.getTime());
    });

    it("should raise StorageWriteError when the target cannot be written", async () => {
      // A directory where the file should be makes the rename fail
      await fs.mkdir(file);
      const store = new JsonRecordStore(file);

      await expect(store.save(new Map())).rejects.toBeInstanceOf(
        StorageWriteError,
      );
      expect(await fs.readdir(dir)).toEqual(["card_data.json"]);
    });
  });
});

describe("parseStore", () => {
  it("should reject a URL whose value is not a list", () => {
    expect(() => parseStore(JSON.stringify({ [URL_A]: {} }))).toThrow(
      `Records for ${URL_A} must be an array`,
    );
  });
});
