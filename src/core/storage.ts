// src/core/storage.ts
import { promises as fs } from "node:fs";
import path from "node:path";
import { LastSoldRecord, type RecordStore } from "./types/record";
import { errorMessage, Logger } from "./utils/logger";
import { isPlainObject } from "./validation/record-validator";

export class StorageWriteError extends Error {
  constructor(
    message: string,
    public path: string,
    public cause?: unknown,
  ) {
    super(message);
    this.name = "StorageWriteError";
  }
}

/** Loads and saves the URL → records map */
export interface RecordRepository {
  load(): Promise<RecordStore>;
  save(store: RecordStore): Promise<void>;
}

/**
 * Parses the state file's JSON text into a store.
 * Throws on anything malformed; callers decide whether that is fatal.
 */
export function parseStore(json: string): RecordStore {
  const data: unknown = JSON.parse(json);
  if (!isPlainObject(data)) {
    throw new Error("State file must contain a JSON object");
  }
  const store: RecordStore = new Map();
  for (const [url, list] of Object.entries(data)) {
    if (!Array.isArray(list)) {
      throw new Error(`Records for ${url} must be an array`);
    }
    store.set(
      url,
      list.map((item: unknown) => LastSoldRecord.fromMapping(item)),
    );
  }
  return store;
}

export function serializeStore(store: RecordStore): string {
  const out: Record<string, ReturnType<LastSoldRecord["toMapping"]>[]> = {};
  for (const [url, records] of store) {
    out[url] = records.map((r) => r.toMapping());
  }
  return JSON.stringify(out, null, 2);
}

/**
 * Keeps the whole store in one JSON file
 */
export class JsonRecordStore implements RecordRepository {
  constructor(readonly filePath: string) {}

  /**
   * Reads the state file. A missing or corrupt file yields an empty store.
   */
  async load(): Promise<RecordStore> {
    let txt: string;
    try {
      txt = await fs.readFile(this.filePath, "utf8");
    } catch (e: unknown) {
      if (isNodeError(e) && e.code === "ENOENT") {
        Logger.info(`No state file yet, starting empty`, {
          file: this.filePath,
        });
      } else {
        Logger.warn(`Could not read state file, starting empty`, {
          file: this.filePath,
          error: errorMessage(e),
        });
      }
      return new Map();
    }

    try {
      const store = parseStore(txt);
      Logger.info(`Loaded previous records`, {
        file: this.filePath,
        count: store.size,
      });
      return store;
    } catch (e: unknown) {
      Logger.warn(`State file is corrupt, starting empty`, {
        file: this.filePath,
        error: errorMessage(e),
      });
      return new Map();
    }
  }

  /**
   * Writes the full store to a temp file beside the target and renames it
   * over the target, so readers see either the old or the new file.
   * @throws StorageWriteError
   */
  async save(store: RecordStore): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmp = path.join(
      dir,
      `.${path.basename(this.filePath)}.${process.pid}.${Date.now()}.tmp`,
    );
    try {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmp, serializeStore(store), "utf8");
      await fs.rename(tmp, this.filePath);
    } catch (e: unknown) {
      await fs.rm(tmp, { force: true }).catch((rmErr: unknown) => {
        Logger.debug(`Could not remove temp state file`, {
          file: tmp,
          error: errorMessage(rmErr),
        });
      });
      throw new StorageWriteError(
        `Failed to save state file ${this.filePath}: ${errorMessage(e)}`,
        this.filePath,
        e,
      );
    }
    Logger.debug(`Saved records`, { file: this.filePath, count: store.size });
  }
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return e instanceof Error && "code" in e;
}
