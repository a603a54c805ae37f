import { createReadStream } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";
import { z } from "zod";
import { INDEX_FILE_NAME } from "./constants";
import { ConfigError } from "./errors";
import { logger } from "./logger";
import { tryNormalizeUrl, urlFingerprint, writeFileAtomic } from "./utils";

export interface KnownIdLookup {
  has(value: string): boolean;
  hasUrl(url: string): boolean;
}

const indexFileSchema = z.union([
  z.object({ version: z.number().optional(), ids: z.record(z.boolean()) }),
  z.object({ ids: z.array(z.string()) }),
]);

export interface IndexStoreOptions {
  /** Persist after this many additions. */
  flushEvery: number;
}

/**
 * Durable id → seen set. Holds document ids plus `url:` fingerprints so a
 * known page is skipped before it is fetched. Never shrinks.
 */
export class IndexStore implements KnownIdLookup {
  readonly filePath: string;
  private readonly root: string;
  private readonly ids = new Set<string>();
  private readonly flushEvery: number;
  private pending = 0;

  private constructor(root: string, options: IndexStoreOptions) {
    this.root = root;
    this.filePath = path.join(root, INDEX_FILE_NAME);
    this.flushEvery = Math.max(1, options.flushEvery);
  }

  static async open(
    root: string,
    options: IndexStoreOptions = { flushEvery: 50 }
  ): Promise<IndexStore> {
    const store = new IndexStore(root, options);
    const indexMtime = await store.load();
    const recovered = await store.scanOutputs(indexMtime);
    if (recovered > 0) {
      logger.info(`Index: recovered ${recovered} ids from JSONL outputs`);
      await store.flush();
    }
    return store;
  }

  get size(): number {
    return this.ids.size;
  }

  has(value: string): boolean {
    return this.ids.has(value);
  }

  hasUrl(url: string): boolean {
    const normalized = tryNormalizeUrl(url);
    return normalized !== null && this.ids.has(urlFingerprint(normalized));
  }

  /** Record a stored document. Returns false when the id was already known. */
  add(id: string, url?: string): boolean {
    if (this.ids.has(id)) {
      return false;
    }
    this.ids.add(id);
    if (url) {
      const normalized = tryNormalizeUrl(url);
      if (normalized !== null) {
        this.ids.add(urlFingerprint(normalized));
      }
    }
    this.pending += 1;
    return true;
  }

  async flushIfDue(): Promise<void> {
    if (this.pending >= this.flushEvery) {
      await this.flush();
    }
  }

  async flush(): Promise<void> {
    const ids: Record<string, true> = {};
    for (const id of [...this.ids].sort()) {
      ids[id] = true;
    }
    await writeFileAtomic(this.filePath, `${JSON.stringify({ version: 1, ids })}\n`);
    this.pending = 0;
  }

  private async load(): Promise<number | null> {
    let text: string;
    let mtime: number;
    try {
      const info = await stat(this.filePath);
      mtime = info.mtimeMs;
      text = await readFile(this.filePath, "utf8");
    } catch {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ConfigError(`Cannot parse ${this.filePath}: ${String(error)}`);
    }
    const parsed = indexFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Malformed ${this.filePath}: ${parsed.error.message}`);
    }

    const { ids } = parsed.data;
    const entries = Array.isArray(ids)
      ? ids
      : Object.keys(ids).filter((id) => ids[id]);
    for (const id of entries) {
      this.ids.add(id);
    }
    logger.debug(`Index: loaded ${this.ids.size} entries from ${this.filePath}`);
    return mtime;
  }

  /**
   * Pick up ids from output lines written after the last index flush (or
   * from all outputs when there is no index yet).
   */
  private async scanOutputs(since: number | null): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.root);
    } catch {
      return 0;
    }

    let recovered = 0;
    for (const name of names.filter((entry) => entry.endsWith(".jsonl")).sort()) {
      const filePath = path.join(this.root, name);
      const info = await stat(filePath);
      if (since !== null && info.mtimeMs <= since) {
        continue;
      }
      recovered += await this.scanFile(filePath);
    }
    this.pending = 0;
    return recovered;
  }

  private async scanFile(filePath: string): Promise<number> {
    const lines = createInterface({
      input: createReadStream(filePath, { encoding: "utf8" }),
      crlfDelay: Number.POSITIVE_INFINITY,
    });
    let added = 0;
    let malformed = 0;
    for await (const line of lines) {
      if (line.trim().length === 0) {
        continue;
      }
      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch {
        malformed += 1;
        continue;
      }
      if (typeof record !== "object" || record === null) {
        malformed += 1;
        continue;
      }
      const id = "id" in record ? record.id : undefined;
      const url = "url" in record ? record.url : undefined;
      if (typeof id === "string" && this.add(id, typeof url === "string" ? url : undefined)) {
        added += 1;
      }
    }
    if (malformed > 0) {
      logger.warn(`Index: skipped ${malformed} malformed lines in ${filePath}`);
    }
    return added;
  }
}
