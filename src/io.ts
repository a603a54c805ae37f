import { createReadStream } from "node:fs";
import { access, appendFile, constants as fsConstants } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";
import { z } from "zod";
import { UNIFIED_OUTPUT_FILE_NAME } from "./constants";
import { buildDedupKey, DedupKeySet } from "./dedup";
import { ConfigError } from "./errors";
import type { IndexStore } from "./index-store";
import { logger } from "./logger";
import type { CrawlDocument, SourceKey, StoreOutcome } from "./types";
import {
  ensureDir,
  fileExists,
  isRecord,
  sanitizeSegment,
  sha1Hex,
  writeFileAtomic,
} from "./utils";

const isoDateTime = z
  .string()
  .refine(
    (value) => /^\d{4}-\d{2}-\d{2}T/.test(value) && !Number.isNaN(Date.parse(value)),
    "expected an ISO-8601 timestamp"
  );

export const documentSchema = z
  .object({
    id: z.string().min(1),
    source: z.string().min(1),
    url: z.string().url(),
    snapshot_url: z.string().nullable(),
    title: z.string().nullable(),
    text: z.string(),
    lang: z.string(),
    published_at: isoDateTime.nullable(),
    authors: z.array(z.string()),
    discovered_via: z.record(z.unknown()),
    quality: z.object({
      score: z.number(),
      reasons: z.array(z.string()),
      keyword_hits: z.number().int().nonnegative(),
      keyword_coverage: z.number().min(0).max(1),
      length: z.number().int().nonnegative(),
      lang_confidence: z.number().min(0).max(1),
    }),
    dup: z.record(z.string()),
    crawl: z.object({ run_id: z.string().min(1), fetched_at: isoDateTime }),
  })
  .passthrough();

export function outputFileName(source: SourceKey, unified: boolean): string {
  if (unified) {
    return UNIFIED_OUTPUT_FILE_NAME;
  }
  if (source === "gdelt" || source === "youtube") {
    return `${source}.jsonl`;
  }
  return `forum_${sanitizeSegment(source)}.jsonl`;
}

/**
 * Create the output root and prove it is writable before any network work.
 */
export async function prepareOutputDir(root: string): Promise<void> {
  try {
    await ensureDir(root);
    await access(root, fsConstants.W_OK);
  } catch (error) {
    throw new ConfigError(`Output directory is not usable: ${root} (${String(error)})`);
  }
}

export interface WriterOptions {
  root: string;
  unified: boolean;
  index: IndexStore;
}

/**
 * Single writer for JSONL outputs and the index. Calls to `store` are
 * queued, so concurrent fetch workers never interleave state changes.
 */
export class Writer {
  private readonly options: WriterOptions;
  private readonly keys = new DedupKeySet();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: WriterOptions) {
    this.options = options;
  }

  store(document: CrawlDocument): Promise<StoreOutcome> {
    const run = this.queue.then(() => this.storeNow(document));
    // Keep the queue moving; the caller still sees the rejection through `run`.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async storeNow(document: CrawlDocument): Promise<StoreOutcome> {
    const { index } = this.options;

    const key = buildDedupKey({
      text: document.text,
      title: document.title,
      url: document.url,
      id: document.id,
    });
    const record: CrawlDocument = {
      ...document,
      dup: key === null ? document.dup : { ...document.dup, key_sha1: sha1Hex(key) },
    };

    const valid = documentSchema.safeParse(record);
    if (!valid.success) {
      logger.debug(
        `Rejected record for ${document.url}: ${valid.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`
      );
      return "rejected";
    }

    if (index.has(record.id)) {
      return "duplicate";
    }
    if (key !== null && this.keys.has(key)) {
      return "duplicate";
    }

    const filePath = path.join(
      this.options.root,
      outputFileName(record.source, this.options.unified)
    );
    await ensureDir(this.options.root);
    await appendFile(filePath, `${JSON.stringify(record)}\n`, "utf8");

    index.add(record.id, record.url);
    if (key !== null) {
      this.keys.add(key);
    }
    logger.logStored(record.source, record.url);

    await index.flushIfDue();
    return "written";
  }

  /** Wait for queued stores and persist the index. */
  async close(): Promise<void> {
    await this.queue;
    await this.options.index.flush();
  }
}

export interface JsonlReadResult {
  records: Array<Record<string, unknown>>;
  parseErrors: number;
}

export async function readJsonlRecords(filePath: string): Promise<JsonlReadResult> {
  const records: Array<Record<string, unknown>> = [];
  let parseErrors = 0;
  if (!(await fileExists(filePath))) {
    return { records, parseErrors };
  }

  const lines = createInterface({
    input: createReadStream(filePath, { encoding: "utf8" }),
    crlfDelay: Number.POSITIVE_INFINITY,
  });
  for await (const line of lines) {
    if (line.trim().length === 0) {
      continue;
    }
    try {
      const value: unknown = JSON.parse(line);
      if (isRecord(value)) {
        records.push(value);
      } else {
        parseErrors += 1;
      }
    } catch {
      parseErrors += 1;
    }
  }
  return { records, parseErrors };
}

function publishedTime(record: Record<string, unknown>): number | null {
  const value = record.published_at;
  if (typeof value !== "string") {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : time;
}

function recordId(record: Record<string, unknown>): string {
  const { id } = record;
  if (typeof id === "string") {
    return id;
  }
  return typeof id === "number" ? String(id) : "";
}

/**
 * Ascending by (published_at, id); records without a date come first.
 * Array.prototype.sort is stable, so full ties keep their input order.
 */
export function compareByPublished(
  a: Record<string, unknown>,
  b: Record<string, unknown>
): number {
  const timeA = publishedTime(a);
  const timeB = publishedTime(b);
  if (timeA !== timeB) {
    if (timeA === null) {
      return -1;
    }
    if (timeB === null) {
      return 1;
    }
    return timeA - timeB;
  }
  const idA = recordId(a);
  const idB = recordId(b);
  if (idA === idB) {
    return 0;
  }
  return idA < idB ? -1 : 1;
}

export function mergeRecords(
  existing: Array<Record<string, unknown>>,
  batch: Array<Record<string, unknown>>
): { records: Array<Record<string, unknown>>; duplicates: number } {
  const seen = new Set<string>();
  const merged: Array<Record<string, unknown>> = [];
  let duplicates = 0;
  for (const record of [...existing, ...batch]) {
    const id = recordId(record);
    if (id.length > 0) {
      if (seen.has(id)) {
        duplicates += 1;
        continue;
      }
      seen.add(id);
    }
    merged.push(record);
  }
  merged.sort(compareByPublished);
  return { records: merged, duplicates };
}

export interface MergeStats {
  existing: number;
  batch: number;
  written: number;
  duplicates: number;
  parse_errors: number;
}

export async function mergeJsonlFiles(
  existingPath: string,
  batchPath: string,
  outputPath: string
): Promise<MergeStats> {
  if (!(await fileExists(batchPath))) {
    throw new Error(`Batch file not found: ${batchPath}`);
  }
  const existing = await readJsonlRecords(existingPath);
  const batch = await readJsonlRecords(batchPath);
  const { records, duplicates } = mergeRecords(existing.records, batch.records);

  const body = records.map((record) => JSON.stringify(record)).join("\n");
  await writeFileAtomic(outputPath, records.length > 0 ? `${body}\n` : "");

  return {
    existing: existing.records.length,
    batch: batch.records.length,
    written: records.length,
    duplicates,
    parse_errors: existing.parseErrors + batch.parseErrors,
  };
}
