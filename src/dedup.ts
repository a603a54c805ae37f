import { createReadStream, createWriteStream } from "node:fs";
import { once } from "node:events";
import path from "node:path";
import { createInterface } from "node:readline";
import { SHORT_TEXT_KEY_THRESHOLD, WHITESPACE_RUN_REGEX } from "./constants";
import { ensureDir, fileExists, isRecord } from "./utils";

export function normalizeKeyText(value: string): string {
  return value.toLowerCase().replace(WHITESPACE_RUN_REGEX, " ").trim();
}

export function normalizeKeyUrl(value: string): string {
  return value.trim().toLowerCase().replace(/\/+$/, "");
}

function presentString(value: unknown): string | null {
  if (typeof value !== "string") {
    return null;
  }
  return value.trim().length > 0 ? value : null;
}

/** The short-text cutoff is measured in UTF-8 bytes; one Hangul syllable is 3. */
function utf8Length(value: string): number {
  return Buffer.byteLength(value, "utf8");
}

/**
 * Exact-match dedup key for a record: normalized text, else title, else URL,
 * else id. Short texts and titles are qualified by URL so unrelated pages
 * with the same boilerplate stay distinct. Returns null when the record has
 * none of these; callers supply a position key instead.
 */
export function buildDedupKey(record: Record<string, unknown>): string | null {
  const rawUrl = presentString(record.url);
  const urlNorm = rawUrl === null ? null : normalizeKeyUrl(rawUrl);

  const text = presentString(record.text);
  if (text !== null) {
    const textNorm = normalizeKeyText(text);
    if (urlNorm && utf8Length(textNorm) < SHORT_TEXT_KEY_THRESHOLD) {
      return `${textNorm}|url|${urlNorm}`;
    }
    return textNorm;
  }

  const title = presentString(record.title);
  if (title !== null) {
    const titleNorm = normalizeKeyText(title);
    return urlNorm ? `${titleNorm}|url|${urlNorm}` : titleNorm;
  }

  if (urlNorm) {
    return `url|${urlNorm}`;
  }

  const { id } = record;
  if ((typeof id === "string" && id.length > 0) || typeof id === "number") {
    return `id|${id}`;
  }

  return null;
}

export function positionKey(lineNumber: number): string {
  return `line|${lineNumber}`;
}

/**
 * First occurrence of a key wins.
 */
export class DedupKeySet {
  private readonly keys = new Set<string>();

  get size(): number {
    return this.keys.size;
  }

  has(key: string): boolean {
    return this.keys.has(key);
  }

  /** Returns false when the key was already present. */
  add(key: string): boolean {
    if (this.keys.has(key)) {
      return false;
    }
    this.keys.add(key);
    return true;
  }
}

export interface DedupStats {
  total: number;
  parsed: number;
  written: number;
  duplicates: number;
  parse_errors: number;
  empty_lines: number;
}

/**
 * Keep-first exact dedup over a JSONL stream. Kept lines are copied
 * byte-for-byte; blank and unparseable lines are counted and dropped.
 */
export async function dedupLines(
  lines: AsyncIterable<string> | Iterable<string>,
  write: (line: string) => Promise<void> | void
): Promise<DedupStats> {
  const stats: DedupStats = {
    total: 0,
    parsed: 0,
    written: 0,
    duplicates: 0,
    parse_errors: 0,
    empty_lines: 0,
  };
  const seen = new DedupKeySet();

  for await (const line of lines) {
    stats.total += 1;
    if (line.trim().length === 0) {
      stats.empty_lines += 1;
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      stats.parse_errors += 1;
      continue;
    }
    if (!isRecord(parsed)) {
      stats.parse_errors += 1;
      continue;
    }
    stats.parsed += 1;

    const key = buildDedupKey(parsed) ?? positionKey(stats.total);
    if (!seen.add(key)) {
      stats.duplicates += 1;
      continue;
    }

    await write(line);
    stats.written += 1;
  }

  return stats;
}

export async function dedupJsonlFile(
  inputPath: string,
  outputPath: string
): Promise<DedupStats> {
  if (!(await fileExists(inputPath))) {
    throw new Error(`Input file not found: ${inputPath}`);
  }
  await ensureDir(path.dirname(path.resolve(outputPath)));
  const input = createReadStream(inputPath, { encoding: "utf8" });
  const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
  const output = createWriteStream(outputPath, { encoding: "utf8" });

  try {
    return await dedupLines(lines, async (line) => {
      if (!output.write(`${line}\n`)) {
        await once(output, "drain");
      }
    });
  } finally {
    lines.close();
    output.end();
    await once(output, "finish");
  }
}
