import { createHash, randomBytes } from "node:crypto";
import { mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  IDENTIFYING_QUERY_PARAMS,
  TRACKING_QUERY_PARAMS,
  ZERO_WIDTH_REGEX,
} from "./constants";
import type { TimeWindow } from "./types";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function parseNonNegativeInt(
  raw: string | undefined,
  fallback: number
): number {
  if (!raw) {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(value)) {
    return false;
  }
  return fallback;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export function sanitizeSegment(segment: string): string {
  const clean = segment.replace(/[^a-z0-9]+/gi, "_").replace(/^_+|_+$/g, "");
  return clean.length > 0 ? clean.toLowerCase() : "index";
}

/**
 * Replace a file in one step: readers see the old content or the new one,
 * never a partial write.
 */
export async function writeFileAtomic(
  filePath: string,
  content: string
): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`;
  try {
    await writeFile(tempPath, content, "utf8");
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sha1Hex(value: string): string {
  return createHash("sha1").update(value, "utf8").digest("hex");
}

/**
 * Canonical text form used before any hashing: no BOM or zero-width
 * characters, LF line endings, NFC.
 */
export function canonicalText(text: string): string {
  return text.replace(ZERO_WIDTH_REGEX, "").replace(/\r\n?/g, "\n").normalize("NFC");
}

function compareStrings(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}

function matchesHost(hostname: string, host: string): boolean {
  return hostname === host || hostname.endsWith(`.${host}`);
}

/**
 * URL form used for document ids. Throws TypeError on a malformed URL.
 */
export function normalizeUrl(rawUrl: string): string {
  const parsed = new URL(rawUrl.trim());
  parsed.hash = "";

  const rule = IDENTIFYING_QUERY_PARAMS.find(
    (entry) =>
      matchesHost(parsed.hostname, entry.host) &&
      entry.pathIncludes.some((fragment) => parsed.pathname.includes(fragment))
  );

  const pairs: Array<[string, string]> = [];
  for (const [key, value] of parsed.searchParams) {
    const lower = key.toLowerCase();
    if (rule) {
      if (!rule.keep.includes(lower)) {
        continue;
      }
    } else if (lower.startsWith("utm_") || TRACKING_QUERY_PARAMS.has(lower)) {
      continue;
    }
    pairs.push([key, value]);
  }
  pairs.sort((a, b) => compareStrings(a[0], b[0]) || compareStrings(a[1], b[1]));

  parsed.search = new URLSearchParams(pairs).toString();
  return parsed.toString();
}

export function documentId(urlNorm: string, text: string): string {
  return sha1Hex(`${urlNorm}|${sha1Hex(canonicalText(text))}`);
}

export function urlFingerprint(urlNorm: string): string {
  return `url:${sha1Hex(urlNorm)}`;
}

export function tryNormalizeUrl(rawUrl: string): string | null {
  try {
    return normalizeUrl(rawUrl);
  } catch {
    return null;
  }
}

export function monthKey(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${year}-${month}`;
}

export function utcDateKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export interface MonthWindow extends TimeWindow {
  key: string;
}

/**
 * The trailing `count` calendar months ending with the month of `now`,
 * oldest first. The current month's window ends at `now`.
 */
export function recentMonths(now: Date, count: number): MonthWindow[] {
  const windows: MonthWindow[] = [];
  for (let offset = count - 1; offset >= 0; offset -= 1) {
    const start = new Date(
      Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1)
    );
    const nextStart = new Date(
      Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 1)
    );
    const end = nextStart.getTime() < now.getTime() ? nextStart : now;
    windows.push({ key: monthKey(start), start, end });
  }
  return windows;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 86_400_000);
}

export function isMainModule(metaUrl: string): boolean {
  if (!process.argv[1]) {
    return false;
  }
  return path.resolve(process.argv[1]) === fileURLToPath(metaUrl);
}
