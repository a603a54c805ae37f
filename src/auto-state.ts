import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { AUTO_STATE_FILE_NAME } from "./constants";
import { ConfigError, formatZodIssues } from "./errors";
import { logger } from "./logger";
import type { QuotaEntry } from "./quota";
import type { SchedulingGroup, SourceKey } from "./types";
import { fileExists, monthKey, writeFileAtomic } from "./utils";

const quotaEntrySchema = z.object({
  date: z.string().nullable(),
  units_used: z.number().int().nonnegative(),
});

const autoStateSchema = z.object({
  version: z.literal(1).default(1),
  counts: z.record(z.record(z.number().int().nonnegative())).default({}),
  stored_by_source: z.record(z.number().int().nonnegative()).default({}),
  quota: z.record(quotaEntrySchema).default({}),
  youtube_kw_cursor: z.number().int().nonnegative().default(0),
  last_updated: z.string().nullable().default(null),
});

export type AutoStateData = z.infer<typeof autoStateSchema>;

export function emptyAutoState(): AutoStateData {
  return {
    version: 1,
    counts: {},
    stored_by_source: {},
    quota: {},
    youtube_kw_cursor: 0,
    last_updated: null,
  };
}

export function groupForSource(source: SourceKey): SchedulingGroup {
  if (source === "gdelt" || source === "youtube") {
    return source;
  }
  return "forums";
}

export function monthCount(
  state: AutoStateData,
  month: string,
  group: SchedulingGroup
): number {
  return state.counts[month]?.[group] ?? 0;
}

/**
 * Count a stored document toward its published month. The discovery hint
 * and then the fetch time stand in when no date was extracted.
 */
export function recordStored(
  state: AutoStateData,
  source: SourceKey,
  dates: { publishedAt: string | null; hint?: string; fetchedAt: string }
): void {
  const when = [dates.publishedAt, dates.hint, dates.fetchedAt]
    .map((value) => (value ? new Date(value) : null))
    .find((value): value is Date => value !== null && !Number.isNaN(value.getTime()));
  const month = monthKey(when ?? new Date(dates.fetchedAt));
  const group = groupForSource(source);

  const row = state.counts[month] ?? {};
  row[group] = (row[group] ?? 0) + 1;
  state.counts[month] = row;
  state.stored_by_source[source] = (state.stored_by_source[source] ?? 0) + 1;
}

export function withQuota(
  state: AutoStateData,
  quota: Record<string, QuotaEntry>
): AutoStateData {
  return { ...state, quota };
}

export function autoStatePath(outputRoot: string): string {
  return path.join(outputRoot, AUTO_STATE_FILE_NAME);
}

export async function loadAutoState(outputRoot: string): Promise<AutoStateData> {
  const filePath = autoStatePath(outputRoot);
  if (!(await fileExists(filePath))) {
    logger.debug(`No ${AUTO_STATE_FILE_NAME} yet; starting from zero counts`);
    return emptyAutoState();
  }

  // A corrupt state file would reset the quota ledger, so refuse to run.
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    throw new ConfigError(`Cannot read ${filePath}: ${String(error)}`);
  }

  const parsed = autoStateSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigError(`Malformed ${filePath}`, issues);
  }
  return parsed.data;
}

export async function saveAutoState(
  outputRoot: string,
  state: AutoStateData,
  now: Date = new Date()
): Promise<void> {
  const next: AutoStateData = { ...state, last_updated: now.toISOString() };
  await writeFileAtomic(autoStatePath(outputRoot), `${JSON.stringify(next, null, 2)}\n`);
}
