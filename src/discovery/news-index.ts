import { z } from "zod";
import type { GdeltConfig } from "../config";
import { GDELT_API_URL, MIN_NEWS_KEYWORD_LENGTH } from "../constants";
import { parseDateValue } from "../dates";
import { ExtractError, describeError, isFetchError } from "../errors";
import { logger } from "../logger";
import type { HttpClient } from "../network";
import type { Candidate, DiscoverLimits, Discoverer, TimeWindow } from "../types";
import { addDays } from "../utils";

const articleListSchema = z.object({
  articles: z
    .array(
      z
        .object({
          url: z.string().optional(),
          title: z.string().optional(),
          seendate: z.string().optional(),
          language: z.string().optional(),
          domain: z.string().optional(),
        })
        .passthrough()
    )
    .default([]),
});

/**
 * Split [start, end) into windows of `chunkDays`, each starting `overlapDays`
 * before the previous one ended.
 */
export function splitWindows(
  range: TimeWindow,
  chunkDays: number,
  overlapDays: number
): TimeWindow[] {
  const windows: TimeWindow[] = [];
  let start = range.start;
  while (start.getTime() < range.end.getTime()) {
    const chunkEnd = addDays(start, chunkDays);
    const end = chunkEnd.getTime() < range.end.getTime() ? chunkEnd : range.end;
    windows.push({ start, end });
    if (end.getTime() === range.end.getTime()) {
      break;
    }
    const next = addDays(end, -Math.max(0, overlapDays));
    start = next.getTime() > start.getTime() ? next : end;
  }
  return windows;
}

function stamp(date: Date): string {
  return date.toISOString().replace(/[-:T]/g, "").slice(0, 14);
}

function languageClause(languages: string[]): string | null {
  const filters = languages.map((lang) => {
    const code = lang.toLowerCase();
    if (code === "ko") {
      return "sourcelang:KOREAN";
    }
    if (code === "en") {
      return "sourcelang:ENGLISH";
    }
    return `lang:${code.toUpperCase()}`;
  });
  if (filters.length === 0) {
    return null;
  }
  return filters.length === 1 ? filters[0] ?? null : `(${filters.join(" OR ")})`;
}

export function buildQueryUrl(
  keyword: string,
  window: TimeWindow,
  languages: string[],
  maxRecords: number
): string {
  const term = keyword.trim();
  const quoted = term.includes(" ") ? `"${term}"` : term;
  const clause = languageClause(languages);
  const inclusiveEnd = new Date(
    Math.max(window.start.getTime(), window.end.getTime() - 1000)
  );

  const url = new URL(GDELT_API_URL);
  url.searchParams.set("query", clause ? `${quoted} ${clause}` : quoted);
  url.searchParams.set("mode", "ArtList");
  url.searchParams.set("format", "json");
  url.searchParams.set("maxrecords", String(maxRecords));
  url.searchParams.set("sort", "DateDesc");
  url.searchParams.set("startdatetime", stamp(window.start));
  url.searchParams.set("enddatetime", stamp(inclusiveEnd));
  return url.toString();
}

/**
 * News-index article search, one query per (window, keyword).
 */
export class NewsIndexDiscoverer implements Discoverer {
  readonly name = "gdelt";
  private readonly http: HttpClient;
  private readonly config: GdeltConfig;
  private readonly languages: string[];

  constructor(http: HttpClient, config: GdeltConfig, languages: string[]) {
    this.http = http;
    this.config = config;
    this.languages = languages;
  }

  private clampRange(range: TimeWindow): TimeWindow {
    if (!this.config.maxDaysBack) {
      return range;
    }
    const earliest = addDays(range.end, -this.config.maxDaysBack);
    return earliest.getTime() > range.start.getTime()
      ? { start: earliest, end: range.end }
      : range;
  }

  async discover(
    range: TimeWindow,
    keywords: string[],
    limits: DiscoverLimits
  ): Promise<Candidate[]> {
    const candidates = await this.collect(range, keywords, limits.maxCandidates);
    logger.info(`gdelt: discovered ${candidates.length} articles`);
    return candidates;
  }

  private async collect(
    range: TimeWindow,
    keywords: string[],
    maxCandidates: number
  ): Promise<Candidate[]> {
    const windows = splitWindows(
      this.clampRange(range),
      this.config.chunkDays,
      this.config.overlapDays
    );
    const usable = keywords.filter(
      (keyword) => keyword.trim().length >= MIN_NEWS_KEYWORD_LENGTH
    );
    const seen = new Set<string>();
    const candidates: Candidate[] = [];

    for (const window of windows) {
      for (const keyword of usable) {
        if (candidates.length >= maxCandidates) {
          return candidates;
        }
        const url = buildQueryUrl(
          keyword,
          window,
          this.languages,
          this.config.maxRecordsPerKeyword
        );

        let articles: z.infer<typeof articleListSchema>["articles"];
        try {
          articles = (await this.http.getJson(url, articleListSchema)).data.articles;
        } catch (error) {
          if (!isFetchError(error) && !(error instanceof ExtractError)) {
            throw error;
          }
          logger.warn(
            `gdelt: window ${window.start.toISOString().slice(0, 10)}..${window.end
              .toISOString()
              .slice(0, 10)} "${keyword}" skipped: ${describeError(error)}`
          );
          continue;
        }

        for (const article of articles) {
          if (!article.url || seen.has(article.url)) {
            continue;
          }
          seen.add(article.url);
          candidates.push({
            source: this.name,
            url: article.url,
            title: article.title,
            publishedHint: parseDateValue(article.seendate) ?? undefined,
            discoveryMeta: {
              type: "gdelt",
              keyword,
              seendate: article.seendate ?? null,
              window: {
                start: window.start.toISOString(),
                end: window.end.toISOString(),
              },
            },
          });
          if (candidates.length >= maxCandidates) {
            return candidates;
          }
        }
      }
    }
    return candidates;
  }
}
