import type { ForumSiteConfig } from "../config";
import { FORUM_PAGE_PARAM, KST_OFFSET_MINUTES } from "../constants";
import { parseDateValue } from "../dates";
import { describeError, isFetchError } from "../errors";
import { logger } from "../logger";
import type { HttpClient } from "../network";
import type { RobotsCache } from "../robots";
import type { DomainThrottle } from "../throttle";
import type {
  Candidate,
  DiscoverLimits,
  Discoverer,
  TimeWindow,
} from "../types";
import { tryNormalizeUrl } from "../utils";
import { LISTING_PARSERS, type ListingParser } from "./forum-listings";

export function buildPageUrl(site: string, boardUrl: string, page: number): string {
  if (page <= 1) {
    return boardUrl;
  }
  const url = new URL(boardUrl);
  url.searchParams.set(FORUM_PAGE_PARAM[site] ?? "page", String(page));
  return url.toString();
}

export interface ForumDiscovererDeps {
  http: HttpClient;
  robots: RobotsCache;
  throttle: DomainThrottle;
  now?: () => Date;
}

/**
 * Walks the newest listing pages of each configured board. Forums have no
 * stable historical index, so the time window is not used.
 */
export class ForumDiscoverer implements Discoverer {
  readonly name: string;
  private readonly config: ForumSiteConfig;
  private readonly parser: ListingParser;
  private readonly deps: ForumDiscovererDeps;

  constructor(site: string, config: ForumSiteConfig, deps: ForumDiscovererDeps) {
    const parser = LISTING_PARSERS[site];
    if (!parser) {
      throw new Error(`No listing parser registered for forum site "${site}"`);
    }
    this.name = site;
    this.config = config;
    this.parser = parser;
    this.deps = deps;
  }

  async discover(
    _window: TimeWindow,
    _keywords: string[],
    limits: DiscoverLimits
  ): Promise<Candidate[]> {
    const candidates: Candidate[] = [];
    for (const board of this.config.boards) {
      if (candidates.length >= limits.maxCandidates) {
        break;
      }
      const room = limits.maxCandidates - candidates.length;
      const found = await this.discoverBoard(board, Math.min(room, this.config.perBoardLimit));
      candidates.push(...found);
    }
    logger.info(`${this.name}: discovered ${candidates.length} threads`);
    return candidates;
  }

  private async discoverBoard(board: string, limit: number): Promise<Candidate[]> {
    const { http, robots, throttle } = this.deps;
    const now = this.deps.now?.() ?? new Date();
    const seen = new Set<string>();
    const candidates: Candidate[] = [];

    for (let page = 1; page <= this.config.maxPages; page += 1) {
      const pageUrl = buildPageUrl(this.name, board, page);
      const target = new URL(pageUrl);
      if (this.config.obeyRobots && !(await robots.isAllowed(target))) {
        logger.logBlocked(pageUrl, "robots.txt");
        continue;
      }

      let html: string;
      try {
        const crawlDelay = await robots.crawlDelayMs(target);
        const response = await http.getText(pageUrl, {
          gate: throttle.gate(target.host, crawlDelay ?? 0),
        });
        html = response.text;
      } catch (error) {
        if (!isFetchError(error)) {
          throw error;
        }
        logger.warn(`${this.name}: listing page skipped ${pageUrl}: ${describeError(error)}`);
        continue;
      }

      for (const entry of this.parser(html, board)) {
        const norm = tryNormalizeUrl(entry.url);
        if (!norm || seen.has(norm)) {
          continue;
        }
        seen.add(norm);
        const publishedHint = parseDateValue(entry.publishedAt, {
          offsetMinutes: KST_OFFSET_MINUTES,
          now,
        });
        candidates.push({
          source: this.name,
          url: entry.url,
          title: entry.title ?? undefined,
          publishedHint: publishedHint ?? undefined,
          discoveryMeta: {
            type: "forum",
            site: this.name,
            board,
            page,
            ...(entry.author ? { author: entry.author } : {}),
          },
        });
        if (candidates.length >= limit) {
          return candidates;
        }
      }
    }
    return candidates;
  }
}
