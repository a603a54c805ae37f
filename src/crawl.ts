import {
  loadAutoState,
  recordStored,
  saveAutoState,
  withQuota,
  type AutoStateData,
} from "./auto-state";
import { checkVideoCredentials, type CrawlerConfig, type YouTubeConfig } from "./config";
import { SOURCE_STAT_KEYS } from "./constants";
import { Extractor } from "./content";
import { LISTING_PARSERS } from "./discovery/forum-listings";
import { ForumDiscoverer } from "./discovery/forums";
import { NewsIndexDiscoverer } from "./discovery/news-index";
import { VideoDiscoverer } from "./discovery/video";
import { ConfigError } from "./errors";
import { Fetcher } from "./fetcher";
import { IndexStore } from "./index-store";
import { prepareOutputDir } from "./io";
import { logger } from "./logger";
import { HttpClient } from "./network";
import {
  CrawlPipeline,
  emptySourceStats,
  makeRunId,
  type DiscoveryTarget,
  type StoredEntry,
} from "./pipeline";
import { QuotaBudget, QuotaLedger } from "./quota";
import { RetryPolicy } from "./retry";
import { RobotsCache } from "./robots";
import { Scorer } from "./scorer";
import { DomainThrottle } from "./throttle";
import type { RunStats, SourceStats, TimeWindow } from "./types";
import { YouTubeClient } from "./youtube";

export const VIDEO_SOURCE = "youtube";

export interface SourceSelection {
  /** Source keys or groups (`gdelt`, `youtube`, `forums`, a forum site); null for all. */
  only: string[] | null;
  /** Forum sites to keep; null for all configured ones. */
  sites: string[] | null;
  noGdelt: boolean;
}

export interface SelectedSources {
  gdelt: boolean;
  youtube: boolean;
  forums: string[];
}

export function selectSources(
  config: CrawlerConfig,
  selection: SourceSelection
): SelectedSources {
  const wants = (key: string): boolean =>
    selection.only === null || selection.only.includes(key);

  const forums: string[] = [];
  for (const [site, siteConfig] of Object.entries(config.forums)) {
    if (!siteConfig.enabled || siteConfig.boards.length === 0) {
      continue;
    }
    if (!(site in LISTING_PARSERS)) {
      throw new ConfigError(`No listing parser for forum site "${site}"`);
    }
    if (!wants("forums") && !wants(site)) {
      continue;
    }
    if (selection.sites !== null && !selection.sites.includes(site)) {
      continue;
    }
    forums.push(site);
  }

  return {
    gdelt: config.gdelt.enabled && !selection.noGdelt && wants("gdelt"),
    youtube:
      config.youtube.enabled &&
      wants(VIDEO_SOURCE) &&
      checkVideoCredentials(config, selection.only?.includes(VIDEO_SOURCE) ?? false),
    forums,
  };
}

/**
 * Long-lived pieces shared by every round: one HTTP client, one robots
 * cache, one per-host throttle and the loaded index.
 */
export interface CrawlContext {
  config: CrawlerConfig;
  http: HttpClient;
  robots: RobotsCache;
  throttle: DomainThrottle;
  index: IndexStore;
  extractor: Extractor;
  scorer: Scorer;
}

export async function openCrawlContext(config: CrawlerConfig): Promise<CrawlContext> {
  await prepareOutputDir(config.output.root);
  const index = await IndexStore.open(config.output.root, {
    flushEvery: config.limits.indexFlushEvery,
  });

  return {
    config,
    http: new HttpClient({
      userAgent: config.userAgent,
      timeoutMs: config.limits.requestTimeoutMs,
      retry: new RetryPolicy(config.retry),
    }),
    robots: new RobotsCache({
      userAgent: config.userAgent,
      timeoutMs: config.limits.requestTimeoutMs,
    }),
    throttle: new DomainThrottle({
      perDomainConcurrency: config.limits.perDomainConcurrency,
      minIntervalMs: config.limits.minRequestIntervalMs,
    }),
    index,
    extractor: new Extractor({ forumComments: config.forumComments }),
    scorer: new Scorer(config.quality, config.keywords, config.languages),
  };
}

export function createYouTubeClient(
  context: CrawlContext,
  budget: QuotaBudget,
  overrides: Partial<YouTubeConfig> = {}
): YouTubeClient {
  return new YouTubeClient(
    context.http,
    { ...context.config.youtube, ...overrides },
    budget,
    context.robots
  );
}

export function createPipeline(
  context: CrawlContext,
  options: {
    youtube: YouTubeClient | null;
    maxFetch: number | null;
    runId: string;
    now?: () => Date;
  }
): CrawlPipeline {
  const { config } = context;
  const robotsExempt = new Set(
    Object.entries(config.forums)
      .filter(([, site]) => !site.obeyRobots)
      .map(([name]) => name)
  );
  const fetcher = new Fetcher({
    http: context.http,
    robots: context.robots,
    throttle: context.throttle,
    index: context.index,
    robotsExempt,
    youtube: options.youtube,
    now: options.now,
  });
  return new CrawlPipeline({
    fetcher,
    extractor: context.extractor,
    scorer: context.scorer,
    index: context.index,
    output: config.output,
    concurrency: config.limits.fetchConcurrency,
    maxFetch: options.maxFetch,
    runId: options.runId,
    now: options.now,
  });
}

export function forumDiscoverers(context: CrawlContext, sites: string[]): ForumDiscoverer[] {
  return sites.flatMap((site) => {
    const siteConfig = context.config.forums[site];
    return siteConfig
      ? [
          new ForumDiscoverer(site, siteConfig, {
            http: context.http,
            robots: context.robots,
            throttle: context.throttle,
          }),
        ]
      : [];
  });
}

export function quotaLedgerFor(config: CrawlerConfig, state: AutoStateData): QuotaLedger {
  return new QuotaLedger(
    {
      [VIDEO_SOURCE]: {
        dailyQuota: config.autocrawl.youtube.dailyQuota,
        reserveQuota: config.autocrawl.youtube.reserveQuota,
      },
    },
    state.quota
  );
}

/**
 * Fold a finished round into the state: spent units into the ledger and
 * stored documents into their months. Called only after the writer closed.
 */
export function commitRound(
  state: AutoStateData,
  ledger: QuotaLedger,
  budget: QuotaBudget | null,
  stored: StoredEntry[],
  now: Date
): AutoStateData {
  if (budget) {
    ledger.charge(budget.source, budget.spent, now);
    if (budget.exhausted) {
      ledger.exhaust(budget.source, now);
    }
  }
  for (const entry of stored) {
    recordStored(state, entry.source, entry);
  }
  return withQuota(state, ledger.snapshot());
}

export function totals(stats: RunStats): SourceStats {
  const sum = emptySourceStats();
  for (const source of Object.values(stats.sources)) {
    for (const key of SOURCE_STAT_KEYS) {
      sum[key] += source[key];
    }
  }
  return sum;
}

export function printRunSummary(title: string, stats: RunStats): void {
  const all = totals(stats);
  logger.printSummary(title, [
    ["Run", stats.run_id],
    ["Discovered", all.discovered],
    ["Fetched", `${all.fetched} (${all.retried_ok} after retry, ${all.skipped_indexed} already indexed)`],
    ["Failed", `${all.fetch_failed_transient} transient, ${all.fetch_failed_permanent} permanent, ${all.extract_failed} extract`],
    ["Quality rejected", all.quality_rejected],
    ["Duplicates", all.duplicates],
    ["Stored", all.stored],
    ["Quota units", stats.quota_units_spent],
  ]);
}

export interface RunOptions {
  selection: SourceSelection;
  maxFetch: number | null;
  now?: () => Date;
}

/**
 * One-shot crawl of the configured time window.
 */
export async function runCrawl(
  config: CrawlerConfig,
  options: RunOptions
): Promise<RunStats> {
  const now = options.now ?? (() => new Date());
  const sources = selectSources(config, options.selection);

  const context = await openCrawlContext(config);
  const state = await loadAutoState(config.output.root);
  const ledger = quotaLedgerFor(config, state);
  const started = now();

  const budget = sources.youtube
    ? new QuotaBudget(VIDEO_SOURCE, ledger.available(VIDEO_SOURCE, started))
    : null;
  const youtube = budget ? createYouTubeClient(context, budget) : null;

  const range: TimeWindow = {
    start: config.timeWindow.start,
    end: config.timeWindow.end ?? started,
  };
  const maxCandidates = config.limits.maxCandidatesPerSource;
  const targets: DiscoveryTarget[] = [];
  if (sources.gdelt) {
    targets.push({
      discoverer: new NewsIndexDiscoverer(context.http, config.gdelt, config.languages),
      window: range,
      keywords: config.keywords,
      maxCandidates,
    });
  }
  if (youtube) {
    targets.push({
      discoverer: new VideoDiscoverer(youtube, config.youtube.maxResultsPerKeyword),
      window: range,
      keywords: config.keywords,
      maxCandidates,
    });
  }
  for (const discoverer of forumDiscoverers(context, sources.forums)) {
    targets.push({ discoverer, window: range, keywords: config.keywords, maxCandidates });
  }

  const runId = makeRunId(started);
  logger.logRunStart(`Run ${runId}`, {
    output: config.output.root,
    sources: [
      ...(sources.gdelt ? ["gdelt"] : []),
      ...(sources.youtube ? [VIDEO_SOURCE] : []),
      ...sources.forums,
    ],
    window: `${range.start.toISOString()} .. ${range.end.toISOString()}`,
    maxFetch: options.maxFetch ?? "unlimited",
    quotaAvailable: budget?.granted ?? 0,
  });

  const pipeline = createPipeline(context, {
    youtube,
    maxFetch: options.maxFetch,
    runId,
    now,
  });
  const candidates = await pipeline.discover(targets);
  await pipeline.process(candidates);
  const stats = await pipeline.close();
  stats.quota_units_spent = budget?.spent ?? 0;

  const next = commitRound(state, ledger, budget, pipeline.stored, now());
  await saveAutoState(config.output.root, next, now());
  logger.success(`Run ${runId} committed to ${config.output.root}`);

  printRunSummary("Run finished", stats);
  return stats;
}
