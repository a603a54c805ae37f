import {
  loadAutoState,
  monthCount,
  saveAutoState,
  type AutoStateData,
} from "./auto-state";
import type { CrawlerConfig } from "./config";
import { AUTOCRAWL_COMMENTS_PAGES, VIDEO_PICK_COST_UNITS } from "./constants";
import {
  commitRound,
  createPipeline,
  createYouTubeClient,
  forumDiscoverers,
  openCrawlContext,
  printRunSummary,
  quotaLedgerFor,
  selectSources,
  VIDEO_SOURCE,
  type CrawlContext,
  type SelectedSources,
  type SourceSelection,
} from "./crawl";
import { NewsIndexDiscoverer } from "./discovery/news-index";
import { VideoDiscoverer } from "./discovery/video";
import { logger } from "./logger";
import { makeRunId, type DiscoveryTarget } from "./pipeline";
import { QuotaBudget, type QuotaLedger } from "./quota";
import type { RunStats, SchedulingGroup, TimeWindow } from "./types";
import { recentMonths, sleep, type MonthWindow } from "./utils";

export interface MonthDeficit {
  month: string;
  window: TimeWindow;
  count: number;
  deficit: number;
}

export interface VideoPick {
  month: string;
  window: TimeWindow;
  keyword: string;
  cost: number;
}

export interface RoundPlan {
  gdelt: MonthDeficit[];
  youtube: MonthDeficit[];
  forums: MonthDeficit[];
  videoPicks: VideoPick[];
  deferredPicks: VideoPick[];
  quotaAvailable: number;
  /** Keyword cursor if every admitted pick runs. */
  nextCursor: number;
}

export interface PlanSettings {
  monthsBack: number;
  monthlyTarget: number;
  maxWindows: Record<SchedulingGroup, number>;
  maxYoutubeKeywords: number;
  keywords: string[];
  enabled: Record<SchedulingGroup, boolean>;
}

/**
 * Months with a shortfall, largest first; equal deficits go to the more
 * recent month.
 */
export function rankDeficits(
  state: AutoStateData,
  group: SchedulingGroup,
  months: MonthWindow[],
  monthlyTarget: number
): MonthDeficit[] {
  return months
    .map((window, position) => {
      const count = monthCount(state, window.key, group);
      return {
        position,
        entry: {
          month: window.key,
          window: { start: window.start, end: window.end },
          count,
          deficit: monthlyTarget - count,
        },
      };
    })
    .filter(({ entry }) => entry.deficit > 0)
    .sort((a, b) => b.entry.deficit - a.entry.deficit || b.position - a.position)
    .map(({ entry }) => entry);
}

/**
 * (window, keyword) pairs in keyword round-robin order from `cursor`.
 */
export function videoPicks(
  windows: MonthDeficit[],
  keywords: string[],
  perWindow: number,
  cursor: number
): VideoPick[] {
  if (keywords.length === 0) {
    return [];
  }
  const take = Math.min(perWindow, keywords.length);
  const picks: VideoPick[] = [];
  let position = cursor % keywords.length;
  for (const target of windows) {
    for (let i = 0; i < take; i += 1) {
      const keyword = keywords[position % keywords.length];
      position += 1;
      if (keyword === undefined) {
        continue;
      }
      picks.push({
        month: target.month,
        window: target.window,
        keyword,
        cost: VIDEO_PICK_COST_UNITS,
      });
    }
  }
  return picks;
}

/**
 * Moves the keyword cursor past the leading picks that ran. A pick that did
 * not run, and everything after it, comes back next round.
 */
export function advanceCursor(
  cursor: number,
  keywordCount: number,
  picks: VideoPick[],
  ran: (pick: VideoPick) => boolean
): number {
  if (keywordCount === 0) {
    return 0;
  }
  let done = 0;
  for (const pick of picks) {
    if (!ran(pick)) {
      break;
    }
    done += 1;
  }
  return (cursor + done) % keywordCount;
}

/**
 * Pure round planning: deficit-ranked months per group and the video picks
 * that fit today's remaining quota. Nothing is mutated.
 */
export function planRound(
  state: AutoStateData,
  settings: PlanSettings,
  ledger: QuotaLedger,
  now: Date
): RoundPlan {
  const months = recentMonths(now, settings.monthsBack);
  const select = (group: SchedulingGroup): MonthDeficit[] =>
    settings.enabled[group]
      ? rankDeficits(state, group, months, settings.monthlyTarget).slice(
          0,
          settings.maxWindows[group]
        )
      : [];

  const gdelt = select("gdelt");
  const youtube = select("youtube");
  const forums = select("forums");

  const quotaAvailable = ledger.available(VIDEO_SOURCE, now);
  const picks = videoPicks(
    youtube,
    settings.keywords,
    settings.maxYoutubeKeywords,
    state.youtube_kw_cursor
  );
  const admitted: VideoPick[] = [];
  let cumulative = 0;
  let index = 0;
  for (; index < picks.length; index += 1) {
    const pick = picks[index];
    if (!pick || cumulative + pick.cost > quotaAvailable) {
      break;
    }
    cumulative += pick.cost;
    admitted.push(pick);
  }
  const deferredPicks = picks.slice(index);

  const nextCursor = advanceCursor(
    state.youtube_kw_cursor,
    settings.keywords.length,
    admitted,
    () => true
  );

  return {
    gdelt,
    youtube,
    forums,
    videoPicks: admitted,
    deferredPicks,
    quotaAvailable,
    nextCursor,
  };
}

export function planSettings(
  config: CrawlerConfig,
  sources: SelectedSources
): PlanSettings {
  const { autocrawl } = config;
  return {
    monthsBack: autocrawl.monthsBack,
    monthlyTarget: autocrawl.monthlyTarget,
    maxWindows: {
      gdelt: autocrawl.round.maxGdeltWindows,
      youtube: autocrawl.round.maxYoutubeWindows,
      forums: autocrawl.round.maxForumsWindows,
    },
    maxYoutubeKeywords: autocrawl.round.maxYoutubeKeywords,
    keywords: config.keywords,
    enabled: {
      gdelt: sources.gdelt,
      youtube: sources.youtube,
      forums: autocrawl.includeForums && sources.forums.length > 0,
    },
  };
}

export interface RoundResult {
  round: number;
  plan: RoundPlan;
  stats: RunStats;
  /** Keyword cursor saved at the end of the round. */
  cursor: number;
}

export interface AutoCrawlerOptions {
  selection: SourceSelection;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

function describeMonths(entries: MonthDeficit[]): string {
  return entries.length > 0
    ? entries.map((entry) => `${entry.month}(-${entry.deficit})`).join(", ")
    : "none";
}

/**
 * Round-based controller. Each round reads the state, plans, runs the
 * pipeline for the chosen targets and writes the state back in one step.
 */
export class AutoCrawler {
  private readonly config: CrawlerConfig;
  private readonly sources: SelectedSources;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;
  private context: CrawlContext | null = null;

  constructor(config: CrawlerConfig, options: AutoCrawlerOptions) {
    this.config = config;
    this.sources = selectSources(config, options.selection);
    this.now = options.now ?? (() => new Date());
    this.sleep = options.sleep ?? sleep;
  }

  private async openContext(): Promise<CrawlContext> {
    if (!this.context) {
      this.context = await openCrawlContext(this.config);
    }
    return this.context;
  }

  async runRound(round = 1): Promise<RoundResult> {
    const context = await this.openContext();
    const { config } = this;
    const started = this.now();

    const state = await loadAutoState(config.output.root);
    const ledger = quotaLedgerFor(config, state);
    const plan = planRound(state, planSettings(config, this.sources), ledger, started);

    logger.info(
      `Round ${round}: gdelt ${describeMonths(plan.gdelt)}; youtube ${describeMonths(
        plan.youtube
      )}; forums ${describeMonths(plan.forums)}`
    );
    if (plan.deferredPicks.length > 0) {
      logger.info(
        `Round ${round}: ${plan.videoPicks.length} video picks fit ${plan.quotaAvailable} units; ${plan.deferredPicks.length} deferred`
      );
    }

    const granted = plan.videoPicks.reduce((sum, pick) => sum + pick.cost, 0);
    const budget = granted > 0 ? new QuotaBudget(VIDEO_SOURCE, granted) : null;
    const youtube = budget
      ? createYouTubeClient(context, budget, {
          commentsPages: config.youtube.commentsPages ?? AUTOCRAWL_COMMENTS_PAGES,
        })
      : null;

    const maxCandidates = config.limits.maxCandidatesPerSource;
    const targets: DiscoveryTarget[] = [];
    for (const month of plan.gdelt) {
      targets.push({
        discoverer: new NewsIndexDiscoverer(context.http, config.gdelt, config.languages),
        window: month.window,
        keywords: config.keywords,
        maxCandidates,
      });
    }
    const videoDiscoverer = youtube
      ? new VideoDiscoverer(youtube, config.youtube.maxResultsPerKeyword)
      : null;
    if (videoDiscoverer) {
      for (const month of plan.youtube) {
        const keywords = plan.videoPicks
          .filter((pick) => pick.month === month.month)
          .map((pick) => pick.keyword);
        if (keywords.length > 0) {
          targets.push({
            discoverer: videoDiscoverer,
            window: month.window,
            keywords,
            maxCandidates,
          });
        }
      }
    }
    const newestForumMonth = plan.forums[0];
    if (newestForumMonth) {
      for (const discoverer of forumDiscoverers(context, this.sources.forums)) {
        targets.push({
          discoverer,
          window: newestForumMonth.window,
          keywords: config.keywords,
          maxCandidates,
        });
      }
    }

    const runId = makeRunId(started);
    const pipeline = createPipeline(context, {
      youtube,
      maxFetch: config.autocrawl.round.maxFetch,
      runId,
      now: this.now,
    });
    const candidates = await pipeline.discover(targets);
    await pipeline.process(candidates, `Round ${round}`);
    const stats = await pipeline.close();
    stats.quota_units_spent = budget?.spent ?? 0;

    const finished = this.now();
    const next = commitRound(state, ledger, budget, pipeline.stored, finished);
    next.youtube_kw_cursor = advanceCursor(
      state.youtube_kw_cursor,
      config.keywords.length,
      plan.videoPicks,
      (pick) => videoDiscoverer?.hasExecuted(pick.window, pick.keyword) ?? false
    );
    await saveAutoState(config.output.root, next, finished);
    logger.success(`Round ${round} committed; keyword cursor at ${next.youtube_kw_cursor}`);

    printRunSummary(`Round ${round} finished`, stats);
    return { round, plan, stats, cursor: next.youtube_kw_cursor };
  }

  async run(rounds: number, sleepSeconds: number): Promise<RoundResult[]> {
    const results: RoundResult[] = [];
    for (let round = 1; round <= rounds; round += 1) {
      results.push(await this.runRound(round));
      if (round < rounds && sleepSeconds > 0) {
        logger.info(`Sleeping ${sleepSeconds}s before round ${round + 1}`);
        await this.sleep(sleepSeconds * 1000);
      }
    }
    return results;
  }
}

export interface AutocrawlStatus {
  months: Array<{
    month: string;
    counts: Record<SchedulingGroup, number>;
    deficits: Record<SchedulingGroup, number>;
  }>;
  target: number;
  quota: { date: string | null; units_used: number; available: number };
  youtube_kw_cursor: number;
  stored_by_source: Record<string, number>;
  last_updated: string | null;
}

export async function autocrawlStatus(
  config: CrawlerConfig,
  now: Date = new Date()
): Promise<AutocrawlStatus> {
  const state = await loadAutoState(config.output.root);
  const ledger = quotaLedgerFor(config, state);
  const target = config.autocrawl.monthlyTarget;
  const entry = ledger.snapshot()[VIDEO_SOURCE];

  return {
    months: recentMonths(now, config.autocrawl.monthsBack).map((window) => {
      const counts = {
        gdelt: monthCount(state, window.key, "gdelt"),
        youtube: monthCount(state, window.key, "youtube"),
        forums: monthCount(state, window.key, "forums"),
      };
      return {
        month: window.key,
        counts,
        deficits: {
          gdelt: Math.max(0, target - counts.gdelt),
          youtube: Math.max(0, target - counts.youtube),
          forums: Math.max(0, target - counts.forums),
        },
      };
    }),
    target,
    quota: {
      date: entry?.date ?? null,
      units_used: ledger.usedToday(VIDEO_SOURCE, now),
      available: ledger.available(VIDEO_SOURCE, now),
    },
    youtube_kw_cursor: state.youtube_kw_cursor,
    stored_by_source: state.stored_by_source,
    last_updated: state.last_updated,
  };
}
