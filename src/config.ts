import { readFile } from "node:fs/promises";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import YAML from "yaml";
import { z } from "zod";
import {
  DEFAULT_COMMENTS_PAGES,
  DEFAULT_CONFIG_PATH,
  DEFAULT_USER_AGENT,
  LINE_SPLIT_REGEX,
  MAX_NEWS_WINDOW_DAYS,
  DEFAULT_NEWS_OVERLAP_DAYS,
} from "./constants";
import { ConfigError, formatZodIssues } from "./errors";
import { logger } from "./logger";
import type { RetryPolicyOptions } from "./retry";
import { parseBoolean, parseNonNegativeInt } from "./utils";

const dateString = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const forumSiteSchema = z.object({
  enabled: z.boolean().default(true),
  boards: z.array(z.string().url()).default([]),
  max_pages: z.number().int().positive().default(2),
  per_board_limit: z.number().int().positive().default(50),
  obey_robots: z.boolean().default(true),
});

const paramsSchema = z
  .object({
    keywords: z.array(z.string().trim().min(1)).optional(),
    keywords_file: z.string().optional(),
    lang: z.array(z.string().min(2)).default(["ko"]),
    time_window: z
      .object({
        start_date: dateString.default("2024-01-01"),
        end_date: dateString.nullable().default(null),
      })
      .default({}),
    output: z
      .object({
        root: z.string().min(1).default("data/raw"),
        unified: z.boolean().default(false),
      })
      .default({}),
    limits: z
      .object({
        max_candidates_per_source: z.number().int().positive().default(200),
        request_timeout_sec: z.number().positive().default(20),
        fetch_concurrency: z.number().int().positive().default(4),
        per_domain_concurrency: z.number().int().positive().default(2),
        min_request_interval_ms: z.number().int().nonnegative().default(1000),
        max_fetch_per_run: z.number().int().positive().nullable().default(null),
        index_flush_every: z.number().int().positive().default(50),
      })
      .default({}),
    retry: z
      .object({
        max_attempts: z.number().int().positive().default(3),
        base_delay_ms: z.number().int().nonnegative().default(500),
        max_delay_ms: z.number().int().nonnegative().default(15_000),
        jitter_ms: z.number().int().nonnegative().default(250),
      })
      .default({}),
    quality: z
      .object({
        min_score: z.number().min(0).max(1).default(0.5),
        min_characters: z.number().int().positive().default(200),
        min_keyword_hits: z.number().int().nonnegative().default(1),
      })
      .default({}),
    sources: z
      .object({
        gdelt: z
          .object({
            enabled: z.boolean().default(true),
            max_records_per_keyword: z.number().int().min(1).max(250).default(100),
            chunk_days: z
              .number()
              .int()
              .min(1)
              .max(MAX_NEWS_WINDOW_DAYS)
              .default(MAX_NEWS_WINDOW_DAYS),
            overlap_days: z
              .number()
              .int()
              .nonnegative()
              .default(DEFAULT_NEWS_OVERLAP_DAYS),
            max_days_back: z.number().int().positive().nullable().default(null),
          })
          .default({}),
        youtube: z
          .object({
            enabled: z.boolean().default(true),
            max_results_per_keyword: z.number().int().min(1).max(50).default(25),
          })
          .default({}),
        forums: z.record(forumSiteSchema).default({}),
      })
      .default({}),
    autocrawl: z
      .object({
        months_back: z.number().int().positive().default(12),
        monthly_target_per_source: z.number().int().positive().default(200),
        include_forums: z.boolean().default(true),
        round: z
          .object({
            max_fetch: z.number().int().positive().nullable().default(200),
            max_gdelt_windows: z.number().int().nonnegative().default(2),
            max_youtube_windows: z.number().int().nonnegative().default(1),
            max_youtube_keywords: z.number().int().positive().default(3),
            max_forums_windows: z.number().int().nonnegative().default(1),
          })
          .default({}),
        youtube: z
          .object({
            daily_quota: z.number().int().positive().default(1000),
            reserve_quota: z.number().int().nonnegative().default(200),
          })
          .default({}),
      })
      .default({}),
  })
  .superRefine((params, ctx) => {
    const { daily_quota, reserve_quota } = params.autocrawl.youtube;
    if (reserve_quota > daily_quota) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["autocrawl", "youtube", "reserve_quota"],
        message: `reserve_quota (${reserve_quota}) exceeds daily_quota (${daily_quota})`,
      });
    }
    const { start_date, end_date } = params.time_window;
    if (end_date !== null && start_date > end_date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["time_window"],
        message: `start_date ${start_date} is after end_date ${end_date}`,
      });
    }
    if (params.sources.gdelt.overlap_days >= params.sources.gdelt.chunk_days) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sources", "gdelt", "overlap_days"],
        message: "overlap_days must be smaller than chunk_days",
      });
    }
  });

export type ParamsFile = z.infer<typeof paramsSchema>;

export interface ForumSiteConfig {
  enabled: boolean;
  boards: string[];
  maxPages: number;
  perBoardLimit: number;
  obeyRobots: boolean;
}

export interface QualityConfig {
  minScore: number;
  minCharacters: number;
  minKeywordHits: number;
}

export type CommentsOrder = "relevance" | "time";
export type CommentsTextFormat = "html" | "plainText";

export interface YouTubeConfig {
  enabled: boolean;
  apiKey: string | null;
  maxResultsPerKeyword: number;
  /** Comment pages per video; null when YOUTUBE_COMMENTS_PAGES is unset. */
  commentsPages: number | null;
  includeReplies: boolean;
  commentsOrder: CommentsOrder;
  textFormat: CommentsTextFormat;
  captionLangs: string[];
}

export interface GdeltConfig {
  enabled: boolean;
  maxRecordsPerKeyword: number;
  chunkDays: number;
  overlapDays: number;
  maxDaysBack: number | null;
}

export interface AutocrawlConfig {
  monthsBack: number;
  monthlyTarget: number;
  includeForums: boolean;
  round: {
    maxFetch: number | null;
    maxGdeltWindows: number;
    maxYoutubeWindows: number;
    maxYoutubeKeywords: number;
    maxForumsWindows: number;
  };
  youtube: { dailyQuota: number; reserveQuota: number };
}

export interface CrawlerConfig {
  keywords: string[];
  languages: string[];
  timeWindow: { start: Date; end: Date | null };
  output: { root: string; unified: boolean };
  userAgent: string;
  limits: {
    maxCandidatesPerSource: number;
    requestTimeoutMs: number;
    fetchConcurrency: number;
    perDomainConcurrency: number;
    minRequestIntervalMs: number;
    maxFetchPerRun: number | null;
    indexFlushEvery: number;
  };
  retry: RetryPolicyOptions;
  quality: QualityConfig;
  gdelt: GdeltConfig;
  youtube: YouTubeConfig;
  forums: Record<string, ForumSiteConfig>;
  forumComments: { enabled: boolean; max: number };
  autocrawl: AutocrawlConfig;
}

export interface LoadConfigOptions {
  configPath?: string;
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
  /** Read `.env` from the working directory into `process.env` first. */
  loadDotenv?: boolean;
}

const commentsOrderSchema = z.enum(["relevance", "time"]);
const textFormatSchema = z.enum(["html", "plainText"]);

export function parseKeywordList(content: string): string[] {
  const seen = new Set<string>();
  for (const rawLine of content.split(LINE_SPLIT_REGEX)) {
    const line = rawLine.trim();
    if (line.length > 0 && !line.startsWith("#")) {
      seen.add(line);
    }
  }
  return [...seen];
}

async function readKeywords(
  params: ParamsFile,
  configDir: string
): Promise<string[]> {
  if (params.keywords && params.keywords.length > 0) {
    return [...new Set(params.keywords)];
  }
  const keywordsPath = path.resolve(configDir, params.keywords_file ?? "keywords.txt");
  let content: string;
  try {
    content = await readFile(keywordsPath, "utf8");
  } catch (error) {
    throw new ConfigError(
      `No keywords in config and keywords file unreadable: ${keywordsPath} (${String(error)})`
    );
  }
  const keywords = parseKeywordList(content);
  if (keywords.length === 0) {
    throw new ConfigError(`Keywords file is empty: ${keywordsPath}`);
  }
  return keywords;
}

export function parseParams(raw: unknown): ParamsFile {
  const result = paramsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

function toUtcDate(value: string): Date {
  return new Date(`${value}T00:00:00Z`);
}

export function buildConfig(
  params: ParamsFile,
  keywords: string[],
  env: NodeJS.ProcessEnv,
  dataDir?: string
): CrawlerConfig {
  const order = commentsOrderSchema.safeParse(env.YOUTUBE_COMMENTS_ORDER);
  const textFormat = textFormatSchema.safeParse(env.YOUTUBE_COMMENTS_TEXT_FORMAT);
  const captionLangs = (env.YOUTUBE_CAPTIONS_LANGS ?? "ko")
    .split(",")
    .map((lang) => lang.trim())
    .filter((lang) => lang.length > 0);

  const forums: Record<string, ForumSiteConfig> = {};
  for (const [site, block] of Object.entries(params.sources.forums)) {
    forums[site] = {
      enabled: block.enabled,
      boards: block.boards,
      maxPages: block.max_pages,
      perBoardLimit: block.per_board_limit,
      obeyRobots: block.obey_robots,
    };
  }

  const apiKey = env.YOUTUBE_API_KEY?.trim();
  const userAgent = env.CRAWLER_USER_AGENT?.trim();
  const dataRoot = dataDir ?? env.CRAWL_DATA_DIR?.trim();

  return {
    keywords,
    languages: params.lang,
    timeWindow: {
      start: toUtcDate(params.time_window.start_date),
      end: params.time_window.end_date
        ? toUtcDate(params.time_window.end_date)
        : null,
    },
    output: {
      root: dataRoot && dataRoot.length > 0 ? dataRoot : params.output.root,
      unified: params.output.unified,
    },
    userAgent: userAgent && userAgent.length > 0 ? userAgent : DEFAULT_USER_AGENT,
    limits: {
      maxCandidatesPerSource: params.limits.max_candidates_per_source,
      requestTimeoutMs: Math.round(params.limits.request_timeout_sec * 1000),
      fetchConcurrency: params.limits.fetch_concurrency,
      perDomainConcurrency: params.limits.per_domain_concurrency,
      minRequestIntervalMs: params.limits.min_request_interval_ms,
      maxFetchPerRun: params.limits.max_fetch_per_run,
      indexFlushEvery: params.limits.index_flush_every,
    },
    retry: {
      maxAttempts: params.retry.max_attempts,
      baseDelayMs: params.retry.base_delay_ms,
      maxDelayMs: params.retry.max_delay_ms,
      jitterMs: params.retry.jitter_ms,
    },
    quality: {
      minScore: params.quality.min_score,
      minCharacters: params.quality.min_characters,
      minKeywordHits: params.quality.min_keyword_hits,
    },
    gdelt: {
      enabled: params.sources.gdelt.enabled,
      maxRecordsPerKeyword: params.sources.gdelt.max_records_per_keyword,
      chunkDays: params.sources.gdelt.chunk_days,
      overlapDays: params.sources.gdelt.overlap_days,
      maxDaysBack: params.sources.gdelt.max_days_back,
    },
    youtube: {
      enabled: params.sources.youtube.enabled,
      apiKey: apiKey && apiKey.length > 0 ? apiKey : null,
      maxResultsPerKeyword: params.sources.youtube.max_results_per_keyword,
      commentsPages: env.YOUTUBE_COMMENTS_PAGES?.trim()
        ? parseNonNegativeInt(env.YOUTUBE_COMMENTS_PAGES, DEFAULT_COMMENTS_PAGES)
        : null,
      includeReplies: parseBoolean(env.YOUTUBE_COMMENTS_INCLUDE_REPLIES, true),
      commentsOrder: order.success ? order.data : "relevance",
      textFormat: textFormat.success ? textFormat.data : "plainText",
      captionLangs,
    },
    forums,
    forumComments: {
      enabled: parseBoolean(env.FORUMS_COMMENTS_ENABLED, true),
      max: parseNonNegativeInt(env.FORUMS_COMMENTS_MAX, 200),
    },
    autocrawl: {
      monthsBack: params.autocrawl.months_back,
      monthlyTarget: params.autocrawl.monthly_target_per_source,
      includeForums: params.autocrawl.include_forums,
      round: {
        maxFetch: params.autocrawl.round.max_fetch,
        maxGdeltWindows: params.autocrawl.round.max_gdelt_windows,
        maxYoutubeWindows: params.autocrawl.round.max_youtube_windows,
        maxYoutubeKeywords: params.autocrawl.round.max_youtube_keywords,
        maxForumsWindows: params.autocrawl.round.max_forums_windows,
      },
      youtube: {
        dailyQuota: params.autocrawl.youtube.daily_quota,
        reserveQuota: params.autocrawl.youtube.reserve_quota,
      },
    },
  };
}

export async function loadConfig(
  options: LoadConfigOptions = {}
): Promise<CrawlerConfig> {
  if (options.loadDotenv) {
    loadDotenv({ path: path.resolve(process.cwd(), ".env") });
  }
  const env = options.env ?? process.env;
  const configPath = path.resolve(options.configPath ?? DEFAULT_CONFIG_PATH);

  let text: string;
  try {
    text = await readFile(configPath, "utf8");
  } catch (error) {
    throw new ConfigError(`Cannot read config ${configPath}: ${String(error)}`);
  }

  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${String(error)}`);
  }

  const params = parseParams(raw);
  const keywords = await readKeywords(params, path.dirname(configPath));
  return buildConfig(params, keywords, env, options.dataDir);
}

/**
 * Whether the video source can run. Without an API key it is dropped with a
 * warning, unless the run asked for it by name.
 */
export function checkVideoCredentials(config: CrawlerConfig, requestedByName: boolean): boolean {
  if (config.youtube.apiKey) {
    return true;
  }
  if (requestedByName) {
    throw new ConfigError("The youtube source is requested but YOUTUBE_API_KEY is not set");
  }
  logger.warn("Skipping the youtube source: YOUTUBE_API_KEY is not set");
  return false;
}
