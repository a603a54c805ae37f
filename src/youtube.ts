import { JSDOM } from "jsdom";
import { z } from "zod";
import type { YouTubeConfig } from "./config";
import {
  DEFAULT_COMMENTS_PAGES,
  VIDEO_COMMENTS_PAGE_COST_UNITS,
  VIDEO_DETAILS_COST_UNITS,
  VIDEO_SEARCH_COST_UNITS,
  YOUTUBE_API_BASE,
  YOUTUBE_TIMEDTEXT_URL,
} from "./constants";
import {
  ConfigError,
  describeError,
  isFetchError,
  PermanentFetchError,
  QuotaExceededError,
} from "./errors";
import { logger } from "./logger";
import type { HttpClient } from "./network";
import type { QuotaBudget } from "./quota";
import type { RobotsCache } from "./robots";
import type { CaptionTrack, TimeWindow, VideoDetails } from "./types";
import { canonicalText } from "./utils";

const SEARCH_PAGE_MAX = 50;
const COMMENTS_PAGE_SIZE = 100;
const HTML_TAG_REGEX = /<[^>]+>/g;

const searchResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.object({ videoId: z.string().optional() }).passthrough(),
      })
    )
    .default([]),
});

const countString = z.union([z.string(), z.number()]).optional();

const videosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z
          .object({
            title: z.string().default(""),
            description: z.string().default(""),
            channelId: z.string().default(""),
            channelTitle: z.string().default(""),
            publishedAt: z.string().optional(),
          })
          .default({}),
        statistics: z
          .object({
            viewCount: countString,
            likeCount: countString,
            commentCount: countString,
          })
          .default({}),
      })
    )
    .default([]),
});

const commentSnippetSchema = z.object({
  textDisplay: z.string().optional(),
  textOriginal: z.string().optional(),
});

const commentThreadsSchema = z.object({
  nextPageToken: z.string().optional(),
  items: z
    .array(
      z.object({
        snippet: z.object({
          topLevelComment: z.object({ snippet: commentSnippetSchema }),
        }),
        replies: z
          .object({
            comments: z.array(z.object({ snippet: commentSnippetSchema })).default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

type CommentSnippet = z.infer<typeof commentSnippetSchema>;

function toCount(value: string | number | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const parsed = typeof value === "number" ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : null;
}

export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}

export function commentText(
  snippet: CommentSnippet,
  textFormat: YouTubeConfig["textFormat"]
): string {
  if (textFormat === "html") {
    return (snippet.textDisplay ?? "").replace(HTML_TAG_REGEX, "").trim();
  }
  return (snippet.textOriginal ?? snippet.textDisplay ?? "").trim();
}

/**
 * timedtext XML (<transcript><text>…</text></transcript>) → plain lines.
 */
export function parseTimedText(xml: string): string {
  if (xml.trim().length === 0) {
    return "";
  }
  const dom = new JSDOM(xml);
  return [...dom.window.document.querySelectorAll("text")]
    .map((node) => (node.textContent ?? "").replace(/\s+/g, " ").trim())
    .filter((line) => line.length > 0)
    .join("\n");
}

/**
 * Video platform Data API client. Every quota-bearing call draws its cost
 * from the round budget before the request goes out.
 */
export class YouTubeClient {
  private readonly http: HttpClient;
  private readonly config: YouTubeConfig;
  private readonly budget: QuotaBudget;
  private readonly robots: RobotsCache | null;

  constructor(
    http: HttpClient,
    config: YouTubeConfig,
    budget: QuotaBudget,
    robots: RobotsCache | null = null
  ) {
    this.http = http;
    this.config = config;
    this.budget = budget;
    this.robots = robots;
  }

  get quota(): QuotaBudget {
    return this.budget;
  }

  private endpoint(resource: string, params: Record<string, string>): string {
    if (!this.config.apiKey) {
      throw new ConfigError("YOUTUBE_API_KEY is not set");
    }
    const url = new URL(`${YOUTUBE_API_BASE}/${resource}`);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    url.searchParams.set("key", this.config.apiKey);
    return url.toString();
  }

  /** Each attempt is a billed API call, so retries are charged too. */
  private charged(units: number): { onAttempt: () => void } {
    return { onAttempt: () => this.budget.consume(units) };
  }

  /** The API answers 403 once the project's daily quota is gone. */
  private rethrowQuota(error: unknown, units: number): never {
    if (error instanceof PermanentFetchError && error.status === 403) {
      this.budget.markExhausted();
      throw new QuotaExceededError(this.budget.source, units, 0);
    }
    throw error;
  }

  async search(keyword: string, window: TimeWindow, maxResults: number): Promise<string[]> {
    const url = this.endpoint("search", {
      part: "snippet",
      type: "video",
      order: "date",
      q: keyword,
      maxResults: String(Math.min(SEARCH_PAGE_MAX, maxResults)),
      publishedAfter: window.start.toISOString(),
      publishedBefore: window.end.toISOString(),
    });
    try {
      const { data } = await this.http.getJson(
        url,
        searchResponseSchema,
        this.charged(VIDEO_SEARCH_COST_UNITS)
      );
      const ids = data.items
        .map((item) => item.id.videoId)
        .filter((id): id is string => typeof id === "string" && id.length > 0);
      return [...new Set(ids)];
    } catch (error) {
      return this.rethrowQuota(error, VIDEO_SEARCH_COST_UNITS);
    }
  }

  async videos(ids: string[]): Promise<VideoDetails[]> {
    if (ids.length === 0) {
      return [];
    }
    const url = this.endpoint("videos", {
      part: "snippet,contentDetails,statistics",
      id: ids.join(","),
    });
    try {
      const { data } = await this.http.getJson(
        url,
        videosResponseSchema,
        this.charged(VIDEO_DETAILS_COST_UNITS)
      );
      return data.items.map((item) => ({
        videoId: item.id,
        channelId: item.snippet.channelId,
        channelTitle: item.snippet.channelTitle,
        title: item.snippet.title,
        description: item.snippet.description,
        publishedAt: item.snippet.publishedAt ?? null,
        stats: {
          views: toCount(item.statistics.viewCount),
          likes: toCount(item.statistics.likeCount),
          comments: toCount(item.statistics.commentCount),
        },
      }));
    } catch (error) {
      return this.rethrowQuota(error, VIDEO_DETAILS_COST_UNITS);
    }
  }

  /**
   * Top-level comments (and replies when enabled), one page per unit while
   * the round budget has units left. Disabled comments end the walk quietly.
   */
  async comments(videoId: string): Promise<{ comments: string[]; attempts: number }> {
    const { includeReplies, commentsOrder, textFormat } = this.config;
    const commentsPages = this.config.commentsPages ?? DEFAULT_COMMENTS_PAGES;
    const comments: string[] = [];
    let pageToken: string | undefined;
    let attempts = 0;

    for (let page = 0; page < commentsPages; page += 1) {
      if (!this.budget.canAfford(VIDEO_COMMENTS_PAGE_COST_UNITS)) {
        break;
      }
      const params: Record<string, string> = {
        part: includeReplies ? "snippet,replies" : "snippet",
        videoId,
        maxResults: String(COMMENTS_PAGE_SIZE),
        order: commentsOrder,
        textFormat,
      };
      if (pageToken) {
        params.pageToken = pageToken;
      }

      let data: z.infer<typeof commentThreadsSchema>;
      try {
        const response = await this.http.getJson(
          this.endpoint("commentThreads", params),
          commentThreadsSchema,
          this.charged(VIDEO_COMMENTS_PAGE_COST_UNITS)
        );
        data = response.data;
        attempts += response.attempts;
      } catch (error) {
        if (error instanceof QuotaExceededError) {
          logger.debug(`Comment walk for ${videoId} stopped: ${describeError(error)}`);
          break;
        }
        if (error instanceof PermanentFetchError) {
          logger.debug(`Comments unavailable for ${videoId}: ${describeError(error)}`);
          break;
        }
        throw error;
      }

      for (const thread of data.items) {
        const top = commentText(thread.snippet.topLevelComment.snippet, textFormat);
        if (top) {
          comments.push(top);
        }
        if (includeReplies) {
          for (const reply of thread.replies?.comments ?? []) {
            const text = commentText(reply.snippet, textFormat);
            if (text) {
              comments.push(text);
            }
          }
        }
      }

      pageToken = data.nextPageToken;
      if (!pageToken) {
        break;
      }
    }
    return { comments, attempts };
  }

  /**
   * Public timedtext tracks for the configured languages. Best effort:
   * a missing or blocked track yields nothing.
   */
  async captions(videoId: string): Promise<CaptionTrack[]> {
    const tracks: CaptionTrack[] = [];
    for (const lang of this.config.captionLangs) {
      const url = new URL(YOUTUBE_TIMEDTEXT_URL);
      url.searchParams.set("lang", lang);
      url.searchParams.set("v", videoId);

      if (this.robots && !(await this.robots.isAllowed(url))) {
        logger.logBlocked(url.toString(), "robots.txt");
        continue;
      }
      try {
        const response = await this.http.getText(url.toString(), {
          headers: { Accept: "text/xml,application/xml;q=0.9,*/*;q=0.5" },
        });
        const text = canonicalText(parseTimedText(response.text));
        if (text.length > 0) {
          tracks.push({ lang, text });
        }
      } catch (error) {
        if (!isFetchError(error)) {
          throw error;
        }
        logger.debug(`No ${lang} captions for ${videoId}: ${describeError(error)}`);
      }
    }
    return tracks;
  }
}
