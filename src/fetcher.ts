import { ERROR_CODES, PermanentFetchError } from "./errors";
import type { KnownIdLookup } from "./index-store";
import { logger } from "./logger";
import { isBlockedDownloadUrl, type HttpClient } from "./network";
import type { RobotsCache } from "./robots";
import type { DomainThrottle } from "./throttle";
import type { Candidate, HtmlPayload, RawPayload, VideoPayload } from "./types";
import type { YouTubeClient } from "./youtube";

export type FetchOutcome =
  | { kind: "skipped"; reason: "indexed" }
  | { kind: "fetched"; payload: RawPayload };

export interface FetcherOptions {
  http: HttpClient;
  robots: RobotsCache;
  throttle: DomainThrottle;
  index: KnownIdLookup;
  /** Sources that may ignore robots.txt (per-site `obey_robots: false`). */
  robotsExempt?: ReadonlySet<string>;
  youtube?: YouTubeClient | null;
  now?: () => Date;
}

/**
 * Candidate → raw payload. Order of checks: index, URL shape, asset type,
 * robots, then the throttled request with the retry policy.
 */
export class Fetcher {
  private readonly options: FetcherOptions;
  private readonly now: () => Date;

  constructor(options: FetcherOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(candidate: Candidate): Promise<FetchOutcome> {
    if (this.options.index.hasUrl(candidate.url)) {
      logger.logSkipped(`${candidate.url} already indexed`);
      return { kind: "skipped", reason: "indexed" };
    }

    if (candidate.video) {
      return { kind: "fetched", payload: await this.fetchVideo(candidate) };
    }
    return { kind: "fetched", payload: await this.fetchHtml(candidate) };
  }

  private parseTarget(candidate: Candidate): URL {
    let target: URL;
    try {
      target = new URL(candidate.url);
    } catch {
      throw new PermanentFetchError(
        ERROR_CODES.MALFORMED_URL,
        `Malformed URL: ${candidate.url}`
      );
    }
    if (target.protocol !== "http:" && target.protocol !== "https:") {
      throw new PermanentFetchError(
        ERROR_CODES.MALFORMED_URL,
        `Unsupported scheme: ${candidate.url}`
      );
    }
    return target;
  }

  private async fetchHtml(candidate: Candidate): Promise<HtmlPayload> {
    const { http, robots, throttle, robotsExempt } = this.options;
    const target = this.parseTarget(candidate);

    if (isBlockedDownloadUrl(target)) {
      logger.logBlocked(candidate.url, "asset extension");
      throw new PermanentFetchError(
        ERROR_CODES.BLOCKED_ASSET,
        `Not a document: ${candidate.url}`
      );
    }

    if (!robotsExempt?.has(candidate.source) && !(await robots.isAllowed(target))) {
      logger.logBlocked(candidate.url, "robots.txt");
      throw new PermanentFetchError(
        ERROR_CODES.ROBOTS_DISALLOWED,
        `Disallowed by robots.txt: ${candidate.url}`
      );
    }

    const crawlDelay = await robots.crawlDelayMs(target);
    const response = await http.getText(target.toString(), {
      gate: throttle.gate(target.host, crawlDelay ?? 0),
    });

    return {
      kind: "html",
      candidate,
      finalUrl: response.finalUrl,
      status: response.status,
      html: response.text,
      encoding: response.encoding,
      fetchedAt: this.now().toISOString(),
      attempts: response.attempts,
    };
  }

  /**
   * Details came with discovery; comments and captions are fetched here.
   */
  private async fetchVideo(candidate: Candidate): Promise<VideoPayload> {
    const { video } = candidate;
    const client = this.options.youtube;
    if (!video) {
      throw new PermanentFetchError(
        ERROR_CODES.MALFORMED_URL,
        `Video candidate without details: ${candidate.url}`
      );
    }

    let comments: string[] = [];
    let attempts = 1;
    let captions: VideoPayload["captions"] = [];
    if (client) {
      const thread = await client.comments(video.videoId);
      comments = thread.comments;
      attempts = Math.max(1, thread.attempts);
      captions = await client.captions(video.videoId);
    }

    return {
      kind: "video",
      candidate,
      video,
      comments,
      captions,
      fetchedAt: this.now().toISOString(),
      attempts,
    };
  }
}
