import { VIDEO_PICK_COST_UNITS } from "../constants";
import { ExtractError, QuotaExceededError, describeError, isFetchError } from "../errors";
import { logger } from "../logger";
import type { Candidate, DiscoverLimits, Discoverer, TimeWindow } from "../types";
import { videoUrl, type YouTubeClient } from "../youtube";

function pickKey(window: TimeWindow, keyword: string): string {
  return `${window.start.toISOString()}|${keyword}`;
}

/**
 * Keyword search over a publish-date window. Each keyword costs one search
 * plus one details call; a keyword is only tried while the round budget
 * still covers both.
 */
export class VideoDiscoverer implements Discoverer {
  readonly name = "youtube";
  private readonly client: YouTubeClient;
  private readonly maxResultsPerKeyword: number;
  private readonly executed = new Set<string>();

  constructor(client: YouTubeClient, maxResultsPerKeyword: number) {
    this.client = client;
    this.maxResultsPerKeyword = maxResultsPerKeyword;
  }

  /**
   * True once the keyword's search got an answer in this window. Keywords
   * left over by the candidate cap or a quota refusal stay unexecuted.
   */
  hasExecuted(window: TimeWindow, keyword: string): boolean {
    return this.executed.has(pickKey(window, keyword));
  }

  async discover(
    window: TimeWindow,
    keywords: string[],
    limits: DiscoverLimits
  ): Promise<Candidate[]> {
    const budget = this.client.quota;
    const seen = new Set<string>();
    const candidates: Candidate[] = [];

    for (const keyword of keywords) {
      if (candidates.length >= limits.maxCandidates) {
        break;
      }
      if (!budget.canAfford(VIDEO_PICK_COST_UNITS)) {
        logger.info(
          `youtube: round budget spent (${budget.remaining} units left); "${keyword}" deferred`
        );
        break;
      }

      let found: Candidate[];
      try {
        const ids = await this.client.search(keyword, window, this.maxResultsPerKeyword);
        const details = await this.client.videos(ids.filter((id) => !seen.has(id)));
        found = details.map((video) => ({
          source: this.name,
          url: videoUrl(video.videoId),
          videoId: video.videoId,
          title: video.title,
          publishedHint: video.publishedAt ?? undefined,
          video,
          discoveryMeta: {
            type: "youtube",
            keyword,
            window: { start: window.start.toISOString(), end: window.end.toISOString() },
          },
        }));
      } catch (error) {
        if (error instanceof QuotaExceededError) {
          logger.warn(`youtube: ${error.message}; no more searches today`);
          break;
        }
        if (!isFetchError(error) && !(error instanceof ExtractError)) {
          throw error;
        }
        // Counted as run so a keyword that always fails cannot pin the cursor.
        this.executed.add(pickKey(window, keyword));
        logger.warn(`youtube: search "${keyword}" skipped: ${describeError(error)}`);
        continue;
      }
      this.executed.add(pickKey(window, keyword));

      for (const candidate of found) {
        if (candidate.videoId) {
          seen.add(candidate.videoId);
        }
        candidates.push(candidate);
        if (candidates.length >= limits.maxCandidates) {
          break;
        }
      }
    }

    logger.info(
      `youtube: discovered ${candidates.length} videos (${budget.spent}/${budget.granted} units)`
    );
    return candidates;
  }
}
