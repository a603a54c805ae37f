import type { Extractor } from "./content";
import { ExtractError, classifyError, describeError } from "./errors";
import type { Fetcher } from "./fetcher";
import type { IndexStore } from "./index-store";
import { Writer } from "./io";
import { logger, type ProgressOutcome } from "./logger";
import type { Scorer } from "./scorer";
import type {
  Candidate,
  CrawlDocument,
  Discoverer,
  ExtractedDocument,
  QualityInfo,
  RawPayload,
  RunStats,
  SourceKey,
  SourceStats,
  TimeWindow,
} from "./types";
import { documentId, tryNormalizeUrl } from "./utils";

export interface DiscoveryTarget {
  discoverer: Discoverer;
  window: TimeWindow;
  keywords: string[];
  maxCandidates: number;
}

/** What the scheduler needs to count a stored document toward its month. */
export interface StoredEntry {
  source: SourceKey;
  publishedAt: string | null;
  hint?: string;
  fetchedAt: string;
}

export interface PipelineOptions {
  fetcher: Fetcher;
  extractor: Extractor;
  scorer: Scorer;
  index: IndexStore;
  output: { root: string; unified: boolean };
  concurrency: number;
  /** Fetches allowed in this run; null for no cap. */
  maxFetch: number | null;
  runId: string;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** `YYYYMMDD-HHMMSS` in UTC. */
export function makeRunId(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

export function emptySourceStats(): SourceStats {
  return {
    discovered: 0,
    attempted: 0,
    skipped_indexed: 0,
    fetched: 0,
    retried_ok: 0,
    fetch_failed_transient: 0,
    fetch_failed_permanent: 0,
    extract_failed: 0,
    quality_rejected: 0,
    duplicates: 0,
    rejected: 0,
    stored: 0,
  };
}

export function toCrawlDocument(
  document: ExtractedDocument,
  quality: QualityInfo,
  runId: string
): CrawlDocument {
  const urlNorm = tryNormalizeUrl(document.url) ?? document.url;
  const record: CrawlDocument = {
    id: documentId(urlNorm, document.text),
    source: document.source,
    url: document.url,
    snapshot_url: null,
    title: document.title,
    text: document.text,
    lang: document.lang,
    published_at: document.publishedAt,
    authors: document.authors,
    discovered_via: document.discoveredVia,
    quality,
    dup: {},
    crawl: { run_id: runId, fetched_at: document.fetchedAt },
  };
  if (document.video) {
    const { details, captions } = document.video;
    record.video_id = details.videoId;
    record.channel_id = details.channelId;
    record.channel_title = details.channelTitle;
    record.captions = captions;
    record.stats = details.stats;
  }
  return record;
}

/**
 * Discover → Fetch → Extract → Score → Dedupe → Store for one run or round.
 * Per-item failures end up in the stats, never in a thrown error.
 */
export class CrawlPipeline {
  readonly stats: RunStats;
  readonly stored: StoredEntry[] = [];
  private readonly options: PipelineOptions;
  private readonly writer: Writer;
  private readonly now: () => Date;
  private fetchReserved = 0;

  constructor(options: PipelineOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
    this.stats = {
      run_id: options.runId,
      started_at: this.now().toISOString(),
      finished_at: null,
      sources: {},
      timings_ms: { discovery: 0, fetch: 0, store: 0 },
      quota_units_spent: 0,
      stopped_by_max_fetch: false,
    };
    this.writer = new Writer({
      root: options.output.root,
      unified: options.output.unified,
      index: options.index,
    });
  }

  statsFor(source: SourceKey): SourceStats {
    const existing = this.stats.sources[source];
    if (existing) {
      return existing;
    }
    const created = emptySourceStats();
    this.stats.sources[source] = created;
    return created;
  }

  async discover(targets: DiscoveryTarget[]): Promise<Candidate[]> {
    const started = Date.now();
    const candidates: Candidate[] = [];
    for (const target of targets) {
      const { discoverer } = target;
      try {
        const found = await discoverer.discover(target.window, target.keywords, {
          maxCandidates: target.maxCandidates,
        });
        this.statsFor(discoverer.name);
        for (const candidate of found) {
          this.statsFor(candidate.source).discovered += 1;
          candidates.push(candidate);
        }
      } catch (error) {
        logger.error(`${discoverer.name}: discovery failed: ${describeError(error)}`);
      }
    }
    this.stats.timings_ms.discovery += Date.now() - started;
    return candidates;
  }

  /**
   * Worker pool over the candidates. The fetch budget is checked before an
   * item starts, never in the middle of one.
   */
  async process(candidates: Candidate[], label = "Fetch"): Promise<void> {
    const started = Date.now();
    const queue = [...candidates];

    logger.startProgress(queue.length, label);

    const worker = async (): Promise<void> => {
      while (queue.length > 0) {
        const { maxFetch } = this.options;
        if (maxFetch !== null && this.fetchReserved >= maxFetch) {
          if (!this.stats.stopped_by_max_fetch) {
            logger.info(`Fetch budget of ${maxFetch} reached; leaving ${queue.length} candidates`);
          }
          this.stats.stopped_by_max_fetch = true;
          return;
        }
        const candidate = queue.shift();
        if (!candidate) {
          return;
        }
        logger.advanceProgress(candidate.url, await this.processOne(candidate));
      }
    };

    const workers: Promise<void>[] = [];
    const workerCount = Math.min(Math.max(1, this.options.concurrency), queue.length);
    for (let i = 0; i < workerCount; i += 1) {
      workers.push(worker());
    }
    const settled = await Promise.allSettled(workers);
    logger.endProgress();
    this.stats.timings_ms.fetch += Date.now() - started;

    // Only the writer throws out of a worker (the output file became unwritable).
    const failure = settled.find(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );
    if (failure) {
      throw failure.reason;
    }
  }

  private async processOne(candidate: Candidate): Promise<ProgressOutcome> {
    const { fetcher, extractor, scorer, runId } = this.options;
    const stats = this.statsFor(candidate.source);
    stats.attempted += 1;
    this.fetchReserved += 1;

    let payload: RawPayload;
    try {
      const outcome = await fetcher.fetch(candidate);
      if (outcome.kind === "skipped") {
        this.fetchReserved -= 1;
        stats.skipped_indexed += 1;
        return "dropped";
      }
      payload = outcome.payload;
    } catch (error) {
      const classified = classifyError(error);
      if (classified.category === "transient") {
        stats.fetch_failed_transient += 1;
        logger.logItemFailure("fetch", candidate.url, describeError(error));
      } else {
        stats.fetch_failed_permanent += 1;
        logger.debug(`fetch failed for ${candidate.url}: ${describeError(error)}`);
      }
      return "failed";
    }

    stats.fetched += 1;
    if (payload.attempts > 1) {
      stats.retried_ok += 1;
    }

    let document: ExtractedDocument;
    try {
      document = extractor.extract(payload);
    } catch (error) {
      stats.extract_failed += 1;
      if (error instanceof ExtractError) {
        logger.debug(`extract failed for ${candidate.url}: ${describeError(error)}`);
      } else {
        logger.logItemFailure("extract", candidate.url, describeError(error));
      }
      return "failed";
    }

    const { admitted, quality } = scorer.score(document);
    if (!admitted) {
      stats.quality_rejected += 1;
      logger.debug(
        `Quality rejected ${candidate.url}: ${quality.score} (${quality.reasons.join(", ")})`
      );
      return "dropped";
    }

    const record = toCrawlDocument(document, quality, runId);
    const storeStarted = Date.now();
    const outcome = await this.writer.store(record);
    this.stats.timings_ms.store += Date.now() - storeStarted;

    if (outcome === "written") {
      stats.stored += 1;
      this.stored.push({
        source: record.source,
        publishedAt: record.published_at,
        hint: candidate.publishedHint,
        fetchedAt: record.crawl.fetched_at,
      });
      return "stored";
    }
    if (outcome === "duplicate") {
      stats.duplicates += 1;
    } else {
      stats.rejected += 1;
    }
    return "dropped";
  }

  /** Wait for pending writes, flush the index and stamp the finish time. */
  async close(): Promise<RunStats> {
    await this.writer.close();
    this.stats.finished_at = this.now().toISOString();
    return this.stats;
  }
}
