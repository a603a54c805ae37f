import type { SCHEDULING_GROUPS, SOURCE_STAT_KEYS } from "./constants";

export type SourceKey = string;

export type SchedulingGroup = (typeof SCHEDULING_GROUPS)[number];

export interface RobotsPolicy {
  isAllowed: (pathname: string) => boolean;
  crawlDelayMs?: number;
  source: string;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export interface VideoStats {
  views: number | null;
  likes: number | null;
  comments: number | null;
}

export interface CaptionTrack {
  lang: string;
  text: string;
}

export interface VideoDetails {
  videoId: string;
  channelId: string;
  channelTitle: string;
  title: string;
  description: string;
  publishedAt: string | null;
  stats: VideoStats;
}

export interface Candidate {
  source: SourceKey;
  url: string;
  videoId?: string;
  title?: string;
  publishedHint?: string;
  discoveryMeta: Record<string, unknown>;
  video?: VideoDetails;
}

export interface HtmlPayload {
  kind: "html";
  candidate: Candidate;
  finalUrl: string;
  status: number;
  html: string;
  encoding: string;
  fetchedAt: string;
  attempts: number;
}

export interface VideoPayload {
  kind: "video";
  candidate: Candidate;
  video: VideoDetails;
  comments: string[];
  captions: CaptionTrack[];
  fetchedAt: string;
  attempts: number;
}

export type RawPayload = HtmlPayload | VideoPayload;

export interface ExtractedDocument {
  source: SourceKey;
  url: string;
  title: string | null;
  text: string;
  lang: string;
  langConfidence: number;
  publishedAt: string | null;
  authors: string[];
  discoveredVia: Record<string, unknown>;
  fetchedAt: string;
  video?: {
    details: VideoDetails;
    captions: CaptionTrack[];
  };
}

export interface QualityInfo {
  score: number;
  reasons: string[];
  keyword_hits: number;
  keyword_coverage: number;
  length: number;
  lang_confidence: number;
}

export interface QualityResult {
  admitted: boolean;
  quality: QualityInfo;
}

/** One JSONL record. Field names are the on-disk schema. */
export interface CrawlDocument {
  id: string;
  source: SourceKey;
  url: string;
  snapshot_url: string | null;
  title: string | null;
  text: string;
  lang: string;
  published_at: string | null;
  authors: string[];
  discovered_via: Record<string, unknown>;
  quality: QualityInfo;
  dup: Record<string, string>;
  crawl: { run_id: string; fetched_at: string };
  video_id?: string;
  channel_id?: string;
  channel_title?: string;
  captions?: CaptionTrack[];
  stats?: VideoStats;
}

export type StoreOutcome = "written" | "duplicate" | "rejected";

export interface DiscoverLimits {
  maxCandidates: number;
}

export interface Discoverer {
  readonly name: string;
  discover(
    window: TimeWindow,
    keywords: string[],
    limits: DiscoverLimits
  ): Promise<Candidate[]>;
}

export type SourceStats = Record<(typeof SOURCE_STAT_KEYS)[number], number>;

export interface RunStats {
  run_id: string;
  started_at: string;
  finished_at: string | null;
  sources: Record<SourceKey, SourceStats>;
  timings_ms: { discovery: number; fetch: number; store: number };
  quota_units_spent: number;
  stopped_by_max_fetch: boolean;
}
