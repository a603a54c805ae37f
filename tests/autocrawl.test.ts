import { mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { loadAutoState } from "../src/auto-state";
import { buildConfig, parseParams, type CrawlerConfig } from "../src/config";
import { GDELT_API_URL, YOUTUBE_API_BASE } from "../src/constants";
import { runCrawl, type SourceSelection } from "../src/crawl";
import { AutoCrawler } from "../src/scheduler";
import { fileExists } from "../src/utils";

const JUNE_15 = new Date("2024-06-15T00:00:00Z");
const JUNE_16 = new Date("2024-06-16T00:00:00Z");

const ARTICLE = `<html><head>
  <title>국민연금 개혁 논의</title>
  <meta property="article:published_time" content="2024-06-03T09:00:00+09:00">
  </head><body><article>
  <p>국민연금 개혁안을 두고 세대 간 부담을 어떻게 나눌지에 대한 논의가 계속되고 있다.</p>
  <p>보험료율을 올리는 방안과 소득대체율을 유지하는 방안이 함께 거론되며 전문가들은 기금 고갈 시점을 늦추려면 구조 개혁이 필요하다고 말한다.</p>
  </article></body></html>`;

const NEWS_ONLY: SourceSelection = { only: ["gdelt"], sites: null, noGdelt: false };
const VIDEO_ONLY: SourceSelection = { only: ["youtube"], sites: null, noGdelt: false };

function configIn(dir: string, keywords: string[]): CrawlerConfig {
  const params = parseParams({
    lang: ["ko"],
    time_window: { start_date: "2024-06-01", end_date: "2024-06-15" },
    limits: { min_request_interval_ms: 0, fetch_concurrency: 1 },
    retry: { max_attempts: 1, base_delay_ms: 0, max_delay_ms: 0, jitter_ms: 0 },
    autocrawl: {
      months_back: 1,
      monthly_target_per_source: 5,
      round: {
        max_gdelt_windows: 1,
        max_youtube_windows: 1,
        max_youtube_keywords: 3,
        max_forums_windows: 0,
      },
      youtube: { daily_quota: 1000, reserve_quota: 798 },
    },
  });
  return buildConfig(params, keywords, { YOUTUBE_API_KEY: "test-key" }, dir);
}

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    headers: { "content-type": "application/json" },
  });
}

function urlOf(input: string | URL | Request): string {
  return typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
}

/** One news article behind the article-search API; everything else is a 404. */
function stubNewsSite(): void {
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request) => {
      const url = urlOf(input);
      if (url.startsWith(GDELT_API_URL)) {
        return json({
          articles: [
            { url: "https://news.example/story", title: "국민연금", seendate: "20240603T000000Z" },
          ],
        });
      }
      if (url === "https://news.example/story") {
        return new Response(ARTICLE, {
          headers: { "content-type": "text/html; charset=utf-8" },
        });
      }
      return new Response("not found", { status: 404 });
    })
  );
}

/** Video search that finds nothing; records the searched keywords in order. */
function stubVideoSearch(searched: string[], status: (keyword: string) => number = () => 200): void {
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request) => {
      const url = new URL(urlOf(input));
      if (url.href.startsWith(`${YOUTUBE_API_BASE}/search`)) {
        const keyword = url.searchParams.get("q") ?? "";
        searched.push(keyword);
        const code = status(keyword);
        return code === 200
          ? json({ items: [] })
          : new Response("quota", { status: code });
      }
      return new Response("not found", { status: 404 });
    })
  );
}

async function jsonlLines(filePath: string): Promise<string[]> {
  return (await readFile(filePath, "utf8")).trim().split("\n");
}

async function withTempDir(body: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "autocrawl-"));
  try {
    await body(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("AutoCrawler.runRound", () => {
  test("stored documents are counted in their month and group", async () => {
    await withTempDir(async (dir) => {
      stubNewsSite();
      const crawler = new AutoCrawler(configIn(dir, ["국민연금"]), {
        selection: NEWS_ONLY,
        now: () => JUNE_15,
      });

      const result = await crawler.runRound(1);
      expect(result.plan.gdelt.map((entry) => entry.month)).toEqual(["2024-06"]);
      expect(result.stats.sources.gdelt?.stored).toBe(1);
      expect(await jsonlLines(path.join(dir, "gdelt.jsonl"))).toHaveLength(1);

      const state = await loadAutoState(dir);
      expect(state.counts).toEqual({ "2024-06": { gdelt: 1 } });
      expect(state.stored_by_source).toEqual({ gdelt: 1 });
      expect(state.youtube_kw_cursor).toBe(0);
      expect(state.last_updated).toBe("2024-06-15T00:00:00.000Z");

      const again = await crawler.runRound(2);
      expect(again.plan.gdelt.map((entry) => [entry.month, entry.deficit])).toEqual([
        ["2024-06", 4],
      ]);
      expect(again.stats.sources.gdelt?.skipped_indexed).toBe(1);
      expect(again.stats.sources.gdelt?.stored).toBe(0);
      expect((await loadAutoState(dir)).counts).toEqual({ "2024-06": { gdelt: 1 } });
      expect(await jsonlLines(path.join(dir, "gdelt.jsonl"))).toHaveLength(1);
    });
  });

  test("a round whose writes fail leaves the state file untouched", async () => {
    await withTempDir(async (dir) => {
      stubNewsSite();
      const statePath = path.join(dir, "_auto_state.json");
      const before = `${JSON.stringify({
        version: 1,
        counts: { "2024-05": { gdelt: 3 } },
        stored_by_source: { gdelt: 3 },
        quota: {},
        youtube_kw_cursor: 0,
        last_updated: "2024-06-01T00:00:00.000Z",
      })}\n`;
      await writeFile(statePath, before, "utf8");
      // A directory where the output file belongs makes the append fail.
      await mkdir(path.join(dir, "gdelt.jsonl"));

      const crawler = new AutoCrawler(configIn(dir, ["국민연금"]), {
        selection: NEWS_ONLY,
        now: () => JUNE_15,
      });
      await expect(crawler.runRound(1)).rejects.toThrow();
      expect(await readFile(statePath, "utf8")).toBe(before);
    });
  });

  test("deferred picks lead the next round and the cursor is saved", async () => {
    await withTempDir(async (dir) => {
      const searched: string[] = [];
      stubVideoSearch(searched);
      let clock = JUNE_15;
      const crawler = new AutoCrawler(configIn(dir, ["k1", "k2", "k3"]), {
        selection: VIDEO_ONLY,
        now: () => clock,
      });

      const first = await crawler.runRound(1);
      expect(first.plan.videoPicks.map((pick) => pick.keyword)).toEqual(["k1", "k2"]);
      expect(first.plan.deferredPicks.map((pick) => pick.keyword)).toEqual(["k3"]);
      expect(first.stats.quota_units_spent).toBe(200);
      expect(first.cursor).toBe(2);
      expect(searched).toEqual(["k1", "k2"]);

      const saved = await loadAutoState(dir);
      expect(saved.youtube_kw_cursor).toBe(2);
      expect(saved.quota).toEqual({ youtube: { date: "2024-06-15", units_used: 200 } });

      clock = JUNE_16;
      const second = await crawler.runRound(2);
      expect(second.plan.videoPicks.map((pick) => pick.keyword)).toEqual(["k3", "k1"]);
      expect(second.plan.deferredPicks.map((pick) => pick.keyword)).toEqual(["k2"]);
      expect(second.cursor).toBe(1);
      expect(searched).toEqual(["k1", "k2", "k3", "k1"]);

      const resaved = await loadAutoState(dir);
      expect(resaved.youtube_kw_cursor).toBe(1);
      expect(resaved.quota).toEqual({ youtube: { date: "2024-06-16", units_used: 200 } });
    });
  });

  test("a quota refusal keeps the cursor on the refused keyword", async () => {
    await withTempDir(async (dir) => {
      const searched: string[] = [];
      stubVideoSearch(searched, (keyword) => (keyword === "k1" ? 403 : 200));
      const crawler = new AutoCrawler(configIn(dir, ["k1", "k2", "k3"]), {
        selection: VIDEO_ONLY,
        now: () => JUNE_15,
      });

      const result = await crawler.runRound(1);
      expect(searched).toEqual(["k1"]);
      expect(result.cursor).toBe(0);

      const saved = await loadAutoState(dir);
      expect(saved.youtube_kw_cursor).toBe(0);
      expect(saved.quota).toEqual({ youtube: { date: "2024-06-15", units_used: 202 } });
    });
  });
});

describe("runCrawl", () => {
  test("a second run over the same window adds no records", async () => {
    await withTempDir(async (dir) => {
      stubNewsSite();
      const config = configIn(dir, ["국민연금"]);
      const options = { selection: NEWS_ONLY, maxFetch: null, now: () => JUNE_15 };

      const first = await runCrawl(config, options);
      expect(first.sources.gdelt?.stored).toBe(1);

      const second = await runCrawl(config, options);
      expect(second.sources.gdelt?.discovered).toBe(1);
      expect(second.sources.gdelt?.skipped_indexed).toBe(1);
      expect(second.sources.gdelt?.stored).toBe(0);

      expect(await jsonlLines(path.join(dir, "gdelt.jsonl"))).toHaveLength(1);
      expect((await loadAutoState(dir)).counts).toEqual({ "2024-06": { gdelt: 1 } });
      expect(await fileExists(path.join(dir, "youtube.jsonl"))).toBe(false);
    });
  });
});
