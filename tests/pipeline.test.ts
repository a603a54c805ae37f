import { mkdtemp, readFile, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { Extractor } from "../src/content";
import { Fetcher } from "../src/fetcher";
import { IndexStore } from "../src/index-store";
import { HttpClient } from "../src/network";
import { CrawlPipeline, emptySourceStats, makeRunId } from "../src/pipeline";
import { RetryPolicy } from "../src/retry";
import { RobotsCache } from "../src/robots";
import { Scorer } from "../src/scorer";
import { DomainThrottle } from "../src/throttle";
import type { Candidate, Discoverer } from "../src/types";

const NOW = new Date("2024-03-10T00:00:00Z");

const ARTICLE = `<html><head>
  <title>국민연금 개혁 논의</title>
  <meta property="article:published_time" content="2024-03-01T09:00:00+09:00">
  </head><body><article>
  <p>국민연금 개혁안을 두고 세대 간 부담을 어떻게 나눌지에 대한 논의가 계속되고 있다.</p>
  <p>보험료율을 올리는 방안과 소득대체율을 유지하는 방안이 함께 거론되며 전문가들은 기금 고갈 시점을 늦추려면 구조 개혁이 필요하다고 말한다.</p>
  </article></body></html>`;

function html(body: string): () => Response {
  return () => new Response(body, { headers: { "content-type": "text/html; charset=utf-8" } });
}

function stubRoutes(routes: Record<string, () => Response>): void {
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request) => {
      const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
      const route = routes[url];
      return route ? route() : new Response("not found", { status: 404 });
    })
  );
}

function candidate(url: string): Candidate {
  return { source: "gdelt", url, discoveryMeta: { type: "gdelt", keyword: "국민연금" } };
}

function discoverer(candidates: Candidate[]): Discoverer {
  return {
    name: "gdelt",
    discover: async () => candidates,
  };
}

async function pipelineIn(dir: string, maxFetch: number | null): Promise<CrawlPipeline> {
  const index = await IndexStore.open(dir);
  const http = new HttpClient({
    userAgent: "test-agent/1.0",
    timeoutMs: 1000,
    retry: new RetryPolicy({ maxAttempts: 1, baseDelayMs: 0, maxDelayMs: 0, jitterMs: 0 }),
    sleep: async () => undefined,
  });
  return new CrawlPipeline({
    fetcher: new Fetcher({
      http,
      robots: new RobotsCache({ userAgent: "test-agent/1.0", timeoutMs: 1000 }),
      throttle: new DomainThrottle({ perDomainConcurrency: 1, minIntervalMs: 0 }),
      index,
      now: () => NOW,
    }),
    extractor: new Extractor({ forumComments: { enabled: false, max: 0 } }),
    scorer: new Scorer({ minScore: 0.5, minCharacters: 200, minKeywordHits: 1 }, ["국민연금"], ["ko"]),
    index,
    output: { root: dir, unified: false },
    concurrency: 1,
    maxFetch,
    runId: makeRunId(NOW),
    now: () => NOW,
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("makeRunId", () => {
  test("formats UTC time", () => {
    expect(makeRunId(new Date("2024-03-10T01:02:03Z"))).toBe("20240310-010203");
  });
});

describe("CrawlPipeline", () => {
  test("each candidate ends in exactly one outcome", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "pipeline-"));
    try {
      stubRoutes({
        "https://news.example/story": html(ARTICLE),
        "https://news.example/short": html("<html><body><p>Just a short note.</p></body></html>"),
      });
      const pipeline = await pipelineIn(dir, null);
      const candidates = await pipeline.discover([
        {
          discoverer: discoverer([
            candidate("https://news.example/story"),
            candidate("https://news.example/story?utm_source=feed"),
            candidate("https://news.example/short"),
            candidate("https://news.example/missing"),
            candidate("https://news.example/brochure.pdf"),
          ]),
          window: { start: NOW, end: NOW },
          keywords: ["국민연금"],
          maxCandidates: 10,
        },
      ]);
      await pipeline.process(candidates);
      const stats = await pipeline.close();

      expect(stats.sources.gdelt).toEqual({
        ...emptySourceStats(),
        discovered: 5,
        attempted: 5,
        skipped_indexed: 1,
        fetched: 2,
        quality_rejected: 1,
        fetch_failed_permanent: 2,
        stored: 1,
      });
      expect(stats.run_id).toBe("20240310-000000");
      expect(stats.finished_at).toBe("2024-03-10T00:00:00.000Z");
      expect(stats.stopped_by_max_fetch).toBe(false);
      expect(pipeline.stored).toEqual([
        {
          source: "gdelt",
          publishedAt: "2024-03-01T00:00:00.000Z",
          hint: undefined,
          fetchedAt: "2024-03-10T00:00:00.000Z",
        },
      ]);

      const lines = (await readFile(path.join(dir, "gdelt.jsonl"), "utf8")).trim().split("\n");
      expect(lines).toHaveLength(1);
      const record = JSON.parse(lines[0] ?? "{}");
      expect(record.url).toBe("https://news.example/story");
      expect(record.lang).toBe("ko");
      expect(record.published_at).toBe("2024-03-01T00:00:00.000Z");
      expect(record.text).toContain("국민연금 개혁안을 두고");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("stops taking new items at the fetch budget", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "pipeline-"));
    try {
      stubRoutes({ "https://news.example/story": html(ARTICLE) });
      const pipeline = await pipelineIn(dir, 1);
      await pipeline.process([
        candidate("https://news.example/story"),
        candidate("https://news.example/other"),
        candidate("https://news.example/third"),
      ]);
      const stats = await pipeline.close();

      expect(stats.stopped_by_max_fetch).toBe(true);
      expect(stats.sources.gdelt?.attempted).toBe(1);
      expect(stats.sources.gdelt?.stored).toBe(1);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("a failing discoverer does not stop the others", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "pipeline-"));
    try {
      const pipeline = await pipelineIn(dir, null);
      const broken: Discoverer = {
        name: "youtube",
        discover: async () => {
          throw new Error("boom");
        },
      };
      const candidates = await pipeline.discover([
        { discoverer: broken, window: { start: NOW, end: NOW }, keywords: [], maxCandidates: 5 },
        {
          discoverer: discoverer([candidate("https://news.example/a")]),
          window: { start: NOW, end: NOW },
          keywords: [],
          maxCandidates: 5,
        },
      ]);
      expect(candidates.map((entry) => entry.url)).toEqual(["https://news.example/a"]);
      expect(pipeline.stats.sources.youtube).toBeUndefined();
      await pipeline.close();
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
