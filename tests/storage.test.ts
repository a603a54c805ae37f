import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import { buildDedupKey } from "../src/dedup";
import { IndexStore } from "../src/index-store";
import { compareByPublished, mergeJsonlFiles, outputFileName, Writer } from "../src/io";
import { toCrawlDocument } from "../src/pipeline";
import type { CrawlDocument, ExtractedDocument, QualityInfo } from "../src/types";
import { normalizeUrl, sha1Hex, urlFingerprint } from "../src/utils";

const QUALITY: QualityInfo = {
  score: 0.8,
  reasons: [],
  keyword_hits: 3,
  keyword_coverage: 1,
  length: 120,
  lang_confidence: 0.9,
};

const LONG_TEXT = `국민연금 개혁안 논의가 이어지고 있다. ${"보험료율과 소득대체율 조정에 대한 의견이 갈린다. ".repeat(4)}`;

function extracted(overrides: Partial<ExtractedDocument> = {}): ExtractedDocument {
  return {
    source: "dcinside",
    url: "https://gall.dcinside.com/board/view/?id=stock&no=100",
    title: "연금 개혁",
    text: LONG_TEXT,
    lang: "ko",
    langConfidence: 0.9,
    publishedAt: "2024-03-01T09:00:00.000Z",
    authors: ["writer"],
    discoveredVia: { type: "forum", site: "dcinside" },
    fetchedAt: "2024-03-10T00:00:00.000Z",
    ...overrides,
  };
}

function documentFor(overrides: Partial<ExtractedDocument> = {}): CrawlDocument {
  return toCrawlDocument(extracted(overrides), QUALITY, "20240310-000000");
}

describe("outputFileName", () => {
  test("maps sources to files", () => {
    expect(outputFileName("gdelt", false)).toBe("gdelt.jsonl");
    expect(outputFileName("youtube", false)).toBe("youtube.jsonl");
    expect(outputFileName("dcinside", false)).toBe("forum_dcinside.jsonl");
    expect(outputFileName("dcinside", true)).toBe("documents.jsonl");
  });
});

describe("Writer", () => {
  test("writes once and reports repeats as duplicates", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "writer-"));
    try {
      const index = await IndexStore.open(dir, { flushEvery: 50 });
      const writer = new Writer({ root: dir, unified: false, index });
      const document = documentFor();

      expect(await writer.store(document)).toBe("written");
      expect(await writer.store(document)).toBe("duplicate");
      const sameText = {
        ...document,
        id: "another-id",
        url: "https://gall.dcinside.com/board/view/?id=stock&no=101",
      };
      expect(await writer.store(sameText)).toBe("duplicate");
      await writer.close();

      const lines = (await readFile(path.join(dir, "forum_dcinside.jsonl"), "utf8"))
        .trim()
        .split("\n");
      expect(lines).toHaveLength(1);
      const stored = JSON.parse(lines[0] ?? "{}");
      const key = buildDedupKey({ text: LONG_TEXT });
      expect(stored.dup).toEqual({ key_sha1: sha1Hex(key ?? "") });
      expect(stored.id).toBe(document.id);
      expect(stored.crawl).toEqual({ run_id: "20240310-000000", fetched_at: "2024-03-10T00:00:00.000Z" });

      const indexFile = JSON.parse(await readFile(path.join(dir, "_index.json"), "utf8"));
      expect(indexFile.ids[document.id]).toBe(true);
      expect(indexFile.ids[urlFingerprint(normalizeUrl(document.url))]).toBe(true);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("rejects records that fail the schema", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "writer-"));
    try {
      const index = await IndexStore.open(dir);
      const writer = new Writer({ root: dir, unified: false, index });
      const document = { ...documentFor(), published_at: "last tuesday" };

      expect(await writer.store(document)).toBe("rejected");
      await writer.close();
      expect(index.has(document.id)).toBe(false);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("a second run over the same documents stores nothing", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "writer-"));
    try {
      const documents = [
        documentFor(),
        documentFor({
          url: "https://gall.dcinside.com/board/view/?id=stock&no=200",
          text: `${LONG_TEXT} 추가 의견.`,
        }),
      ];

      const firstIndex = await IndexStore.open(dir);
      const first = new Writer({ root: dir, unified: true, index: firstIndex });
      for (const document of documents) {
        expect(await first.store(document)).toBe("written");
      }
      await first.close();

      const secondIndex = await IndexStore.open(dir);
      expect(secondIndex.hasUrl("https://gall.dcinside.com/board/view/?no=200&id=stock#c")).toBe(true);
      const second = new Writer({ root: dir, unified: true, index: secondIndex });
      for (const document of documents) {
        expect(await second.store(document)).toBe("duplicate");
      }
      await second.close();

      const body = await readFile(path.join(dir, "documents.jsonl"), "utf8");
      expect(body.trim().split("\n")).toHaveLength(2);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("IndexStore", () => {
  test("recovers ids from outputs written after the last flush", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "index-"));
    try {
      await writeFile(
        path.join(dir, "gdelt.jsonl"),
        [
          JSON.stringify({ id: "doc-1", url: "https://news.example/a?utm_source=x" }),
          "{broken",
          JSON.stringify({ id: "doc-2", url: "https://news.example/b" }),
        ].join("\n"),
        "utf8"
      );

      const index = await IndexStore.open(dir);
      expect(index.has("doc-1")).toBe(true);
      expect(index.has("doc-2")).toBe(true);
      expect(index.hasUrl("https://news.example/a")).toBe(true);
      expect(index.hasUrl("https://news.example/c")).toBe(false);

      const persisted = JSON.parse(await readFile(path.join(dir, "_index.json"), "utf8"));
      expect(Object.keys(persisted.ids)).toHaveLength(4);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe("merge", () => {
  test("orders by published_at then id, existing records first on equal ids", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "merge-"));
    try {
      const existing = path.join(dir, "existing.jsonl");
      const batch = path.join(dir, "batch.jsonl");
      const output = path.join(dir, "out.jsonl");
      await writeFile(
        existing,
        [
          JSON.stringify({ id: "b", published_at: "2024-01-02T00:00:00Z", from: "existing" }),
          JSON.stringify({ id: "a", published_at: "2024-01-02T00:00:00Z", from: "existing" }),
        ].join("\n"),
        "utf8"
      );
      await writeFile(
        batch,
        [
          JSON.stringify({ id: "c", published_at: null }),
          JSON.stringify({ id: "a", published_at: "2023-12-31T00:00:00Z", from: "batch" }),
          JSON.stringify({ id: "d", published_at: "2024-01-01T00:00:00Z" }),
          "not json",
        ].join("\n"),
        "utf8"
      );

      const stats = await mergeJsonlFiles(existing, batch, output);
      expect(stats).toEqual({ existing: 2, batch: 3, written: 4, duplicates: 1, parse_errors: 1 });

      const records = (await readFile(output, "utf8"))
        .trim()
        .split("\n")
        .map((line) => JSON.parse(line));
      expect(records.map((record) => record.id)).toEqual(["c", "d", "a", "b"]);
      expect(records[2].from).toBe("existing");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("compareByPublished keeps full ties in place", () => {
    const first = { id: "x", published_at: "2024-01-01T00:00:00Z", n: 1 };
    const second = { id: "x", published_at: "2024-01-01T00:00:00Z", n: 2 };
    expect(compareByPublished(first, second)).toBe(0);
    expect([second, first].sort(compareByPublished).map((record) => record.n)).toEqual([2, 1]);
  });
});
