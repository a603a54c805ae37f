import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import {
  buildDedupKey,
  dedupJsonlFile,
  dedupLines,
  normalizeKeyText,
  normalizeKeyUrl,
} from "../src/dedup";

describe("dedup keys", () => {
  test("whitespace and case collapse to one key", () => {
    expect(buildDedupKey({ text: "Hello   World" })).toBe("hello world");
    expect(buildDedupKey({ text: "hello world" })).toBe("hello world");
  });

  test("short texts are qualified by their URL", () => {
    const first = buildDedupKey({ text: "abcdefghij", url: "https://a.example/1" });
    const second = buildDedupKey({ text: "abcdefghij", url: "https://a.example/2" });
    expect(first).toBe("abcdefghij|url|https://a.example/1");
    expect(second).toBe("abcdefghij|url|https://a.example/2");
  });

  test("long texts ignore the URL", () => {
    const text = "가".repeat(80);
    expect(buildDedupKey({ text, url: "https://a.example/1" })).toBe(text);
    expect(buildDedupKey({ text, url: "https://b.example/2" })).toBe(text);
  });

  test("the short-text cutoff counts UTF-8 bytes", () => {
    const thirty = "가".repeat(30);
    expect(buildDedupKey({ text: thirty, url: "https://a.example/1" })).toBe(thirty);
    expect(buildDedupKey({ text: thirty, url: "https://b.example/2" })).toBe(thirty);

    const twentySix = "가".repeat(26);
    expect(buildDedupKey({ text: twentySix, url: "https://a.example/1" })).toBe(
      `${twentySix}|url|https://a.example/1`
    );
  });

  test("falls back to title, URL and id in that order", () => {
    expect(buildDedupKey({ title: "  국민연금  개혁 " })).toBe("국민연금 개혁");
    expect(buildDedupKey({ title: "Notice", url: "https://x.example/a/" })).toBe(
      "notice|url|https://x.example/a"
    );
    expect(buildDedupKey({ url: "HTTPS://X.example/A//" })).toBe("url|https://x.example/a");
    expect(buildDedupKey({ id: 7 })).toBe("id|7");
    expect(buildDedupKey({ text: "   ", title: "" })).toBeNull();
  });

  test("normalizers", () => {
    expect(normalizeKeyText("  A\tB\n\nC ")).toBe("a b c");
    expect(normalizeKeyUrl(" https://Example.com/Path/ ")).toBe("https://example.com/path");
  });
});

describe("dedupLines", () => {
  test("keeps the first of two records with the same title", async () => {
    const written: string[] = [];
    const stats = await dedupLines(
      ['{"title":"국민연금 개혁","id":"a"}', '{"title":"국민연금 개혁","id":"b"}'],
      (line) => {
        written.push(line);
      }
    );
    expect(written).toEqual(['{"title":"국민연금 개혁","id":"a"}']);
    expect(stats.written).toBe(1);
    expect(stats.duplicates).toBe(1);
  });

  test("counts blank and unparseable lines and keeps keyless records apart", async () => {
    const written: string[] = [];
    const stats = await dedupLines(["", "not json", "[1]", '{"n":1}', '{"n":1}'], (line) => {
      written.push(line);
    });
    expect(stats).toEqual({
      total: 5,
      parsed: 2,
      written: 2,
      duplicates: 0,
      parse_errors: 2,
      empty_lines: 1,
    });
    expect(written).toEqual(['{"n":1}', '{"n":1}']);
  });
});

describe("dedupJsonlFile", () => {
  test("writes kept lines unchanged", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "dedup-"));
    try {
      const input = path.join(dir, "in.jsonl");
      const output = path.join(dir, "nested", "out.jsonl");
      await writeFile(
        input,
        ['{"text":"Hello   World"}', '{"text":"hello world"}', '{"text":"other"}', ""].join("\n"),
        "utf8"
      );

      const stats = await dedupJsonlFile(input, output);
      expect(stats.written).toBe(2);
      expect(stats.duplicates).toBe(1);
      expect(await readFile(output, "utf8")).toBe(
        '{"text":"Hello   World"}\n{"text":"other"}\n'
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  test("rejects a missing input", async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), "dedup-"));
    try {
      await expect(
        dedupJsonlFile(path.join(dir, "missing.jsonl"), path.join(dir, "out.jsonl"))
      ).rejects.toThrow("Input file not found");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
