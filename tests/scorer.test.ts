import { describe, expect, test } from "vitest";
import { countKeywordHits, Scorer } from "../src/scorer";
import type { ExtractedDocument } from "../src/types";

const scorer = new Scorer(
  { minScore: 0.5, minCharacters: 200, minKeywordHits: 1 },
  ["국민연금", "연금개혁"],
  ["ko"]
);

function document(overrides: Partial<ExtractedDocument>): ExtractedDocument {
  return {
    source: "gdelt",
    url: "https://news.example/a",
    title: null,
    text: "",
    lang: "ko",
    langConfidence: 1,
    publishedAt: null,
    authors: [],
    discoveredVia: {},
    fetchedAt: "2024-03-10T00:00:00.000Z",
    ...overrides,
  };
}

describe("countKeywordHits", () => {
  test("counts each keyword once, ignoring case", () => {
    expect(countKeywordHits("Pension PENSION reform", ["pension", "reform", "tax"])).toBe(2);
  });
});

describe("Scorer", () => {
  test("admits a long on-language text with a keyword", () => {
    const result = scorer.score(document({ text: `국민연금 ${"가".repeat(245)}` }));
    expect(result).toEqual({
      admitted: true,
      quality: {
        score: 0.9,
        reasons: ["length=250", "lang=ko@1.00", "keyword_hits=1/2"],
        keyword_hits: 1,
        keyword_coverage: 0.5,
        length: 250,
        lang_confidence: 1,
      },
    });
  });

  test("keywords in the title count", () => {
    const result = scorer.score(
      document({ title: "연금개혁 논의", text: `국민연금 ${"가".repeat(245)}` })
    );
    expect(result.quality.keyword_hits).toBe(2);
    expect(result.quality.keyword_coverage).toBe(1);
    expect(result.quality.score).toBe(1);
  });

  test("short off-language text scores by length alone", () => {
    const result = scorer.score(
      document({ text: "a".repeat(100), lang: "en", langConfidence: 0.8 })
    );
    expect(result.admitted).toBe(false);
    expect(result.quality.score).toBe(0.15);
    expect(result.quality.reasons).toEqual([
      "short_text=100",
      "lang_mismatch=en",
      "keyword_miss=0/2",
    ]);
  });

  test("a keyword miss rejects even a passing score", () => {
    const result = scorer.score(document({ text: "나".repeat(300) }));
    expect(result.quality.score).toBe(0.6);
    expect(result.admitted).toBe(false);
  });
});
