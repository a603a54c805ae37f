import type { QualityConfig } from "./config";
import type { ExtractedDocument, QualityResult } from "./types";

const LENGTH_WEIGHT = 0.3;
const LANGUAGE_WEIGHT = 0.3;
const KEYWORD_BASE = 0.2;
const KEYWORD_COVERAGE_WEIGHT = 0.2;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/**
 * Distinct keywords found in the text, case-insensitively.
 */
export function countKeywordHits(text: string, keywords: string[]): number {
  const haystack = text.toLowerCase();
  let hits = 0;
  for (const keyword of keywords) {
    if (haystack.includes(keyword.toLowerCase())) {
      hits += 1;
    }
  }
  return hits;
}

export class Scorer {
  private readonly config: QualityConfig;
  private readonly keywords: string[];
  private readonly languages: Set<string>;

  constructor(config: QualityConfig, keywords: string[], languages: string[]) {
    this.config = config;
    this.keywords = keywords;
    this.languages = new Set(languages);
  }

  score(document: ExtractedDocument): QualityResult {
    const reasons: string[] = [];
    let score = 0;

    const length = Array.from(document.text).length;
    if (length >= this.config.minCharacters) {
      score += LENGTH_WEIGHT;
      reasons.push(`length=${length}`);
    } else {
      score += (LENGTH_WEIGHT * length) / this.config.minCharacters;
      reasons.push(`short_text=${length}`);
    }

    const confidence = document.langConfidence;
    if (this.languages.has(document.lang)) {
      score += LANGUAGE_WEIGHT * confidence;
      reasons.push(`lang=${document.lang}@${confidence.toFixed(2)}`);
    } else {
      reasons.push(`lang_mismatch=${document.lang}`);
    }

    const total = this.keywords.length;
    const hits = countKeywordHits(`${document.title ?? ""}\n${document.text}`, this.keywords);
    const coverage = total > 0 ? hits / total : 0;
    if (total > 0 && hits >= this.config.minKeywordHits) {
      score += KEYWORD_BASE + KEYWORD_COVERAGE_WEIGHT * coverage;
      reasons.push(`keyword_hits=${hits}/${total}`);
    } else {
      reasons.push(`keyword_miss=${hits}/${total}`);
    }

    const rounded = round3(score);
    return {
      admitted: rounded >= this.config.minScore && hits >= this.config.minKeywordHits,
      quality: {
        score: rounded,
        reasons,
        keyword_hits: hits,
        keyword_coverage: round3(coverage),
        length,
        lang_confidence: confidence,
      },
    };
  }
}
