import { francAll } from "franc";
import { LANGUAGE_CODE_MAP } from "./constants";

const DETECT_SAMPLE_CHARS = 4000;
const MIN_DETECT_LENGTH = 10;
const CANDIDATE_LANGUAGES = Object.keys(LANGUAGE_CODE_MAP);

export interface LanguageGuess {
  /** ISO 639-1 code, or "und". */
  lang: string;
  confidence: number;
}

export function detectLanguage(text: string): LanguageGuess {
  const sample = text.slice(0, DETECT_SAMPLE_CHARS);
  const ranked = francAll(sample, {
    minLength: MIN_DETECT_LENGTH,
    only: CANDIDATE_LANGUAGES,
  });
  const [top, runnerUp] = ranked;
  if (!top || top[0] === "und") {
    return { lang: "und", confidence: 0 };
  }
  const lang = LANGUAGE_CODE_MAP[top[0]] ?? top[0];
  const confidence = runnerUp ? 1 - runnerUp[1] : 1;
  return { lang, confidence: Math.round(Math.max(0, Math.min(1, confidence)) * 1000) / 1000 };
}
