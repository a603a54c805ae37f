import { Readability } from "@mozilla/readability";
import { JSDOM } from "jsdom";
import {
  CLUTTER_SELECTORS,
  FORUM_BODY_SELECTORS,
  FORUM_COMMENT_SELECTORS,
  KST_OFFSET_MINUTES,
  LINE_SPLIT_REGEX,
} from "./constants";
import { findDateInText, parseDateValue } from "./dates";
import { ExtractError } from "./errors";
import { detectLanguage } from "./lang";
import type {
  ExtractedDocument,
  HtmlPayload,
  RawPayload,
  VideoPayload,
} from "./types";
import { canonicalText, isRecord } from "./utils";

const META_DATE_SELECTORS: Array<[string, string]> = [
  ['meta[property="article:published_time"]', "content"],
  ['meta[name="article:published_time"]', "content"],
  ['meta[property="og:published_time"]', "content"],
  ['meta[itemprop="datePublished"]', "content"],
  ['[itemprop="datePublished"][datetime]', "datetime"],
  ['meta[name="pubdate"]', "content"],
  ['meta[name="date"]', "content"],
];

export interface ExtractorOptions {
  forumComments: { enabled: boolean; max: number };
}

/** Trim lines and collapse runs of blank lines. */
export function cleanText(raw: string): string {
  const lines: string[] = [];
  for (const line of raw.split(LINE_SPLIT_REGEX)) {
    const trimmed = line.replace(/[ \t\u00A0]+/g, " ").trim();
    if (trimmed.length === 0 && (lines.length === 0 || lines.at(-1) === "")) {
      continue;
    }
    lines.push(trimmed);
  }
  while (lines.at(-1) === "") {
    lines.pop();
  }
  return canonicalText(lines.join("\n"));
}

export function stripClutter(document: Document): void {
  for (const selector of CLUTTER_SELECTORS) {
    for (const element of document.querySelectorAll(selector)) {
      element.remove();
    }
  }
}

function metaContent(document: Document, selector: string): string | null {
  const value = document.querySelector(selector)?.getAttribute("content")?.trim();
  return value ? value : null;
}

export function readMetaTitle(document: Document): string | null {
  return (
    metaContent(document, 'meta[property="og:title"]') ??
    metaContent(document, 'meta[name="title"]') ??
    (document.title.trim() || null)
  );
}

function jsonLdDates(value: unknown, out: string[]): void {
  if (Array.isArray(value)) {
    for (const entry of value) {
      jsonLdDates(entry, out);
    }
    return;
  }
  if (!isRecord(value)) {
    return;
  }
  if (typeof value.datePublished === "string") {
    out.push(value.datePublished);
  }
  if ("@graph" in value) {
    jsonLdDates(value["@graph"], out);
  }
}

/**
 * Structured publish date: meta tags, then JSON-LD, then <time datetime>.
 */
export function readMetaDate(document: Document, offsetMinutes: number): string | null {
  for (const [selector, attribute] of META_DATE_SELECTORS) {
    const raw = document.querySelector(selector)?.getAttribute(attribute);
    const parsed = parseDateValue(raw, { offsetMinutes });
    if (parsed) {
      return parsed;
    }
  }

  for (const script of document.querySelectorAll('script[type="application/ld+json"]')) {
    const dates: string[] = [];
    try {
      jsonLdDates(JSON.parse(script.textContent ?? ""), dates);
    } catch {
      continue;
    }
    for (const raw of dates) {
      const parsed = parseDateValue(raw, { offsetMinutes });
      if (parsed) {
        return parsed;
      }
    }
  }

  const time = document.querySelector("time[datetime]")?.getAttribute("datetime");
  return parseDateValue(time, { offsetMinutes });
}

function readAuthors(document: Document, byline: string | null | undefined): string[] {
  const byMeta =
    metaContent(document, 'meta[name="author"]') ??
    metaContent(document, 'meta[property="article:author"]');
  const author = byline?.trim() || byMeta;
  return author ? [author] : [];
}

function collectBySelectors(
  document: Document,
  selectors: string[] | undefined,
  limit: number
): string[] {
  for (const selector of selectors ?? []) {
    const texts = [...document.querySelectorAll(selector)]
      .map((element) => cleanText(element.textContent ?? ""))
      .filter((text) => text.length > 0);
    if (texts.length > 0) {
      return texts.slice(0, limit);
    }
  }
  return [];
}

function isForumSource(source: string): boolean {
  return source in FORUM_BODY_SELECTORS;
}

/**
 * Raw payload → document fields. Text is in canonical form before it leaves
 * here, so ids and dedup keys hash the same bytes on every run.
 */
export class Extractor {
  private readonly options: ExtractorOptions;

  constructor(options: ExtractorOptions) {
    this.options = options;
  }

  extract(payload: RawPayload): ExtractedDocument {
    return payload.kind === "video"
      ? this.extractVideo(payload)
      : this.extractHtml(payload);
  }

  private extractHtml(payload: HtmlPayload): ExtractedDocument {
    const { candidate } = payload;
    const forum = isForumSource(candidate.source);
    const offsetMinutes = forum ? KST_OFFSET_MINUTES : 0;

    let dom: JSDOM;
    let readerDom: JSDOM;
    try {
      dom = new JSDOM(payload.html, { url: payload.finalUrl });
      readerDom = new JSDOM(payload.html, { url: payload.finalUrl });
    } catch (error) {
      throw new ExtractError(`Unparseable HTML from ${payload.finalUrl}`, { cause: error });
    }
    const { document } = dom.window;

    const metaTitle = readMetaTitle(document);
    const metaDate = readMetaDate(document, offsetMinutes);
    const comments =
      forum && this.options.forumComments.enabled
        ? collectBySelectors(
            document,
            FORUM_COMMENT_SELECTORS[candidate.source],
            this.options.forumComments.max
          )
        : [];

    const article = new Readability(readerDom.window.document).parse();
    let text = cleanText(article?.textContent ?? "");

    if (text.length === 0 && forum) {
      text = collectBySelectors(document, FORUM_BODY_SELECTORS[candidate.source], 1)[0] ?? "";
    }
    if (text.length === 0) {
      stripClutter(document);
      text = cleanText(document.body?.textContent ?? "");
    }
    if (comments.length > 0) {
      text = `${text}\n\n${comments.join("\n")}`.trim();
    }

    const title = article?.title?.trim() || metaTitle || candidate.title?.trim() || null;
    if (text.length === 0 && !title) {
      throw new ExtractError(`No extractable content at ${payload.finalUrl}`);
    }

    const publishedAt =
      metaDate ??
      parseDateValue(candidate.publishedHint, { offsetMinutes }) ??
      findDateInText(text, { offsetMinutes });

    const listingAuthor = candidate.discoveryMeta.author;
    const authors = readAuthors(document, article?.byline);
    if (authors.length === 0 && typeof listingAuthor === "string" && listingAuthor.trim()) {
      authors.push(listingAuthor.trim());
    }

    const guess = detectLanguage(text || title || "");
    return {
      source: candidate.source,
      url: candidate.url,
      title: title ? canonicalText(title) : null,
      text,
      lang: guess.lang,
      langConfidence: guess.confidence,
      publishedAt,
      authors,
      discoveredVia: candidate.discoveryMeta,
      fetchedAt: payload.fetchedAt,
    };
  }

  private extractVideo(payload: VideoPayload): ExtractedDocument {
    const { video, candidate } = payload;
    const parts = [
      video.title,
      video.description,
      ...payload.captions.map((caption) => caption.text),
      ...payload.comments,
    ]
      .map((part) => cleanText(part))
      .filter((part) => part.length > 0);

    if (parts.length === 0) {
      throw new ExtractError(`Video ${video.videoId} has no text`);
    }
    const text = parts.join("\n\n");
    const guess = detectLanguage(text);

    return {
      source: candidate.source,
      url: candidate.url,
      title: video.title ? canonicalText(video.title.trim()) : null,
      text,
      lang: guess.lang,
      langConfidence: guess.confidence,
      publishedAt:
        parseDateValue(video.publishedAt) ?? parseDateValue(candidate.publishedHint),
      authors: video.channelTitle ? [video.channelTitle] : [],
      discoveredVia: candidate.discoveryMeta,
      fetchedAt: payload.fetchedAt,
      video: { details: video, captions: payload.captions },
    };
  }
}
