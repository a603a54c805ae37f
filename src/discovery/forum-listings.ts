import { JSDOM } from "jsdom";

export interface ListingEntry {
  url: string;
  title: string | null;
  author: string | null;
  /** Raw date cell (title attribute first), read later as KST. */
  publishedAt: string | null;
}

export type ListingParser = (html: string, baseUrl: string) => ListingEntry[];

interface RowSelectors {
  links: string;
  accept?: (href: string) => boolean;
  author: string;
  date: string;
}

function textOf(element: Element | null): string | null {
  const text = element?.textContent?.replace(/\s+/g, " ").trim();
  return text ? text : null;
}

function dateOf(element: Element | null): string | null {
  if (!element) {
    return null;
  }
  return element.getAttribute("title")?.trim() || textOf(element);
}

function resolveHref(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function parseRows(html: string, baseUrl: string, selectors: RowSelectors): ListingEntry[] {
  const { document } = new JSDOM(html).window;
  const entries: ListingEntry[] = [];
  for (const anchor of document.querySelectorAll(selectors.links)) {
    const href = anchor.getAttribute("href") ?? "";
    if (selectors.accept && !selectors.accept(href)) {
      continue;
    }
    const url = resolveHref(href, baseUrl);
    if (!url) {
      continue;
    }
    const row = anchor.closest("tr");
    entries.push({
      url,
      title: textOf(anchor),
      author: textOf(row?.querySelector(selectors.author) ?? null),
      publishedAt: dateOf(row?.querySelector(selectors.date) ?? null),
    });
  }
  return entries;
}

const parseDcinside: ListingParser = (html, baseUrl) => {
  const rows = parseRows(html, baseUrl, {
    links: "td.gall_tit a[href]",
    accept: (href) => href.includes("/board/view/"),
    author: "td.gall_writer",
    date: "td.gall_date",
  });
  if (rows.length > 0) {
    return rows;
  }
  // Some gallery skins drop the table layout.
  return parseRows(html, baseUrl, {
    links: 'a[href*="/board/view/"]',
    author: "td.gall_writer",
    date: "td.gall_date",
  });
};

const parseBobaedream: ListingParser = (html, baseUrl) =>
  parseRows(html, baseUrl, {
    links: 'a[href*="/board/bbs_view?"], a[href*="/view?code="]',
    author: "td.author, td.writer, td.name",
    date: "td.date, td.regdate, td.time",
  });

const parseFmkorea: ListingParser = (html, baseUrl) =>
  parseRows(html, baseUrl, {
    links: "td.title a[href], h3.title a[href]",
    accept: (href) => /^(https?:\/\/[^/]*fmkorea\.com)?\/(index\.php\?.*document_srl=)?\d+/.test(href),
    author: "td.author, span.author",
    date: "td.time, span.regdate",
  });

const parseMlbpark: ListingParser = (html, baseUrl) =>
  parseRows(html, baseUrl, {
    links: 'a[href*="/mp/b.php"]',
    accept: (href) => href.includes("m=view") || href.includes("idx="),
    author: "td.nikcon, td.author, td.name",
    date: "td.date, td.time",
  });

/** First path segment of a board URL: `https://theqoo.net/hot?page=2` → `hot`. */
function boardSlug(boardUrl: string): string | null {
  const url = resolveHref(boardUrl, boardUrl);
  if (!url) {
    return null;
  }
  const segment = new URL(url).pathname.split("/").find((part) => part.length > 0);
  return segment ?? null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Threads are `/<board>/<number>`; the board comes from the listing URL. */
const parseTheqoo: ListingParser = (html, baseUrl) => {
  const slug = boardSlug(baseUrl);
  const thread = new RegExp(`^(https?://[^/]+)?/${slug ? escapeRegExp(slug) : "[\\w-]+"}/\\d+`);
  return parseRows(html, baseUrl, {
    links: "a[href]",
    accept: (href) => thread.test(href),
    author: "td.nik, td.author, td.name",
    date: "td.time, td.date",
  });
};

const parsePpomppu: ListingParser = (html, baseUrl) =>
  parseRows(html, baseUrl, {
    links: 'a[href*="/zboard/view.php?id="]',
    author: "td.name, td.author, td.writer",
    date: "td.date, td.regdate, td.time",
  });

/** Registered board listing parsers, keyed by forum source key. */
export const LISTING_PARSERS: Record<string, ListingParser> = {
  dcinside: parseDcinside,
  bobaedream: parseBobaedream,
  fmkorea: parseFmkorea,
  mlbpark: parseMlbpark,
  theqoo: parseTheqoo,
  ppomppu: parsePpomppu,
};
