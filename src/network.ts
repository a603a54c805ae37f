import type { ZodType, ZodTypeDef } from "zod";
import { BLOCKED_EXTENSIONS_REGEX } from "./constants";
import {
  ERROR_CODES,
  ExtractError,
  PermanentFetchError,
  TransientFetchError,
  describeError,
  formatZodIssues,
} from "./errors";
import { logger } from "./logger";
import type { RetryPolicy } from "./retry";
import type { ReleaseFn } from "./throttle";
import { canonicalText, sleep } from "./utils";

const HTML_ACCEPT_HEADER = "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8";
const META_CHARSET_REGEX = /<meta[^>]+charset\s*=\s*["']?\s*([\w-]+)/i;
const CONTENT_TYPE_CHARSET_REGEX = /charset\s*=\s*["']?([\w-]+)/i;
const SNIFF_BYTES = 2048;

export function isBlockedDownloadUrl(targetUrl: URL): boolean {
  return BLOCKED_EXTENSIONS_REGEX.test(targetUrl.pathname);
}

async function fetchResponseWithTimeout(
  targetUrl: string,
  timeoutMs: number,
  headers: Record<string, string>
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(targetUrl, {
      headers,
      signal: controller.signal,
      redirect: "follow",
    });
  } finally {
    clearTimeout(timer);
  }
}

export async function fetchWithTimeout(
  targetUrl: string,
  timeoutMs: number,
  userAgent: string
): Promise<string> {
  let response: Response;
  try {
    response = await fetchResponseWithTimeout(targetUrl, timeoutMs, {
      "User-Agent": userAgent,
    });
  } catch (error) {
    throw toTransportError(error, targetUrl);
  }
  classifyResponse(response, targetUrl);
  return await response.text();
}

/**
 * Retry-After is either delta-seconds or an HTTP date.
 */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now()
): number | undefined {
  if (!header) {
    return undefined;
  }
  const trimmed = header.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number.parseFloat(trimmed) * 1000);
  }
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) {
    return undefined;
  }
  return Math.max(0, at - now);
}

export function classifyResponse(response: Response, url: string): void {
  const { status } = response;
  if (response.ok) {
    return;
  }
  if (status === 429) {
    throw new TransientFetchError(ERROR_CODES.HTTP_429, `HTTP 429 from ${url}`, {
      status,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }
  if (status === 408) {
    throw new TransientFetchError(ERROR_CODES.TIMEOUT, `HTTP 408 from ${url}`, {
      status,
    });
  }
  if (status >= 500) {
    throw new TransientFetchError(
      ERROR_CODES.HTTP_5XX,
      `HTTP ${status} from ${url}`,
      {
        status,
        retryAfterMs:
          status === 503
            ? parseRetryAfter(response.headers.get("retry-after"))
            : undefined,
      }
    );
  }
  throw new PermanentFetchError(
    ERROR_CODES.HTTP_4XX,
    `HTTP ${status} from ${url}`,
    status
  );
}

function toTransportError(error: unknown, url: string): TransientFetchError {
  if (error instanceof Error && error.name === "AbortError") {
    return new TransientFetchError(ERROR_CODES.TIMEOUT, `Timed out fetching ${url}`, {
      cause: error,
    });
  }
  return new TransientFetchError(
    ERROR_CODES.NETWORK,
    `Network error fetching ${url}: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}

function tryDecode(bytes: Uint8Array, label: string): string | null {
  try {
    return new TextDecoder(label).decode(bytes);
  } catch {
    return null;
  }
}

export interface DecodedBody {
  text: string;
  encoding: string;
}

/**
 * Charset from Content-Type, then a sniffed <meta charset>, then UTF-8.
 * UTF-8 output with replacement characters is decoded again as EUC-KR.
 */
export function decodeBody(
  bytes: Uint8Array,
  contentType: string | null
): DecodedBody {
  const declared =
    contentType?.match(CONTENT_TYPE_CHARSET_REGEX)?.[1] ??
    new TextDecoder("latin1")
      .decode(bytes.subarray(0, SNIFF_BYTES))
      .match(META_CHARSET_REGEX)?.[1];

  if (declared && declared.toLowerCase() !== "utf-8" && declared.toLowerCase() !== "utf8") {
    const decoded = tryDecode(bytes, declared);
    if (decoded !== null) {
      return { text: canonicalText(decoded), encoding: declared.toLowerCase() };
    }
  }

  const utf8 = new TextDecoder("utf-8").decode(bytes);
  if (utf8.includes("\uFFFD")) {
    const fallback = tryDecode(bytes, "euc-kr");
    if (fallback !== null && !fallback.includes("\uFFFD")) {
      return { text: canonicalText(fallback), encoding: "euc-kr" };
    }
  }
  return { text: canonicalText(utf8), encoding: "utf-8" };
}

export interface HttpClientOptions {
  userAgent: string;
  timeoutMs: number;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  /** Awaited before every attempt; the release runs once that attempt settles. */
  gate?: () => Promise<ReleaseFn>;
  /** Called before every attempt, retries included. A throw ends the request. */
  onAttempt?: (attempt: number) => void;
}

export interface HttpResponse {
  url: string;
  finalUrl: string;
  status: number;
  contentType: string | null;
  body: Uint8Array;
  attempts: number;
}

/**
 * fetch() with a timeout, status classification and the retry policy.
 */
export class HttpClient {
  private readonly options: HttpClientOptions;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: HttpClientOptions) {
    this.options = options;
    this.sleep = options.sleep ?? sleep;
  }

  get userAgent(): string {
    return this.options.userAgent;
  }

  private async attempt(
    url: string,
    headers: Record<string, string>
  ): Promise<Omit<HttpResponse, "attempts">> {
    let response: Response;
    try {
      response = await fetchResponseWithTimeout(url, this.options.timeoutMs, {
        "User-Agent": this.options.userAgent,
        ...headers,
      });
    } catch (error) {
      throw toTransportError(error, url);
    }

    classifyResponse(response, url);

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw toTransportError(error, url);
    }

    return {
      url,
      finalUrl: response.url || url,
      status: response.status,
      contentType: response.headers.get("content-type"),
      body,
    };
  }

  /**
   * The backoff sleep happens outside the gate, so a retry queues for its
   * host like any other request.
   */
  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const { retry } = this.options;
    const headers = options.headers ?? { Accept: HTML_ACCEPT_HEADER };
    let attempt = 0;

    while (true) {
      attempt += 1;
      options.onAttempt?.(attempt);
      const release = options.gate ? await options.gate() : null;
      let failure: unknown;
      try {
        logger.logFetch(url, attempt, retry.maxAttempts);
        const result = await this.attempt(url, headers);
        return { ...result, attempts: attempt };
      } catch (error) {
        logger.logFetchError(url, attempt, describeError(error));
        if (!retry.shouldRetry(error, attempt)) {
          throw error;
        }
        failure = error;
      } finally {
        release?.();
      }
      await this.sleep(retry.delayMs(attempt, failure));
    }
  }

  async getText(url: string, options?: RequestOptions): Promise<HttpResponse & DecodedBody> {
    const response = await this.get(url, options);
    return { ...response, ...decodeBody(response.body, response.contentType) };
  }

  async getJson<T>(
    url: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: Omit<RequestOptions, "headers"> = {}
  ): Promise<{ data: T; attempts: number }> {
    const response = await this.get(url, { ...options, headers: { Accept: "application/json" } });
    const raw = new TextDecoder("utf-8").decode(response.body);
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new ExtractError(`Response from ${url} is not JSON`, { cause: error });
    }
    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new ExtractError(
        `Unexpected response shape from ${url}: ${formatZodIssues(result.error).join("; ")}`
      );
    }
    return { data: result.data, attempts: response.attempts };
  }
}
