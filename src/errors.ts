import { ZodError } from "zod";

export const ERROR_CODES = {
  TIMEOUT: "TIMEOUT",
  HTTP_5XX: "HTTP_5XX",
  HTTP_429: "HTTP_429",
  NETWORK: "NETWORK",
  ROBOTS_DISALLOWED: "ROBOTS_DISALLOWED",
  HTTP_4XX: "HTTP_4XX",
  MALFORMED_URL: "MALFORMED_URL",
  BLOCKED_ASSET: "BLOCKED_ASSET",
  EXTRACT_FAILED: "EXTRACT_FAILED",
  QUOTA_EXCEEDED: "QUOTA_EXCEEDED",
  CONFIG_INVALID: "CONFIG_INVALID",
  UNEXPECTED: "UNEXPECTED",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type ErrorCategory =
  | "transient"
  | "permanent"
  | "extract"
  | "quota"
  | "config"
  | "internal";

abstract class CrawlError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransientFetchError extends CrawlError {
  readonly category = "transient";
  readonly isRetryable = true;
  readonly status?: number;
  /** Server-requested wait from Retry-After, if any. */
  readonly retryAfterMs?: number;

  constructor(
    code: ErrorCode,
    message: string,
    details: { status?: number; retryAfterMs?: number; cause?: unknown } = {}
  ) {
    super(code, message, { cause: details.cause });
    this.status = details.status;
    this.retryAfterMs = details.retryAfterMs;
  }
}

export class PermanentFetchError extends CrawlError {
  readonly category = "permanent";
  readonly isRetryable = false;
  readonly status?: number;

  constructor(code: ErrorCode, message: string, status?: number) {
    super(code, message);
    this.status = status;
  }
}

export class ExtractError extends CrawlError {
  readonly category = "extract";
  readonly isRetryable = false;

  constructor(message: string, options?: ErrorOptions) {
    super(ERROR_CODES.EXTRACT_FAILED, message, options);
  }
}

export class QuotaExceededError extends CrawlError {
  readonly category = "quota";
  readonly isRetryable = false;
  readonly source: string;
  readonly requested: number;
  readonly available: number;

  constructor(source: string, requested: number, available: number) {
    super(
      ERROR_CODES.QUOTA_EXCEEDED,
      `Quota exhausted for ${source}: need ${requested} units, ${available} left`
    );
    this.source = source;
    this.requested = requested;
    this.available = available;
  }
}

export class ConfigError extends CrawlError {
  readonly category = "config";
  readonly isRetryable = false;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(ERROR_CODES.CONFIG_INVALID, message);
    this.issues = issues;
  }
}

export type FetchError = TransientFetchError | PermanentFetchError;

export interface ClassifiedError {
  category: ErrorCategory;
  code: ErrorCode;
  message: string;
  isRetryable: boolean;
}

export function isFetchError(error: unknown): error is FetchError {
  return (
    error instanceof TransientFetchError || error instanceof PermanentFetchError
  );
}

/**
 * Map anything thrown during a crawl onto a stats category.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof CrawlError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: error.isRetryable,
    };
  }

  if (error instanceof ZodError) {
    return {
      category: "config",
      code: ERROR_CODES.CONFIG_INVALID,
      message: formatZodIssues(error).join("; "),
      isRetryable: false,
    };
  }

  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return {
        category: "transient",
        code: ERROR_CODES.TIMEOUT,
        message: error.message,
        isRetryable: true,
      };
    }
    if (error.name === "TypeError" && /fetch failed|network/i.test(error.message)) {
      return {
        category: "transient",
        code: ERROR_CODES.NETWORK,
        message: error.message,
        isRetryable: true,
      };
    }
    return {
      category: "internal",
      code: ERROR_CODES.UNEXPECTED,
      message: error.message,
      isRetryable: false,
    };
  }

  return {
    category: "internal",
    code: ERROR_CODES.UNEXPECTED,
    message: String(error),
    isRetryable: false,
  };
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

export function describeError(error: unknown): string {
  const classified = classifyError(error);
  return `${classified.code}: ${classified.message}`;
}
