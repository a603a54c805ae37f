import { TransientFetchError } from "./errors";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 15_000,
  jitterMs: 250,
};

/**
 * Exponential backoff with additive random jitter. Only transient fetch
 * errors are retried; everything else surfaces on the first attempt.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitterMs: number;
  private readonly random: () => number;

  constructor(
    options: Partial<RetryPolicyOptions> = {},
    random: () => number = Math.random
  ) {
    const merged = { ...DEFAULT_RETRY_POLICY, ...options };
    this.maxAttempts = Math.max(1, Math.floor(merged.maxAttempts));
    this.baseDelayMs = Math.max(0, merged.baseDelayMs);
    this.maxDelayMs = Math.max(this.baseDelayMs, merged.maxDelayMs);
    this.jitterMs = Math.max(0, merged.jitterMs);
    this.random = random;
  }

  shouldRetry(error: unknown, attempt: number): boolean {
    return attempt < this.maxAttempts && error instanceof TransientFetchError;
  }

  /**
   * Wait before attempt `attempt + 1`, where `attempt` counts from 1.
   * A server-supplied Retry-After replaces the computed backoff.
   */
  delayMs(attempt: number, error?: unknown): number {
    if (error instanceof TransientFetchError && error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.maxDelayMs);
    }
    const backoff = Math.min(
      this.baseDelayMs * 2 ** Math.max(0, attempt - 1),
      this.maxDelayMs
    );
    return Math.round(backoff + this.random() * this.jitterMs);
  }
}
