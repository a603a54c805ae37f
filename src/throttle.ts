import { sleep } from "./utils";

export interface ThrottleOptions {
  /** Requests in flight per host. */
  perDomainConcurrency: number;
  /** Minimum gap between request starts on one host. */
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface DomainSlot {
  active: number;
  waiters: Array<() => void>;
  nextStartAt: number;
  spacingChain: Promise<void>;
}

export type ReleaseFn = () => void;

/**
 * Per-host politeness gate: a concurrency ceiling plus start-to-start
 * spacing of max(configured interval, robots crawl-delay).
 */
export class DomainThrottle {
  private readonly options: Required<ThrottleOptions>;
  private readonly slots = new Map<string, DomainSlot>();

  constructor(options: ThrottleOptions) {
    this.options = {
      now: Date.now,
      sleep,
      ...options,
      perDomainConcurrency: Math.max(1, options.perDomainConcurrency),
    };
  }

  private slotFor(host: string): DomainSlot {
    const existing = this.slots.get(host);
    if (existing) {
      return existing;
    }
    const created: DomainSlot = {
      active: 0,
      waiters: [],
      nextStartAt: 0,
      spacingChain: Promise.resolve(),
    };
    this.slots.set(host, created);
    return created;
  }

  async acquire(host: string, crawlDelayMs = 0): Promise<ReleaseFn> {
    const slot = this.slotFor(host);

    if (slot.active >= this.options.perDomainConcurrency) {
      // Released slots are handed over without touching `active`.
      await new Promise<void>((resolve) => {
        slot.waiters.push(resolve);
      });
    } else {
      slot.active += 1;
    }

    const interval = Math.max(this.options.minIntervalMs, crawlDelayMs);
    const turn = slot.spacingChain.then(async () => {
      const waitMs = slot.nextStartAt - this.options.now();
      if (waitMs > 0) {
        await this.options.sleep(waitMs);
      }
      slot.nextStartAt = this.options.now() + interval;
    });
    slot.spacingChain = turn;
    await turn;

    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = slot.waiters.shift();
      if (next) {
        next();
        return;
      }
      slot.active -= 1;
    };
  }

  /** Per-attempt acquisition for `HttpClient` requests to this host. */
  gate(host: string, crawlDelayMs = 0): () => Promise<ReleaseFn> {
    return () => this.acquire(host, crawlDelayMs);
  }
}
