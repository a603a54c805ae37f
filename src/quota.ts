import { QuotaExceededError } from "./errors";
import { utcDateKey } from "./utils";

export interface QuotaEntry {
  /** UTC day the usage belongs to; null until the first charge. */
  date: string | null;
  units_used: number;
}

export interface QuotaLimits {
  dailyQuota: number;
  reserveQuota: number;
}

/**
 * Per-source daily API budget. Usage resets when the UTC day changes; the
 * reserve is never handed out.
 */
export class QuotaLedger {
  private readonly entries = new Map<string, QuotaEntry>();
  private readonly limits: Record<string, QuotaLimits>;

  constructor(
    limits: Record<string, QuotaLimits>,
    snapshot: Record<string, QuotaEntry> = {}
  ) {
    this.limits = limits;
    for (const [source, entry] of Object.entries(snapshot)) {
      this.entries.set(source, { ...entry });
    }
  }

  private entryFor(source: string, now: Date): QuotaEntry {
    const today = utcDateKey(now);
    const existing = this.entries.get(source);
    if (existing && existing.date === today) {
      return existing;
    }
    const fresh: QuotaEntry = { date: today, units_used: 0 };
    this.entries.set(source, fresh);
    return fresh;
  }

  limitsFor(source: string): QuotaLimits {
    return this.limits[source] ?? { dailyQuota: 0, reserveQuota: 0 };
  }

  usedToday(source: string, now: Date): number {
    const entry = this.entries.get(source);
    return entry && entry.date === utcDateKey(now) ? entry.units_used : 0;
  }

  available(source: string, now: Date): number {
    const { dailyQuota, reserveQuota } = this.limitsFor(source);
    return Math.max(0, dailyQuota - reserveQuota - this.usedToday(source, now));
  }

  charge(source: string, units: number, now: Date): void {
    if (units <= 0) {
      return;
    }
    const available = this.available(source, now);
    if (units > available) {
      throw new QuotaExceededError(source, units, available);
    }
    this.entryFor(source, now).units_used += units;
  }

  /** The provider reported the quota spent; nothing more is handed out today. */
  exhaust(source: string, now: Date): void {
    const { dailyQuota, reserveQuota } = this.limitsFor(source);
    const entry = this.entryFor(source, now);
    entry.units_used = Math.max(entry.units_used, dailyQuota - reserveQuota);
  }

  snapshot(): Record<string, QuotaEntry> {
    const out: Record<string, QuotaEntry> = {};
    for (const [source, entry] of this.entries) {
      out[source] = { ...entry };
    }
    return out;
  }
}

/**
 * Units granted to one round. Discovery draws on it before each call; the
 * spent total is committed to the ledger once the round's writes are durable.
 */
export class QuotaBudget {
  readonly source: string;
  readonly granted: number;
  private used = 0;
  private providerExhausted = false;

  constructor(source: string, granted: number) {
    this.source = source;
    this.granted = Math.max(0, granted);
  }

  get spent(): number {
    return this.used;
  }

  get remaining(): number {
    return this.granted - this.used;
  }

  get exhausted(): boolean {
    return this.providerExhausted;
  }

  canAfford(units: number): boolean {
    return !this.providerExhausted && units <= this.remaining;
  }

  markExhausted(): void {
    this.providerExhausted = true;
  }

  consume(units: number): void {
    if (!this.canAfford(units)) {
      throw new QuotaExceededError(this.source, units, this.remaining);
    }
    this.used += units;
  }
}
