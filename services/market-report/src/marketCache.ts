import type { BidDirection, MarketView, TaxMode } from './domain.js';

export const DEFAULT_MARKET_CACHE_ENTRIES = 16;

export type MarketCacheKey = {
  direction: BidDirection;
  taxMode?: TaxMode;
};

/**
 * Market views for requests without a destination, keyed by direction and
 * tax-mode context. Entries hold the in-flight promise so concurrent callers
 * share one computation. Oldest entries are evicted first once full.
 */
export class MarketViewCache {
  private readonly entries = new Map<string, Promise<MarketView>>();
  private readonly maxEntries: number;

  constructor(maxEntries = DEFAULT_MARKET_CACHE_ENTRIES) {
    this.maxEntries = Math.max(1, maxEntries);
  }

  static keyOf(key: MarketCacheKey): string {
    return `${key.direction}:${key.taxMode ?? 'BID'}`;
  }

  getOrCompute(key: MarketCacheKey, compute: () => Promise<MarketView>): Promise<MarketView> {
    const id = MarketViewCache.keyOf(key);
    const cached = this.entries.get(id);
    if (cached) return cached;

    const pending = compute();
    this.entries.set(id, pending);
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    // Failed computations are not remembered.
    pending.catch(() => {
      if (this.entries.get(id) === pending) this.entries.delete(id);
    });
    return pending;
  }

  /** Drops every cached view; call after bid or station data changes. */
  invalidate(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
