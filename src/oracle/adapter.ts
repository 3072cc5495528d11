import { LedgerError } from '../utils/errors.js';
import type { PriceRate } from '../accounting/pricing.js';

export type PriceQuote = PriceRate & {
  updatedAt: number; // unix seconds
};

/** External price source: asset B per asset A, fixed point. */
export interface PriceFeed {
  currentRate(): PriceQuote;
}

/**
 * Validates what the feed returns. Any throw, a non-positive rate, or a quote
 * older than `maxAgeSeconds` becomes `StaleOrUnavailable`.
 */
export class OracleAdapter {
  constructor(
    private readonly feed: PriceFeed,
    private readonly maxAgeSeconds: number,
  ) {}

  read(now: number): PriceRate {
    let quote: PriceQuote;
    try {
      quote = this.feed.currentRate();
    } catch (err) {
      throw new LedgerError('StaleOrUnavailable', 'price feed failed', {}, { cause: err });
    }
    if (quote.value <= 0n || !Number.isInteger(quote.decimals) || quote.decimals < 0) {
      throw new LedgerError('StaleOrUnavailable', 'price feed returned an invalid rate', { value: quote.value, decimals: quote.decimals });
    }
    if (now - quote.updatedAt > this.maxAgeSeconds) {
      throw new LedgerError('StaleOrUnavailable', 'price quote is stale', { updatedAt: quote.updatedAt, now, maxAgeSeconds: this.maxAgeSeconds });
    }
    return { value: quote.value, decimals: quote.decimals };
  }

  /** Reads the feed at most once; later calls return the first value. */
  snapshot(now: number): () => PriceRate {
    let cached: PriceRate | null = null;
    return () => {
      if (!cached) cached = this.read(now);
      return cached;
    };
  }
}

/** In-process feed whose rate is set explicitly. */
export class StaticPriceFeed implements PriceFeed {
  private quote: PriceQuote;
  private reads = 0;

  constructor(value: bigint, decimals: number, updatedAt: number) {
    this.quote = { value, decimals, updatedAt };
  }

  set(value: bigint, updatedAt: number = this.quote.updatedAt): void {
    this.quote = { ...this.quote, value, updatedAt };
  }

  get readCount(): number {
    return this.reads;
  }

  currentRate(): PriceQuote {
    this.reads++;
    return { ...this.quote };
  }
}
