import { PriceQuote } from './entities/price-quote.entity';

/**
 * Quotes for one update run, keyed by the code the fetch layer used.
 * Built once; read-only afterwards. Keys are not normalised, so
 * lookups go through lookupQuote().
 */
export class PriceCache {
  private readonly quotes: ReadonlyMap<string, Readonly<PriceQuote>>;

  private constructor(quotes: Map<string, Readonly<PriceQuote>>) {
    this.quotes = quotes;
  }

  static fromEntries(entries: Iterable<readonly [string, PriceQuote]>): PriceCache {
    const quotes = new Map<string, Readonly<PriceQuote>>();
    for (const [code, quote] of entries) {
      quotes.set(code, Object.freeze({ ...quote }));
    }
    return new PriceCache(quotes);
  }

  static fromRecord(record: Record<string, PriceQuote>): PriceCache {
    return PriceCache.fromEntries(Object.entries(record));
  }

  static empty(): PriceCache {
    return new PriceCache(new Map());
  }

  get(code: string): Readonly<PriceQuote> | undefined {
    return this.quotes.get(code);
  }

  has(code: string): boolean {
    return this.quotes.has(code);
  }

  get size(): number {
    return this.quotes.size;
  }

  codes(): string[] {
    return Array.from(this.quotes.keys());
  }
}
