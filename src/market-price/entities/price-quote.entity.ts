export type QuoteSource = 'manual' | 'tencent' | 'fund_estimate' | 'finnhub';

export interface QuoteFundamentals {
  peTtm?: number;
  pb?: number;
  marketCap?: number;
}

// Latest quote for one security, valid for a single update run.
export interface PriceQuote {
  price: number;              // > 0
  change?: number;
  changePct?: number;
  open?: number;
  high?: number;
  low?: number;
  prevClose?: number;
  source: QuoteSource;
  fundamentals?: QuoteFundamentals;
}

/** Finite, positive, and a number at runtime: manual prices arrive as plain JSON. */
export function isValidPrice(price: unknown): price is number {
  return typeof price === 'number' && Number.isFinite(price) && price > 0;
}
