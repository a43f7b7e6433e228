import { PriceQuote } from '../../market-price/entities/price-quote.entity';
import { PriceCache } from '../../market-price/price-cache';
import { CN_CODE_WIDTH, HK_CODE_WIDTH, padNumeric } from '../codes/code-normalizer';

/** Keys tried in order: as written, 6-digit mainland, 5-digit HK. */
export function lookupCandidates(code: string): string[] {
  return [code, padNumeric(code, CN_CODE_WIDTH), padNumeric(code, HK_CODE_WIDTH)];
}

// First hit wins; undefined means "leave the row alone".
export function lookupQuote(code: string, cache: PriceCache): Readonly<PriceQuote> | undefined {
  for (const candidate of lookupCandidates(code)) {
    const quote = cache.get(candidate);
    if (quote) {
      return quote;
    }
  }
  return undefined;
}
