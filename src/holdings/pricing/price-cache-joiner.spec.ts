import { PriceQuote } from '../../market-price/entities/price-quote.entity';
import { PriceCache } from '../../market-price/price-cache';
import { lookupCandidates, lookupQuote } from './price-cache-joiner';

const quote = (price: number): PriceQuote => ({ price, source: 'manual' });

describe('price-cache-joiner', () => {
  describe('lookupCandidates', () => {
    it('should try the raw code, then 6-digit and 5-digit padding', () => {
      expect(lookupCandidates('700')).toEqual(['700', '000700', '00700']);
    });

    it('should repeat the raw code for non-numeric codes', () => {
      expect(lookupCandidates('AAPL')).toEqual(['AAPL', 'AAPL', 'AAPL']);
    });
  });

  describe('lookupQuote', () => {
    it('should match the code exactly first', () => {
      const cache = PriceCache.fromRecord({ '1': quote(1), '000001': quote(2) });

      expect(lookupQuote('1', cache)?.price).toBe(1);
    });

    it('should fall back to the 6-digit mainland form', () => {
      const cache = PriceCache.fromRecord({ '000001': quote(11.5) });

      expect(lookupQuote('1', cache)?.price).toBe(11.5);
    });

    it('should prefer the 6-digit form over the 5-digit form', () => {
      const cache = PriceCache.fromRecord({ '000700': quote(6), '00700': quote(5) });

      expect(lookupQuote('700', cache)?.price).toBe(6);
    });

    it('should fall back to the 5-digit Hong Kong form', () => {
      const cache = PriceCache.fromRecord({ '00700': quote(320) });

      expect(lookupQuote('700', cache)?.price).toBe(320);
    });

    it('should return undefined when nothing matches', () => {
      const cache = PriceCache.fromRecord({ AAPL: quote(170) });

      expect(lookupQuote('MSFT', cache)).toBeUndefined();
      expect(lookupQuote('AAPL', PriceCache.empty())).toBeUndefined();
    });
  });

  describe('PriceCache', () => {
    it('should be unaffected by later changes to the source quotes', () => {
      const source = quote(100);
      const cache = PriceCache.fromEntries([['AAPL', source]]);
      source.price = 1;

      expect(cache.get('AAPL')?.price).toBe(100);
      expect(Object.isFrozen(cache.get('AAPL'))).toBe(true);
      expect(cache.size).toBe(1);
      expect(cache.codes()).toEqual(['AAPL']);
    });
  });
});
