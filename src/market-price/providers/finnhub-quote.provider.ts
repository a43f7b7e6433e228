import { isUSTicker } from '../../holdings/codes/code-normalizer';
import { HoldingRecord } from '../../holdings/entities/holding-record.entity';
import { Section } from '../../holdings/entities/section.enum';
import { PriceQuote } from '../entities/price-quote.entity';
import { fetchJsonWithPolicy } from '../net/fetch-with-policy';
import { QuoteProvider, QuoteProviderOptions } from './quote-provider.interface';

const FINNHUB_SOURCE = 'finnhub';

interface FinnhubQuote {
  c: number;   // current
  d?: number;  // change
  dp?: number; // change %
  h?: number;
  l?: number;
  o?: number;
  pc?: number; // previous close
}

function isFinnhubQuote(value: unknown): value is FinnhubQuote {
  return typeof value === 'object' && value !== null && 'c' in value && typeof value.c === 'number';
}

function optionalNumber(value: number | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function parseFinnhubQuote(body: unknown): PriceQuote | null {
  if (!isFinnhubQuote(body) || !(body.c > 0)) {
    return null;
  }
  return {
    price: body.c,
    change: optionalNumber(body.d),
    changePct: optionalNumber(body.dp),
    open: optionalNumber(body.o),
    high: optionalNumber(body.h),
    low: optionalNumber(body.l),
    prevClose: optionalNumber(body.pc),
    source: FINNHUB_SOURCE,
  };
}

/**
 * US quotes. RSU codes are quoted under their underlying ticker;
 * the caller keys the result by the original code.
 */
export class FinnhubQuoteProvider implements QuoteProvider {
  readonly name = FINNHUB_SOURCE;
  private readonly baseUrl: string;

  constructor(
    private readonly apiKey: string,
    private readonly options: QuoteProviderOptions,
  ) {
    this.baseUrl = options.baseUrl ?? 'https://finnhub.io/api/v1';
  }

  supports(holding: HoldingRecord): boolean {
    return holding.section === Section.US && isUSTicker(holding.code);
  }

  async fetchQuote(holding: HoldingRecord): Promise<PriceQuote | null> {
    if (holding.section !== Section.US) {
      return null;
    }
    const query = new URLSearchParams({ symbol: holding.underlyingTicker.toUpperCase(), token: this.apiKey });
    const body = await fetchJsonWithPolicy(
      { source: this.name, url: `${this.baseUrl}/quote?${query.toString()}`, headers: { Accept: 'application/json' } },
      this.options.policy,
      this.options.dependencies,
    );
    return parseFinnhubQuote(body);
  }
}
