import { HoldingRecord } from '../../holdings/entities/holding-record.entity';
import { Section } from '../../holdings/entities/section.enum';
import { PriceQuote } from '../entities/price-quote.entity';
import { QuoteProviderError } from '../net/quote-provider.error';
import { fetchTextWithPolicy } from '../net/fetch-with-policy';
import { QuoteProvider, QuoteProviderOptions, finiteOrUndefined } from './quote-provider.interface';

const FUND_SOURCE = 'fund_estimate';

interface FundEstimatePayload {
  fundcode?: string;
  dwjz?: string;   // last published NAV
  gsz?: string;    // intraday estimate
  gszzl?: string;  // estimated change %
}

function isFundEstimatePayload(value: unknown): value is FundEstimatePayload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses `jsonpgz({...});`; an empty `jsonpgz();` yields null. */
export function parseFundEstimate(payload: string): PriceQuote | null {
  const match = /jsonpgz\((.*)\)/s.exec(payload);
  if (!match || match[1].trim() === '') {
    return null;
  }

  let body: unknown;
  try {
    body = JSON.parse(match[1]);
  } catch (error: unknown) {
    throw new QuoteProviderError(
      { source: FUND_SOURCE, reason: 'parse_error', message: 'Failed to parse fund estimate payload', attempts: 1 },
      error,
    );
  }
  if (!isFundEstimatePayload(body)) {
    return null;
  }

  const nav = finiteOrUndefined(body.dwjz);
  const estimate = finiteOrUndefined(body.gsz);
  const price = estimate ?? nav;
  if (price === undefined || price <= 0) {
    return null;
  }

  return {
    price,
    change: nav !== undefined && estimate !== undefined ? Number((estimate - nav).toFixed(4)) : undefined,
    changePct: finiteOrUndefined(body.gszzl),
    prevClose: nav,
    source: FUND_SOURCE,
  };
}

// Open-ended fund NAV estimates.
export class FundEstimateQuoteProvider implements QuoteProvider {
  readonly name = FUND_SOURCE;
  private readonly baseUrl: string;

  constructor(private readonly options: QuoteProviderOptions) {
    this.baseUrl = options.baseUrl ?? 'https://fundgz.1234567.com.cn';
  }

  supports(holding: HoldingRecord): boolean {
    return holding.section === Section.FUND && /^\d{6}$/.test(holding.code);
  }

  async fetchQuote(holding: HoldingRecord): Promise<PriceQuote | null> {
    const payload = await fetchTextWithPolicy(
      { source: this.name, url: `${this.baseUrl}/js/${holding.code}.js` },
      this.options.policy,
      this.options.dependencies,
    );
    return parseFundEstimate(payload);
  }
}
