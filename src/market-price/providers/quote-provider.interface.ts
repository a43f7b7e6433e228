import { HoldingRecord } from '../../holdings/entities/holding-record.entity';
import { PriceQuote } from '../entities/price-quote.entity';
import { FetchDependencies, FetchPolicy } from '../net/fetch-with-policy';

export const QUOTE_PROVIDERS = Symbol('QUOTE_PROVIDERS');

// A remote market-data source. Returns null when it has no usable
// quote; transport failures surface as QuoteProviderError.
export interface QuoteProvider {
  readonly name: string;
  supports(holding: HoldingRecord): boolean;
  fetchQuote(holding: HoldingRecord): Promise<PriceQuote | null>;
}

export interface QuoteProviderOptions {
  baseUrl?: string;
  policy: FetchPolicy;
  dependencies?: FetchDependencies;
}

export function finiteOrUndefined(raw: string | number | undefined): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}
