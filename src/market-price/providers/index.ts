import { LedgerConfigService } from '../../config/ledger-config.service';
import { FetchPolicy } from '../net/fetch-with-policy';
import { FinnhubQuoteProvider } from './finnhub-quote.provider';
import { FundEstimateQuoteProvider } from './fund-estimate-quote.provider';
import { QuoteProvider } from './quote-provider.interface';
import { TencentQuoteProvider } from './tencent-quote.provider';

export function createQuoteProviders(config: LedgerConfigService): QuoteProvider[] {
  const policy: FetchPolicy = {
    ...config.quotePolicy,
    baseDelayMs: 150,
    maxDelayMs: 1_000,
  };

  const providers: QuoteProvider[] = [
    new TencentQuoteProvider({ policy }),
    new FundEstimateQuoteProvider({ policy }),
  ];
  // US quotes need a key
  const apiKey = config.finnhubApiKey;
  if (apiKey) {
    providers.push(new FinnhubQuoteProvider(apiKey, { policy }));
  }
  return providers;
}
