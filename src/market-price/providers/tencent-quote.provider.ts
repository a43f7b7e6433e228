import { HK_CODE_WIDTH, classifyCnMarket, padNumeric } from '../../holdings/codes/code-normalizer';
import { HoldingRecord } from '../../holdings/entities/holding-record.entity';
import { Section } from '../../holdings/entities/section.enum';
import { PriceQuote } from '../entities/price-quote.entity';
import { fetchTextWithPolicy } from '../net/fetch-with-policy';
import { QuoteProvider, QuoteProviderOptions, finiteOrUndefined } from './quote-provider.interface';

const TENCENT_SOURCE = 'tencent';

// Field positions in the "~"-separated quote payload.
const FIELD = {
  price: 3,
  prevClose: 4,
  open: 5,
  change: 31,
  changePct: 32,
  high: 33,
  low: 34,
  peTtm: 39,
  marketCap: 45,   // 亿 CNY
  pb: 46,
} as const;

const MIN_FIELDS = FIELD.low + 1;

export function tencentSymbol(holding: HoldingRecord): string | null {
  if (holding.section === Section.HK) {
    return `hk${padNumeric(holding.code, HK_CODE_WIDTH)}`;
  }
  if (holding.section === Section.A_SHARE && /^\d{6}$/.test(holding.code)) {
    return classifyCnMarket(holding.code) === 'CN_SH' ? `sh${holding.code}` : `sz${holding.code}`;
  }
  return null;
}

/**
 * Parses `v_sh600519="1~name~600519~1700.00~..."`.
 * Unknown symbols come back as `v_pv_none_match="1";` and yield null.
 */
export function parseTencentQuote(payload: string, withFundamentals: boolean): PriceQuote | null {
  const match = /="([^"]*)"/.exec(payload);
  if (!match) {
    return null;
  }
  const fields = match[1].split('~');
  if (fields.length < MIN_FIELDS) {
    return null;
  }

  const price = finiteOrUndefined(fields[FIELD.price]);
  if (price === undefined || price <= 0) {
    return null;
  }

  const quote: PriceQuote = {
    price,
    change: finiteOrUndefined(fields[FIELD.change]),
    changePct: finiteOrUndefined(fields[FIELD.changePct]),
    open: finiteOrUndefined(fields[FIELD.open]),
    high: finiteOrUndefined(fields[FIELD.high]),
    low: finiteOrUndefined(fields[FIELD.low]),
    prevClose: finiteOrUndefined(fields[FIELD.prevClose]),
    source: TENCENT_SOURCE,
  };
  if (withFundamentals) {
    quote.fundamentals = {
      peTtm: finiteOrUndefined(fields[FIELD.peTtm]),
      pb: finiteOrUndefined(fields[FIELD.pb]),
      marketCap: finiteOrUndefined(fields[FIELD.marketCap]),
    };
  }
  return quote;
}

// A-share and Hong Kong quotes.
export class TencentQuoteProvider implements QuoteProvider {
  readonly name = TENCENT_SOURCE;
  private readonly baseUrl: string;

  constructor(private readonly options: QuoteProviderOptions) {
    this.baseUrl = options.baseUrl ?? 'https://qt.gtimg.cn';
  }

  supports(holding: HoldingRecord): boolean {
    return tencentSymbol(holding) !== null;
  }

  async fetchQuote(holding: HoldingRecord): Promise<PriceQuote | null> {
    const symbol = tencentSymbol(holding);
    if (!symbol) {
      return null;
    }
    const payload = await fetchTextWithPolicy(
      { source: this.name, url: `${this.baseUrl}/q=${symbol}` },
      this.options.policy,
      this.options.dependencies,
    );
    return parseTencentQuote(payload, holding.section === Section.A_SHARE);
  }
}
