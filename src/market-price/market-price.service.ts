import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { HoldingRecord } from '../holdings/entities/holding-record.entity';
import { PriceQuote, isValidPrice } from './entities/price-quote.entity';
import { isQuoteProviderError } from './net/quote-provider.error';
import { PriceCache } from './price-cache';
import { QUOTE_PROVIDERS, QuoteProvider } from './providers/quote-provider.interface';

/**
 * Quote collaborator for ledger updates.
 * Manual prices (set over REST) win over remote providers; every
 * provider failure degrades to "no quote" for that code.
 */
@Injectable()
export class MarketPriceService {
  private readonly logger = new Logger(MarketPriceService.name);
  private manualPrices: Map<string, number> = new Map();
  private lastPriceUpdate: Date | null = null;

  constructor(@Inject(QUOTE_PROVIDERS) private readonly providers: QuoteProvider[]) {}

  /** Manual price for a code, undefined if none was set */
  getPrice(code: string): number | undefined {
    return this.manualPrices.get(code);
  }

  /** Returns snapshot of all manual prices */
  getAllPrices(): Record<string, number> {
    const prices: Record<string, number> = {};
    this.manualPrices.forEach((price, code) => {
      prices[code] = price;
    });
    return prices;
  }

  /**
   * Sets a manual price for one code.
   * @throws BadRequestException if price <= 0
   */
  updatePrice(code: string, price: number): void {
    this.assertPositive(code, price);
    this.manualPrices.set(code, price);
    this.lastPriceUpdate = new Date();
  }

  /**
   * Batch manual prices - validates all before applying.
   * @throws BadRequestException on the first invalid price
   */
  updatePrices(prices: Record<string, number>): void {
    const entries = Object.entries(prices);
    entries.forEach(([code, price]) => this.assertPositive(code, price));
    entries.forEach(([code, price]) => this.manualPrices.set(code, price));
    this.lastPriceUpdate = new Date();
  }

  /** Timestamp of the most recent manual update, null before the first */
  getLastUpdateTime(): Date | null {
    return this.lastPriceUpdate;
  }

  clearAllPrices(): void {
    this.manualPrices.clear();
    this.lastPriceUpdate = null;
  }

  /**
   * Fetches one quote per distinct code, sequentially, keyed by the
   * code exactly as the ledger writes it.
   */
  async buildPriceCache(holdings: readonly HoldingRecord[]): Promise<PriceCache> {
    const quotes = new Map<string, PriceQuote>();
    const attempted = new Set<string>();

    for (const holding of holdings) {
      if (attempted.has(holding.code)) {
        continue;
      }
      attempted.add(holding.code);

      const quote = this.manualQuote(holding.code) ?? (await this.fetchRemote(holding));
      if (quote) {
        quotes.set(holding.code, quote);
      }
    }

    this.logger.log(`Fetched prices for ${quotes.size} of ${attempted.size} codes`);
    return PriceCache.fromEntries(quotes);
  }

  private manualQuote(code: string): PriceQuote | null {
    const price = this.manualPrices.get(code);
    return price === undefined ? null : { price, source: 'manual' };
  }

  private async fetchRemote(holding: HoldingRecord): Promise<PriceQuote | null> {
    for (const provider of this.providers) {
      if (!provider.supports(holding)) {
        continue;
      }
      try {
        const quote = await provider.fetchQuote(holding);
        if (quote) {
          return quote;
        }
        this.logger.debug(`${provider.name} has no quote for ${holding.code}`);
      } catch (error: unknown) {
        const reason = isQuoteProviderError(error)
          ? `${error.payload.reason}: ${error.message}`
          : error instanceof Error
            ? error.message
            : String(error);
        this.logger.warn(`${provider.name} failed for ${holding.code} (${reason})`);
      }
    }
    return null;
  }

  private assertPositive(code: string, price: number): void {
    if (!isValidPrice(price)) {
      throw new BadRequestException(`Price must be a positive number, got ${String(price)} for ${code}`);
    }
  }
}
