import { Module } from '@nestjs/common';
import { LedgerConfigService } from '../config/ledger-config.service';
import { MarketPriceController } from './market-price.controller';
import { MarketPriceService } from './market-price.service';
import { createQuoteProviders } from './providers';
import { QUOTE_PROVIDERS } from './providers/quote-provider.interface';

@Module({
  controllers: [MarketPriceController],
  providers: [
    {
      provide: QUOTE_PROVIDERS,
      inject: [LedgerConfigService],
      useFactory: createQuoteProviders,
    },
    MarketPriceService,
  ],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
