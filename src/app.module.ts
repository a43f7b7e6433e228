import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { HoldingsModule } from './holdings/holdings.module';
import { MarketPriceModule } from './market-price/market-price.module';

@Module({
  imports: [ConfigModule, MarketPriceModule, HoldingsModule],
  controllers: [AppController],
})
export class AppModule {}
