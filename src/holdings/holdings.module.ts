import { Module } from '@nestjs/common';
import { MarketPriceModule } from '../market-price/market-price.module';
import { HoldingsController } from './holdings.controller';
import { LedgerFileService } from './ledger-file.service';
import { LedgerUpdaterService } from './ledger-updater.service';
import { SnapshotExporterService } from './snapshot-exporter.service';

@Module({
  imports: [MarketPriceModule], // Quotes for ledger updates
  controllers: [HoldingsController],
  providers: [
    LedgerFileService,
    LedgerUpdaterService,    // Mutation: refresh market values
    SnapshotExporterService, // Read-only: JSON snapshot
  ],
  exports: [LedgerUpdaterService, SnapshotExporterService],
})
export class HoldingsModule {}
