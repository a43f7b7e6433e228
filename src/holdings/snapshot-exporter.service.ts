import { Injectable, Logger } from '@nestjs/common';
import { resolve } from 'node:path';
import { ZERO, divide, toNumber } from '../common/utils/decimal.util';
import { LedgerConfigService } from '../config/ledger-config.service';
import { classifyCnMarket } from './codes/code-normalizer';
import { ExportResultDto, HoldingsSnapshot, SnapshotHolding } from './dto/holdings-snapshot.dto';
import { AShareHolding, HkHolding, UsHolding } from './entities/holding-record.entity';
import { LedgerFileService } from './ledger-file.service';
import { groupHoldings, readHoldings } from './ledger-reader';

/** "2024-05-01T08:30:00Z" */
export function formatSyncTimestamp(now: Date): string {
  return now.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

function fromAShare(holding: AShareHolding): SnapshotHolding {
  return {
    symbol: holding.code,
    market: classifyCnMarket(holding.code),
    quantity: toNumber(holding.quantity),
    avg_cost_local: toNumber(holding.costBasis),
    currency: 'CNY',
  };
}

function fromHk(holding: HkHolding): SnapshotHolding {
  return {
    symbol: holding.code,
    market: 'HK',
    quantity: toNumber(holding.quantity),
    avg_cost_local: toNumber(holding.costBasis),
    currency: 'HKD',
  };
}

// A-share and HK rows are keyed by code: a repeated code keeps its
// first position and takes the last row's values. US rows are a list.
function lastByCode<T extends { code: string }>(holdings: readonly T[]): T[] {
  const byCode = new Map<string, T>();
  for (const holding of holdings) {
    byCode.set(holding.code, holding);
  }
  return Array.from(byCode.values());
}

// Prices come from the ledger's own market value; no FX conversion.
function fromUs(holding: UsHolding): SnapshotHolding {
  const snapshot: SnapshotHolding = {
    symbol: holding.code,
    market: 'US',
    quantity: toNumber(holding.quantity),
    avg_cost_local: toNumber(holding.costBasis),
    currency: 'USD',
  };
  if (holding.marketValue) {
    const price = holding.quantity.greaterThan(0) ? divide(holding.marketValue, holding.quantity) : ZERO;
    snapshot.market_price = toNumber(price);
    snapshot.market_value_usd = toNumber(holding.marketValue);
  }
  return snapshot;
}

// Read-only export of the ledger as a normalised JSON snapshot.
// Fund-section and unclassified rows are not exported.
@Injectable()
export class SnapshotExporterService {
  private readonly logger = new Logger(SnapshotExporterService.name);

  constructor(
    private readonly ledgerFile: LedgerFileService,
    private readonly config: LedgerConfigService,
  ) {}

  buildSnapshot(content: string, now: Date = new Date()): HoldingsSnapshot {
    const grouped = groupHoldings(readHoldings(content));

    return {
      sync_timestamp: formatSyncTimestamp(now),
      holdings: [
        ...lastByCode(grouped.etf).map(fromAShare),
        ...lastByCode(grouped.stock).map(fromAShare),
        ...lastByCode(grouped.hk).map(fromHk),
        ...grouped.us.map(fromUs),
      ],
    };
  }

  async snapshot(path?: string): Promise<HoldingsSnapshot> {
    const document = await this.ledgerFile.read(path);
    return this.buildSnapshot(document.content);
  }

  /**
   * Writes the snapshot as indented JSON.
   * @param output - destination, defaults to SNAPSHOT_OUTPUT
   * @param path - ledger location, defaults to discovery
   */
  async export(output?: string, path?: string): Promise<ExportResultDto> {
    const destination = resolve(output ?? this.config.snapshotOutput);
    this.logger.log(`Exporting holdings to ${destination}`);

    const snapshot = await this.snapshot(path);
    await this.ledgerFile.writeJson(destination, snapshot);
    this.logger.log(`Exported ${snapshot.holdings.length} holdings to ${destination}`);

    return {
      output: destination,
      holdings: snapshot.holdings.length,
      syncTimestamp: snapshot.sync_timestamp,
    };
  }
}
