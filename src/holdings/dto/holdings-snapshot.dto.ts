export type SnapshotMarket = 'US' | 'CN_SH' | 'CN_SZ' | 'HK';
export type SnapshotCurrency = 'USD' | 'CNY' | 'HKD';

// Field names follow the downstream JSON schema.
export interface SnapshotHolding {
  symbol: string;
  market: SnapshotMarket;
  quantity: number;
  avg_cost_local: number;
  currency: SnapshotCurrency;
  market_price?: number;
  market_value_usd?: number;
}

export interface HoldingsSnapshot {
  sync_timestamp: string;          // UTC, second precision
  holdings: SnapshotHolding[];
}

export interface ExportResultDto {
  output: string;
  holdings: number;
  syncTimestamp: string;
}
