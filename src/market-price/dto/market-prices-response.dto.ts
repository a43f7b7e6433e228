// Manual prices currently applied ahead of remote providers
export interface MarketPricesResponseDto {
  prices: Record<string, number>;  // { "600519": 1700, "RSU_AMZN": 130 }
  lastUpdated: string | null;      // ISO timestamp
  source: 'manual';
}
