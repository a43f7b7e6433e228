import Decimal from 'decimal.js';
import { Section } from './section.enum';

export enum AShareAssetType {
  STOCK = 'stock',
  ETF = 'etf',
}

// Fields every decoded ledger row carries, whatever its section.
interface HoldingBase {
  code: string;               // exactly as written in the ledger
  name: string;
  costBasis: Decimal;         // per unit, 0 when the cell is "-" or blank
  quantity: Decimal;          // shares or fund units
  marketValue?: Decimal;      // absolute currency units, "万" scaling undone
  buyDate: string;            // YYYY-MM-DD, DEFAULT_BUY_DATE when absent
}

export interface AShareHolding extends HoldingBase {
  section: Section.A_SHARE;
  assetType: AShareAssetType;
}

export interface HkHolding extends HoldingBase {
  section: Section.HK;
}

export interface FundHolding extends HoldingBase {
  section: Section.FUND;
  fundType?: string;
}

// RSU grants keep their prefixed code; the ticker is derived.
export interface UsHolding extends HoldingBase {
  section: Section.US;
  underlyingTicker: string;
  isSyntheticGrant: boolean;
}

// Rows of a table under an unrecognised heading (or before any heading).
export interface UnclassifiedHolding extends HoldingBase {
  section: Section.OTHER;
}

export type HoldingRecord =
  | AShareHolding
  | HkHolding
  | FundHolding
  | UsHolding
  | UnclassifiedHolding;

// Decoded ledger grouped the way the exporter consumes it.
export interface LedgerHoldings {
  etf: AShareHolding[];
  stock: AShareHolding[];
  hk: HkHolding[];
  fund: FundHolding[];
  us: UsHolding[];
}
