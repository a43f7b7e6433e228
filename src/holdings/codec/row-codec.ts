import Decimal from 'decimal.js';
import { TEN_THOUSAND, ZERO, parseAmount, toFixed } from '../../common/utils/decimal.util';
import { stripSyntheticPrefix } from '../codes/code-normalizer';
import { AShareAssetType, HoldingRecord } from '../entities/holding-record.entity';
import { Section } from '../entities/section.enum';
import {
  DEFAULT_BUY_DATE,
  HEADER_TOKENS,
  HeaderSchema,
  PLACEHOLDER,
  TEN_THOUSAND_MARKER,
  joinCells,
  lineEnding,
  splitCells,
} from '../ledger-format';

export type EncodableRole = 'marketValue' | 'costBasis' | 'quantity';

// Column positions resolved per table; undefined when the header lacks the role.
export interface ColumnRoles {
  code?: number;
  name?: number;
  costBasis?: number;
  quantity?: number;
  marketValue?: number;
  buyDate?: number;
  fundType?: number;
  marketValueInTenThousands: boolean;
}

export type DecodeFailureReason =
  | 'short_row'
  | 'missing_code_column'
  | 'empty_code'
  | 'missing_quantity_column'
  | 'invalid_number';

export type DecodeResult =
  | { ok: true; record: HoldingRecord }
  | { ok: false; reason: DecodeFailureReason };

export type EncodeFailureReason = 'short_row' | 'missing_column';

export type EncodeResult =
  | { ok: true; row: string }
  | { ok: false; reason: EncodeFailureReason };

function position(index: number): number | undefined {
  return index >= 0 ? index : undefined;
}

export function resolveColumnRoles(header: HeaderSchema): ColumnRoles {
  const marketValue = position(header.findIndex((cell) => cell.includes(HEADER_TOKENS.marketValue)));

  return {
    code: position(header.indexOf(HEADER_TOKENS.code)),
    name: position(header.indexOf(HEADER_TOKENS.name)),
    costBasis: position(header.indexOf(HEADER_TOKENS.costBasis)),
    quantity: position(
      header.findIndex((cell) => HEADER_TOKENS.quantity.some((token) => cell.includes(token))),
    ),
    marketValue,
    buyDate: position(header.indexOf(HEADER_TOKENS.buyDate)),
    fundType: position(header.indexOf(HEADER_TOKENS.fundType)),
    marketValueInTenThousands:
      marketValue !== undefined && header[marketValue].includes(TEN_THOUSAND_MARKER),
  };
}

function isPlaceholder(cell: string | undefined): boolean {
  return cell === undefined || cell === '' || cell === PLACEHOLDER;
}

// "-" and blank read as zero; null means the cell is not a number.
function parseNumericCell(cell: string): Decimal | null {
  return isPlaceholder(cell) ? ZERO : parseAmount(cell);
}

function isEtf(code: string, name: string): boolean {
  return name.includes('ETF') || code.startsWith('5') || code.startsWith('1');
}

/**
 * Decodes one data row against the header of its table.
 * Never throws; rows that cannot be decoded report why.
 */
export function decodeRow(header: HeaderSchema, rawRow: string, section: Section): DecodeResult {
  const cells = splitCells(rawRow);
  if (cells.length < header.length) {
    return { ok: false, reason: 'short_row' };
  }

  const roles = resolveColumnRoles(header);
  if (roles.code === undefined) {
    return { ok: false, reason: 'missing_code_column' };
  }
  const code = cells[roles.code];
  if (!code) {
    return { ok: false, reason: 'empty_code' };
  }
  if (roles.quantity === undefined) {
    return { ok: false, reason: 'missing_quantity_column' };
  }

  const quantity = parseNumericCell(cells[roles.quantity]);
  const costBasis = roles.costBasis === undefined ? ZERO : parseNumericCell(cells[roles.costBasis]);
  if (quantity === null || costBasis === null) {
    return { ok: false, reason: 'invalid_number' };
  }

  // market value is informational: an unreadable cell just leaves it unset
  let marketValue: Decimal | undefined;
  const marketValueCell = roles.marketValue === undefined ? undefined : cells[roles.marketValue];
  if (marketValueCell !== undefined && !isPlaceholder(marketValueCell)) {
    const parsed = parseAmount(marketValueCell);
    if (parsed) {
      marketValue = roles.marketValueInTenThousands ? parsed.times(TEN_THOUSAND) : parsed;
    }
  }

  const buyDateCell = roles.buyDate === undefined ? undefined : cells[roles.buyDate];
  const base = {
    code,
    name: roles.name === undefined ? '' : cells[roles.name],
    costBasis,
    quantity,
    marketValue,
    buyDate: buyDateCell === undefined || isPlaceholder(buyDateCell) ? DEFAULT_BUY_DATE : buyDateCell,
  };

  switch (section) {
    case Section.A_SHARE:
      return {
        ok: true,
        record: {
          ...base,
          section,
          assetType: isEtf(code, base.name) ? AShareAssetType.ETF : AShareAssetType.STOCK,
        },
      };
    case Section.FUND: {
      const fundType = roles.fundType === undefined ? undefined : cells[roles.fundType];
      return {
        ok: true,
        record: { ...base, section, fundType: isPlaceholder(fundType) ? undefined : fundType },
      };
    }
    case Section.US: {
      const { underlying, isSynthetic } = stripSyntheticPrefix(code);
      return {
        ok: true,
        record: { ...base, section, underlyingTicker: underlying, isSyntheticGrant: isSynthetic },
      };
    }
    case Section.HK:
    case Section.OTHER:
      return { ok: true, record: { ...base, section } };
  }
}

/**
 * Market value text for a header cell.
 * "万" columns: scaled value below 100 keeps 2 decimals, otherwise none.
 * Plain columns always keep 2 decimals.
 */
export function formatMarketValue(headerCell: string, value: Decimal): string {
  if (!headerCell.includes(TEN_THOUSAND_MARKER)) {
    return toFixed(value, 2);
  }
  const scaled = value.dividedBy(TEN_THOUSAND);
  return scaled.lessThan(100) ? toFixed(scaled, 2) : toFixed(scaled, 0);
}

function formatCell(role: EncodableRole, headerCell: string, value: Decimal): string {
  switch (role) {
    case 'marketValue':
      return formatMarketValue(headerCell, value);
    case 'costBasis':
      return toFixed(value, 2);
    case 'quantity':
      return value.toString();
  }
}

/**
 * Rewrites one cell of a data row. Every other cell is passed through
 * trimmed; the row keeps its line terminator.
 */
export function encodeCell(
  header: HeaderSchema,
  rawRow: string,
  role: EncodableRole,
  value: Decimal,
): EncodeResult {
  const cells = splitCells(rawRow);
  if (cells.length < header.length) {
    return { ok: false, reason: 'short_row' };
  }

  const index = resolveColumnRoles(header)[role];
  if (index === undefined) {
    return { ok: false, reason: 'missing_column' };
  }

  cells[index] = formatCell(role, header[index], value);
  return { ok: true, row: joinCells(cells, lineEnding(rawRow)) };
}
