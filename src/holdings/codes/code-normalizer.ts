// Code normalisation for cache lookups and venue classification.

export const SYNTHETIC_GRANT_PREFIX = 'RSU_';

// 1-5 uppercase letters with an optional share class: AAPL, BRK.B
const US_TICKER_PATTERN = /^[A-Z]{1,5}(\.[A-Z])?$/;
const NUMERIC_PATTERN = /^\d+$/;

export const CN_CODE_WIDTH = 6;
export const HK_CODE_WIDTH = 5;

export type CnMarket = 'CN_SH' | 'CN_SZ';

export interface SyntheticPrefixResult {
  underlying: string;
  isSynthetic: boolean;
}

/** "RSU_AMZN" -> { underlying: "AMZN", isSynthetic: true } */
export function stripSyntheticPrefix(code: string): SyntheticPrefixResult {
  if (code.startsWith(SYNTHETIC_GRANT_PREFIX)) {
    return { underlying: code.slice(SYNTHETIC_GRANT_PREFIX.length), isSynthetic: true };
  }
  return { underlying: code, isSynthetic: false };
}

// Case-insensitive: a ledger row written "aapl" is still quoted.
export function isUSTicker(code: string): boolean {
  if (!code) {
    return false;
  }
  return US_TICKER_PATTERN.test(stripSyntheticPrefix(code).underlying.toUpperCase());
}

/** Left-pads digit-only codes; anything else comes back unchanged. */
export function padNumeric(code: string, width: number): string {
  return NUMERIC_PATTERN.test(code) ? code.padStart(width, '0') : code;
}

/**
 * Exchange for a mainland code by its first digit.
 * 6/9 and 5 (funds) list in Shanghai; 0/3 and 1 (funds) in Shenzhen.
 * Beijing codes (4/8) are not told apart and fall back to Shenzhen.
 */
export function classifyCnMarket(code: string): CnMarket {
  switch (code.charAt(0)) {
    case '6':
    case '9':
    case '5':
      return 'CN_SH';
    default:
      return 'CN_SZ';
  }
}
