import Decimal from 'decimal.js';

// Configure Decimal.js globally for financial precision
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

// Ledger cells expressed in "万" are scaled down by this factor.
export const TEN_THOUSAND = new Decimal(10000);

/**
 * Converts any number-like value to Decimal for financial calculations.
 * Handles JavaScript numbers, strings, and existing Decimal instances.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to JavaScript number for JSON serialization.
 * Rounds to 8 decimal places.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/** Fixed-point rendering with half-up rounding, e.g. 0.165 -> "0.17" */
export function toFixed(value: Decimal, places: number): string {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP).toFixed(places);
}

/**
 * Parses a plain non-negative amount such as "1650.00" or "1,000".
 * Returns null for anything else.
 */
export function parseAmount(raw: string): Decimal | null {
  const normalized = raw.replace(/,/g, '').trim();
  if (!/^(?:\d+(?:\.\d*)?|\.\d+)$/.test(normalized)) {
    return null;
  }
  return new Decimal(normalized);
}

/**
 * Safe division with zero check.
 */
export function divide(a: Decimal, b: Decimal): Decimal {
  if (b.isZero()) {
    throw new Error('Division by zero');
  }
  return a.dividedBy(b);
}
