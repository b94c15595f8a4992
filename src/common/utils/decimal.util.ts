import Decimal from 'decimal.js';

// Configure Decimal.js globally for money arithmetic
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // no exponential notation for large amounts
  toExpNeg: -9e15,
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal.
 * Accepts JavaScript numbers, numeric strings and existing Decimal instances.
 */
export function toDecimal(value: Decimal.Value): Decimal {
  return new Decimal(value);
}

/**
 * Converts Decimal back to a JavaScript number for JSON serialization.
 * Rounds to 8 decimal places so averages stay readable.
 */
export function toNumber(value: Decimal): number {
  return value.toDecimalPlaces(8).toNumber();
}

/**
 * Rounds to cents and returns a number. Used for balances and P&L totals.
 */
export function toMoney(value: Decimal): number {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Converts Decimal to a USD string with 2 decimal places, for messages.
 */
export function toUSD(value: Decimal): string {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toFixed(2);
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((total, val) => total.plus(val), ZERO);
}

/**
 * `part / whole * 100`, defined as 0 when `whole` is zero.
 */
export function percentageOf(part: Decimal, whole: Decimal): Decimal {
  if (whole.isZero()) {
    return ZERO;
  }
  return part.dividedBy(whole).times(100);
}
