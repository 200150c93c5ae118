import Decimal from 'decimal.js';

// Configure Decimal.js globally for exact price arithmetic
Decimal.set({
  precision: 20,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large prices
  toExpNeg: -9e15,
});

/**
 * Converts any number-like value to Decimal.
 * Throws for text decimal.js cannot read ("abc", "1.2.3").
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Parses user-supplied text, returning undefined instead of throwing.
 */
export function tryParseDecimal(text: string): Decimal | undefined {
  try {
    return new Decimal(text);
  } catch {
    return undefined;
  }
}

/**
 * Renders a price with exactly 2 decimal places.
 * Used for book keys and the ledger file, so equal prices always render alike.
 */
export function toPriceString(value: Decimal): string {
  return value.toFixed(2, Decimal.ROUND_HALF_UP);
}
