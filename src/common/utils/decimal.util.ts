import Decimal from 'decimal.js';

// Configure Decimal.js globally for money arithmetic
Decimal.set({
  precision: 20,           // 20 significant digits
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,         // No exponential notation for large numbers
  toExpNeg: -9e15,        // No exponential notation for small numbers
});

export const ZERO = new Decimal(0);

/**
 * Converts any number-like value to Decimal.
 * Strings go through untouched so "0.1" stays exactly 0.1.
 */
export function toDecimal(value: number | string | Decimal): Decimal {
  return new Decimal(value);
}

/**
 * Rounds a monetary value to 2 decimal places, half-up.
 * Every stored amount passes through here.
 */
export function toMoney(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

/** Whole units affordable with `budget` at `price`. Truncates, never rounds. */
export function floorQuantity(budget: Decimal, price: Decimal): number {
  return divide(budget, price).floor().toNumber();
}

/**
 * Converts Decimal back to a 2dp JavaScript number for JSON serialization.
 */
export function toNumber(value: Decimal): number {
  return toMoney(value).toNumber();
}

/**
 * Formats money with exactly 2 decimal places ("1500.50").
 */
export function toMoneyString(value: Decimal): string {
  return toMoney(value).toFixed(2);
}

export function sum<T>(items: readonly T[], pick: (item: T) => Decimal): Decimal {
  return items.reduce((total, item) => total.plus(pick(item)), ZERO);
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

/**
 * Parses a user-supplied price, tolerating thousands separators.
 * Undefined for anything that is not a finite number or a numeric string.
 */
export function parseDecimal(raw: unknown): Decimal | undefined {
  if (typeof raw !== 'number' && typeof raw !== 'string') {
    return undefined;
  }
  const text = typeof raw === 'number' ? String(raw) : raw.replace(/,/g, '').trim();
  if (text === '') {
    return undefined;
  }
  try {
    const value = new Decimal(text);
    return value.isFinite() ? value : undefined;
  } catch {
    return undefined;
  }
}
