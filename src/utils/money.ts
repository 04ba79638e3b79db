import { ValidationError } from './validationError.js';

export type Milli = number; // integer milliunits (no bigint)

const MILLIUNITS_PER_UNIT = 1000;

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Convert YNAB milliunits to a decimal currency amount. No rounding is applied;
 * display rounding happens in {@link formatCurrency}.
 */
export const milliunitsToAmount = (m: Milli): number => m / MILLIUNITS_PER_UNIT;

export const amountToMilliunits = (amount: number): Milli => {
  const m = Math.round(amount * MILLIUNITS_PER_UNIT);
  if (!Number.isFinite(amount) || !Number.isSafeInteger(m)) {
    throw new ValidationError(`Invalid/unsafe amount: ${amount}`);
  }
  return m;
};

export const addMilli = (a: Milli, b: Milli): Milli => {
  const s = a + b;
  if (!Number.isSafeInteger(s)) throw new Error('Milliunit sum overflow');
  return s;
};

/**
 * Format a decimal amount as `$1,234.56`. Negative amounts put the sign before
 * the symbol: `-$12.34`.
 */
export const formatCurrency = (amount: number): string => {
  const formatted = currencyFormatter.format(Math.abs(amount));
  return amount < 0 ? `-${formatted}` : formatted;
};

export const formatMilliunits = (m: Milli): string => formatCurrency(milliunitsToAmount(m));
