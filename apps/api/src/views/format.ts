import { format } from 'date-fns';
import { LEDGER_DATE_FORMAT } from '@tally/core';

const currencyFormatter = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * e.g. 1234.5 -> "$1,234.50", -20 -> "-$20.00"
 */
export function formatCurrency(value: number): string {
  return currencyFormatter.format(value);
}

export function formatDisplayDate(date: Date): string {
  return format(date, LEDGER_DATE_FORMAT);
}

/**
 * Coordinates rounded to two decimals, without trailing zeros
 */
export function formatCoordinate(value: number): string {
  const rounded = Number(value.toFixed(2));
  return String(Object.is(rounded, -0) ? 0 : rounded);
}
