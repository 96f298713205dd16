import type { CategoryBreakdown, Transaction } from '@tally/core';
import type { TransactionResponse } from '@tally/types';
import { formatApiDate } from './date-range.js';

export function toTransactionResponse(tx: Transaction): TransactionResponse {
  return {
    date: formatApiDate(tx.date),
    amount: tx.amount,
    category: tx.category,
    description: tx.description,
  };
}

/**
 * Breakdown as a plain object for JSON, keys in ascending order
 */
export function toBreakdownResponse(breakdown: CategoryBreakdown): Record<string, number> {
  const entries = [...breakdown.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.fromEntries(entries);
}
