/**
 * Report Builder
 *
 * Pure aggregations over an already-retrieved set of transactions.
 * None of these functions mutate their input.
 */

import { format } from 'date-fns';
import type { Transaction } from '../ledger/ledger-types.js';
import type { CategoryBreakdown, LedgerReport, LedgerSummary, TimeSeries } from './report-types.js';

const DAY_KEY_FORMAT = 'yyyy-MM-dd';

export function summarize(transactions: readonly Transaction[]): LedgerSummary {
  let totalIncome = 0;
  let totalExpense = 0;

  for (const tx of transactions) {
    switch (tx.category) {
      case 'Income':
        totalIncome += tx.amount;
        break;
      case 'Expense':
        totalExpense += tx.amount;
        break;
    }
  }

  return { totalIncome, totalExpense, netSavings: totalIncome - totalExpense };
}

/**
 * Daily income/expense sums over the days present in the input,
 * with zero where a day has no rows of that category
 */
export function buildTimeSeries(transactions: readonly Transaction[]): TimeSeries {
  const days = new Map<string, { income: number; expense: number }>();

  for (const tx of transactions) {
    const key = format(tx.date, DAY_KEY_FORMAT);
    const bucket = days.get(key) ?? { income: 0, expense: 0 };
    switch (tx.category) {
      case 'Income':
        bucket.income += tx.amount;
        break;
      case 'Expense':
        bucket.expense += tx.amount;
        break;
    }
    days.set(key, bucket);
  }

  const dates = [...days.keys()].sort();

  return {
    dates,
    income: dates.map((day) => days.get(day)?.income ?? 0),
    expense: dates.map((day) => days.get(day)?.expense ?? 0),
  };
}

/**
 * Sum of Expense amounts grouped by description. Income rows are ignored.
 */
export function buildCategoryBreakdown(transactions: readonly Transaction[]): CategoryBreakdown {
  const totals: CategoryBreakdown = new Map();

  for (const tx of transactions) {
    if (tx.category !== 'Expense') continue;
    totals.set(tx.description, (totals.get(tx.description) ?? 0) + tx.amount);
  }

  return totals;
}

export function buildReport(transactions: readonly Transaction[]): LedgerReport {
  return {
    summary: summarize(transactions),
    timeSeries: buildTimeSeries(transactions),
    categoryBreakdown: buildCategoryBreakdown(transactions),
  };
}
