/**
 * Report Builder Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  buildCategoryBreakdown,
  buildReport,
  buildTimeSeries,
  summarize,
} from '../report-builder.js';
import type { Transaction } from '../../ledger/ledger-types.js';

function tx(
  date: string,
  amount: number,
  category: Transaction['category'],
  description: string
): Transaction {
  const [year, month, day] = date.split('-').map(Number);
  return { date: new Date(year ?? 0, (month ?? 1) - 1, day ?? 1), amount, category, description };
}

describe('summarize', () => {
  it('should return zeros for no transactions', () => {
    expect(summarize([])).toEqual({ totalIncome: 0, totalExpense: 0, netSavings: 0 });
  });

  it('should subtract expenses from income', () => {
    const result = summarize([
      tx('2024-03-01', 100, 'Income', 'Salary'),
      tx('2024-03-02', 40, 'Expense', 'Groceries'),
    ]);

    expect(result).toEqual({ totalIncome: 100, totalExpense: 40, netSavings: 60 });
  });

  it('should allow negative net savings', () => {
    const result = summarize([
      tx('2024-03-01', 10, 'Income', 'Refund'),
      tx('2024-03-02', 25, 'Expense', 'Rent'),
      tx('2024-03-03', 5, 'Expense', 'Rent'),
    ]);

    expect(result).toEqual({ totalIncome: 10, totalExpense: 30, netSavings: -20 });
  });
});

describe('buildTimeSeries', () => {
  it('should return empty series for no transactions', () => {
    expect(buildTimeSeries([])).toEqual({ dates: [], income: [], expense: [] });
  });

  it('should sum per day over the sorted distinct days with zero fill', () => {
    const result = buildTimeSeries([
      tx('2024-03-05', 50, 'Expense', 'Groceries'),
      tx('2024-03-01', 500, 'Income', 'Salary'),
      tx('2024-03-05', 7.5, 'Expense', 'Coffee'),
      tx('2024-03-09', 30, 'Income', 'Gift'),
      tx('2024-03-09', 12, 'Expense', 'Cinema'),
    ]);

    expect(result).toEqual({
      dates: ['2024-03-01', '2024-03-05', '2024-03-09'],
      income: [500, 0, 30],
      expense: [0, 57.5, 12],
    });
  });

  it('should not add days absent from the input', () => {
    const result = buildTimeSeries([
      tx('2024-03-01', 1, 'Income', 'a'),
      tx('2024-03-31', 2, 'Income', 'b'),
    ]);

    expect(result.dates).toEqual(['2024-03-01', '2024-03-31']);
  });

  it('should order days across a year boundary', () => {
    const result = buildTimeSeries([
      tx('2025-01-02', 3, 'Expense', 'a'),
      tx('2024-12-30', 4, 'Expense', 'b'),
    ]);

    expect(result.dates).toEqual(['2024-12-30', '2025-01-02']);
    expect(result.expense).toEqual([4, 3]);
  });
});

describe('buildCategoryBreakdown', () => {
  it('should sum expenses per description and ignore income', () => {
    const result = buildCategoryBreakdown([
      tx('2024-03-01', 10, 'Expense', 'Groceries'),
      tx('2024-03-02', 999, 'Income', 'Groceries'),
      tx('2024-03-03', 15, 'Expense', 'Groceries'),
    ]);

    expect(Object.fromEntries(result)).toEqual({ Groceries: 25 });
  });

  it('should return an empty map when there are no expenses', () => {
    expect(buildCategoryBreakdown([tx('2024-03-01', 500, 'Income', 'Salary')]).size).toBe(0);
    expect(buildCategoryBreakdown([]).size).toBe(0);
  });

  it('should keep descriptions as distinct keys', () => {
    const result = buildCategoryBreakdown([
      tx('2024-03-01', 10, 'Expense', 'Rent'),
      tx('2024-03-02', 5, 'Expense', 'rent'),
      tx('2024-03-03', 1, 'Expense', ''),
    ]);

    expect(result).toEqual(
      new Map([
        ['Rent', 10],
        ['rent', 5],
        ['', 1],
      ])
    );
  });
});

describe('buildReport', () => {
  it('should produce the end-to-end report for March', () => {
    const march = [
      tx('2024-03-01', 500, 'Income', 'Salary'),
      tx('2024-03-05', 50, 'Expense', 'Groceries'),
    ];

    const report = buildReport(march);

    expect(report.summary).toEqual({ totalIncome: 500, totalExpense: 50, netSavings: 450 });
    expect(Object.fromEntries(report.categoryBreakdown)).toEqual({ Groceries: 50 });
    expect(report.timeSeries).toEqual({
      dates: ['2024-03-01', '2024-03-05'],
      income: [500, 0],
      expense: [0, 50],
    });
  });

  it('should not mutate its input', () => {
    const input = [
      tx('2024-03-05', 50, 'Expense', 'Groceries'),
      tx('2024-03-01', 500, 'Income', 'Salary'),
    ];
    const copy = input.map((t) => ({ ...t, date: new Date(t.date) }));

    buildReport(input);

    expect(input).toEqual(copy);
  });
});
