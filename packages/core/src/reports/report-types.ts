/**
 * Report Domain Types
 */

export interface LedgerSummary {
  totalIncome: number;
  totalExpense: number;
  /** totalIncome - totalExpense */
  netSavings: number;
}

/**
 * Daily income and expense sums on a shared axis.
 * income[i] and expense[i] belong to dates[i].
 */
export interface TimeSeries {
  /** Distinct days present in the input, ascending, as YYYY-MM-DD */
  dates: string[];
  income: number[];
  expense: number[];
}

/**
 * Expense total per description
 */
export type CategoryBreakdown = Map<string, number>;

export interface LedgerReport {
  summary: LedgerSummary;
  timeSeries: TimeSeries;
  categoryBreakdown: CategoryBreakdown;
}
