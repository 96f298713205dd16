/**
 * Ledger Domain Types
 *
 * Type definitions for the CSV-backed transaction ledger.
 */

/**
 * Column order of the ledger file. Readers and writers must match it exactly.
 */
export const LEDGER_COLUMNS = ['date', 'amount', 'category', 'description'] as const;

/**
 * date-fns pattern for dates stored in the ledger file (DD.MM.YYYY)
 */
export const LEDGER_DATE_FORMAT = 'dd.MM.yyyy';

export const DEFAULT_LEDGER_FILE = 'finance_data.csv';

export const TRANSACTION_CATEGORIES = ['Income', 'Expense'] as const;

export type TransactionCategory = (typeof TRANSACTION_CATEGORIES)[number];

export type LedgerColumn = (typeof LEDGER_COLUMNS)[number];

/**
 * One row of the ledger file as text, keyed by column name
 */
export type LedgerRecord = Record<LedgerColumn, string>;

export interface Transaction {
  /** Calendar day at local midnight */
  date: Date;
  amount: number;
  category: TransactionCategory;
  description: string;
}

export interface LedgerConfig {
  readonly filePath: string;
  readonly columns: readonly LedgerColumn[];
  readonly dateFormat: string;
}

/**
 * Parameters for appending an entry
 */
export interface AddEntryParams {
  date: Date;
  amount: number;
  category: TransactionCategory;
  description: string;
}

/**
 * Inclusive day range for retrieval
 */
export interface DateRangeParams {
  startDate: Date;
  endDate: Date;
}

export function createLedgerConfig(filePath: string = DEFAULT_LEDGER_FILE): LedgerConfig {
  return Object.freeze({
    filePath,
    columns: LEDGER_COLUMNS,
    dateFormat: LEDGER_DATE_FORMAT,
  });
}

export function isTransactionCategory(value: string): value is TransactionCategory {
  return (TRANSACTION_CATEGORIES as readonly string[]).includes(value);
}
