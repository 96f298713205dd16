/**
 * Ledger Service
 *
 * Append-only transaction storage with inclusive day-range retrieval.
 */

import { endOfDay, format, isValid, parse, startOfDay } from 'date-fns';
import { InvalidRangeError, MalformedRecordError } from './ledger-errors.js';
import type { LedgerRepository } from './ledger-repository.js';
import { isTransactionCategory, LEDGER_DATE_FORMAT } from './ledger-types.js';
import type {
  AddEntryParams,
  DateRangeParams,
  LedgerConfig,
  LedgerRecord,
  Transaction,
} from './ledger-types.js';

/**
 * Caller-side range check. Must run before getTransactions so an inverted
 * range never reaches the file layer.
 *
 * @throws InvalidRangeError if the start day is after the end day
 */
export function assertValidRange({ startDate, endDate }: DateRangeParams): void {
  if (startOfDay(startDate).getTime() > startOfDay(endDate).getTime()) {
    throw new InvalidRangeError();
  }
}

export function formatLedgerDate(date: Date, dateFormat: string = LEDGER_DATE_FORMAT): string {
  return format(date, dateFormat);
}

/**
 * Parse a ledger date, or null unless the value is exactly how the date
 * formats (two-digit day and month, four-digit year for DD.MM.YYYY)
 */
export function parseLedgerDate(value: string, dateFormat: string = LEDGER_DATE_FORMAT): Date | null {
  const parsed = parse(value, dateFormat, new Date());
  if (!isValid(parsed) || format(parsed, dateFormat) !== value) {
    return null;
  }
  return parsed;
}

export class LedgerService {
  constructor(
    private readonly ledgerRepo: LedgerRepository,
    private readonly config: LedgerConfig
  ) {}

  /**
   * Ensure the ledger file exists with its header row
   *
   * @returns true when the file was created by this call
   */
  async initialize(): Promise<boolean> {
    return this.ledgerRepo.initialize();
  }

  /**
   * Append one transaction. Amount and category are not validated here;
   * the input surface is responsible for them.
   */
  async addEntry(params: AddEntryParams): Promise<Transaction> {
    await this.ledgerRepo.append({
      date: formatLedgerDate(params.date, this.config.dateFormat),
      amount: String(params.amount),
      category: params.category,
      description: params.description,
    });

    return {
      date: startOfDay(params.date),
      amount: params.amount,
      category: params.category,
      description: params.description,
    };
  }

  /**
   * Transactions dated within [startDate 00:00, endDate 23:59:59.999], in file order.
   *
   * Every row is parsed before filtering; one malformed row fails the whole read.
   *
   * @throws MalformedRecordError
   * @throws StorageUnavailableError
   */
  async getTransactions({ startDate, endDate }: DateRangeParams): Promise<Transaction[]> {
    const records = await this.ledgerRepo.readAll();
    const transactions = records.map((record, index) =>
      toTransaction(record, index + 1, this.config.dateFormat)
    );

    const from = startOfDay(startDate).getTime();
    const to = endOfDay(endDate).getTime();

    return transactions.filter((tx) => {
      const time = tx.date.getTime();
      return time >= from && time <= to;
    });
  }
}

function toTransaction(record: LedgerRecord, row: number, dateFormat: string): Transaction {
  const date = parseLedgerDate(record.date, dateFormat);
  if (!date) {
    throw new MalformedRecordError(row, 'date', record.date);
  }

  const amountText = record.amount.trim();
  const amount = Number(amountText);
  if (amountText === '' || !Number.isFinite(amount)) {
    throw new MalformedRecordError(row, 'amount', record.amount);
  }

  const category = record.category.trim();
  if (!isTransactionCategory(category)) {
    throw new MalformedRecordError(row, 'category', record.category);
  }

  return { date, amount, category, description: record.description };
}
