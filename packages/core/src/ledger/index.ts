/**
 * Ledger Domain
 *
 * Exports the ledger repository, service, errors, and types.
 */

export { LedgerRepository } from './ledger-repository.js';

export {
  LedgerService,
  assertValidRange,
  formatLedgerDate,
  parseLedgerDate,
} from './ledger-service.js';

export {
  LedgerError,
  StorageUnavailableError,
  MalformedRecordError,
  InvalidRangeError,
} from './ledger-errors.js';

export {
  LEDGER_COLUMNS,
  LEDGER_DATE_FORMAT,
  DEFAULT_LEDGER_FILE,
  TRANSACTION_CATEGORIES,
  createLedgerConfig,
  isTransactionCategory,
} from './ledger-types.js';
export type {
  Transaction,
  TransactionCategory,
  LedgerColumn,
  LedgerRecord,
  LedgerConfig,
  AddEntryParams,
  DateRangeParams,
} from './ledger-types.js';
