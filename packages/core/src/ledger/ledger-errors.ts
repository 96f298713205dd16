/**
 * Ledger Domain Errors
 *
 * Thrown by the ledger repository and service, mapped to HTTP status codes by route handlers
 */

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LedgerError';
  }
}

export class StorageUnavailableError extends LedgerError {
  readonly filePath: string;

  constructor(filePath: string, operation: string, options?: ErrorOptions) {
    super(`Cannot ${operation} ledger file: ${filePath}`, options);
    this.name = 'StorageUnavailableError';
    this.filePath = filePath;
  }
}

export class MalformedRecordError extends LedgerError {
  /** 1-based index of the data row (header excluded) */
  readonly row: number;
  readonly field: string;
  readonly value: string;

  constructor(row: number, field: string, value: string) {
    super(`Malformed ledger record at row ${row}: invalid ${field} "${value}"`);
    this.name = 'MalformedRecordError';
    this.row = row;
    this.field = field;
    this.value = value;
  }
}

export class InvalidRangeError extends LedgerError {
  constructor(message = 'Start date cannot be after end date.') {
    super(message);
    this.name = 'InvalidRangeError';
  }
}
