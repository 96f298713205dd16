import {
  InvalidRangeError,
  MalformedRecordError,
  StorageUnavailableError,
} from '@tally/core';

export type LedgerErrorStatus = 400 | 422 | 503;

export interface LedgerErrorResponse {
  status: LedgerErrorStatus;
  message: string;
}

/**
 * Map a ledger domain error to an HTTP status and user-facing message.
 * Returns null for anything else, which callers rethrow.
 */
export function mapLedgerError(error: unknown): LedgerErrorResponse | null {
  if (error instanceof InvalidRangeError) {
    return { status: 400, message: error.message };
  }
  if (error instanceof MalformedRecordError) {
    return { status: 422, message: error.message };
  }
  if (error instanceof StorageUnavailableError) {
    return { status: 503, message: 'Ledger storage is unavailable' };
  }
  return null;
}
