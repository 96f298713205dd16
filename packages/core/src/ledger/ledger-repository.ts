/**
 * Ledger Repository
 *
 * File access for the ledger. Reads and writes raw text records
 * with no date parsing or filtering.
 */

import { appendFile, readFile, writeFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { MalformedRecordError, StorageUnavailableError } from './ledger-errors.js';
import type { LedgerConfig, LedgerRecord } from './ledger-types.js';

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class LedgerRepository {
  constructor(private readonly config: LedgerConfig) {}

  /**
   * Create the ledger file with its header line if it does not exist.
   * An existing file is left untouched.
   */
  async initialize(): Promise<boolean> {
    try {
      await writeFile(this.config.filePath, `${this.config.columns.join(',')}\n`, {
        encoding: 'utf8',
        flag: 'wx',
      });
      return true;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        return false;
      }
      throw new StorageUnavailableError(this.config.filePath, 'create', { cause: error });
    }
  }

  /**
   * Append one record as a single CSV line
   */
  async append(record: LedgerRecord): Promise<void> {
    const line = Papa.unparse([this.config.columns.map((column) => record[column])], {
      header: false,
      newline: '\n',
    });

    try {
      await appendFile(this.config.filePath, `${line}\n`, 'utf8');
    } catch (error) {
      throw new StorageUnavailableError(this.config.filePath, 'append to', { cause: error });
    }
  }

  /**
   * Read every data row, in file order. A missing trailing cell reads as an
   * empty string; unbalanced quotes or extra fields fail the whole read.
   *
   * @throws MalformedRecordError
   */
  async readAll(): Promise<LedgerRecord[]> {
    let content: string;
    try {
      content = await readFile(this.config.filePath, 'utf8');
    } catch (error) {
      throw new StorageUnavailableError(this.config.filePath, 'read', { cause: error });
    }

    const { data, errors } = Papa.parse<Partial<Record<string, string>>>(normalizeLineEndings(content), {
      header: true,
      delimiter: ',',
      newline: '\n',
      skipEmptyLines: true,
    });

    const fatal = errors.find((error) => error.code !== 'TooFewFields');
    if (fatal) {
      const row = fatal.row !== undefined ? fatal.row + 1 : Math.max(data.length, 1);
      throw new MalformedRecordError(row, fatal.type === 'Quotes' ? 'quoting' : 'field count', fatal.message);
    }

    return data.map((row) => ({
      date: row.date ?? '',
      amount: row.amount ?? '',
      category: row.category ?? '',
      description: row.description ?? '',
    }));
  }
}

/**
 * CRLF row breaks become LF. Line breaks inside quoted fields are kept as written.
 */
function normalizeLineEndings(content: string): string {
  return content.replace(/"(?:[^"]|"")*"|\r\n/g, (match) => (match === '\r\n' ? '\n' : match));
}
