/**
 * GET /v1/transactions - Transactions within an inclusive date range
 *
 * Query: start, end (YYYY-MM-DD); default to the first of the current month and today.
 * A start after the end is rejected with 400 before the ledger is read.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { assertValidRange } from '@tally/core';
import { TransactionRangeQuerySchema } from '@tally/types';
import { resolveDateRange, serializeRange } from '../../../lib/date-range.js';
import { mapLedgerError } from '../../../lib/ledger-errors.js';
import { toTransactionResponse } from '../../../lib/transactions.js';
import type { AppBindings } from '../../../types/context.js';

const listTransactionsRoute = new Hono<AppBindings>();

listTransactionsRoute.get('/', zValidator('query', TransactionRangeQuerySchema), async (c) => {
  const range = resolveDateRange(c.req.valid('query'));
  const log = c.get('logger');

  try {
    assertValidRange(range);
    const transactions = await c.get('ledgerService').getTransactions(range);

    return c.json({
      range: serializeRange(range),
      transactions: transactions.map(toTransactionResponse),
    });
  } catch (error) {
    const mapped = mapLedgerError(error);
    if (mapped) {
      log.warn({ err: error, range: serializeRange(range) }, 'Transaction query rejected');
      return c.json({ error: mapped.message }, mapped.status);
    }
    throw error;
  }
});

export { listTransactionsRoute };
