/**
 * POST /v1/transactions - Append a transaction to the ledger
 *
 * Body: { date: YYYY-MM-DD, amount >= 0.01, category: Income | Expense, description }
 * Returns 201 with the stored transaction
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { CreateTransactionSchema } from '@tally/types';
import { mapLedgerError } from '../../../lib/ledger-errors.js';
import { toTransactionResponse } from '../../../lib/transactions.js';
import type { AppBindings } from '../../../types/context.js';

const createTransactionRoute = new Hono<AppBindings>();

createTransactionRoute.post('/', zValidator('json', CreateTransactionSchema), async (c) => {
  const entry = c.req.valid('json');
  const log = c.get('logger');

  try {
    const transaction = await c.get('ledgerService').addEntry(entry);
    log.info({ category: transaction.category, amount: transaction.amount }, 'Transaction added');

    return c.json({ transaction: toTransactionResponse(transaction) }, 201);
  } catch (error) {
    const mapped = mapLedgerError(error);
    if (mapped) {
      log.error({ err: error }, 'Failed to add transaction');
      return c.json({ error: mapped.message }, mapped.status);
    }
    throw error;
  }
});

export { createTransactionRoute };
