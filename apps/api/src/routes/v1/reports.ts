/**
 * GET /v1/reports - Summary metrics and chart series for a date range
 *
 * Same range rules as GET /v1/transactions.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { assertValidRange, buildReport } from '@tally/core';
import { TransactionRangeQuerySchema } from '@tally/types';
import { resolveDateRange, serializeRange } from '../../lib/date-range.js';
import { mapLedgerError } from '../../lib/ledger-errors.js';
import { toBreakdownResponse } from '../../lib/transactions.js';
import type { AppBindings } from '../../types/context.js';

const reportsRoute = new Hono<AppBindings>();

reportsRoute.get('/', zValidator('query', TransactionRangeQuerySchema), async (c) => {
  const range = resolveDateRange(c.req.valid('query'));

  try {
    assertValidRange(range);
    const transactions = await c.get('ledgerService').getTransactions(range);
    const report = buildReport(transactions);

    return c.json({
      range: serializeRange(range),
      count: transactions.length,
      summary: report.summary,
      timeSeries: report.timeSeries,
      categoryBreakdown: toBreakdownResponse(report.categoryBreakdown),
    });
  } catch (error) {
    const mapped = mapLedgerError(error);
    if (mapped) {
      c.get('logger').warn({ err: error, range: serializeRange(range) }, 'Report request rejected');
      return c.json({ error: mapped.message }, mapped.status);
    }
    throw error;
  }
});

export { reportsRoute };
