/**
 * HTML entry form and range dashboard
 *
 * GET /              - page with the form and the report for ?start=&end=
 * POST /transactions - form submission, redirects to /?added=1 on success
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { assertValidRange, buildReport } from '@tally/core';
import { CreateTransactionSchema, TransactionRangeQuerySchema } from '@tally/types';
import { formatApiDate, resolveDateRange } from '../lib/date-range.js';
import { mapLedgerError } from '../lib/ledger-errors.js';
import type { LedgerErrorStatus } from '../lib/ledger-errors.js';
import { renderDashboardPage } from '../views/dashboard-page.js';
import type { DashboardResult } from '../views/dashboard-page.js';
import type { AppBindings } from '../types/context.js';

interface RenderOptions {
  added?: boolean;
  formErrors?: string[];
  status?: 200 | LedgerErrorStatus;
}

const dashboardRoute = new Hono<AppBindings>();

async function loadResult(
  c: Context<AppBindings>
): Promise<{ result: DashboardResult; range: { start: string; end: string }; status?: LedgerErrorStatus }> {
  const rawQuery = { start: c.req.query('start') || undefined, end: c.req.query('end') || undefined };
  const parsed = TransactionRangeQuerySchema.safeParse(rawQuery);
  const fallback = resolveDateRange({});

  if (!parsed.success) {
    return {
      result: { kind: 'error', message: 'Error: Dates must be in YYYY-MM-DD format.' },
      range: { start: formatApiDate(fallback.startDate), end: formatApiDate(fallback.endDate) },
      status: 400,
    };
  }

  const range = resolveDateRange(parsed.data);
  const inputs = { start: formatApiDate(range.startDate), end: formatApiDate(range.endDate) };

  try {
    assertValidRange(range);
    const transactions = await c.get('ledgerService').getTransactions(range);
    if (transactions.length === 0) {
      return { result: { kind: 'empty' }, range: inputs };
    }
    return {
      result: {
        kind: 'report',
        startDate: range.startDate,
        endDate: range.endDate,
        transactions,
        report: buildReport(transactions),
      },
      range: inputs,
    };
  } catch (error) {
    const mapped = mapLedgerError(error);
    if (!mapped) throw error;

    c.get('logger').warn({ err: error, range: inputs }, 'Dashboard query failed');
    return {
      result: { kind: 'error', message: `Error: ${mapped.message}` },
      range: inputs,
      ...(mapped.status !== 400 && { status: mapped.status }),
    };
  }
}

async function renderDashboard(c: Context<AppBindings>, options: RenderOptions = {}) {
  const { result, range, status } = await loadResult(c);

  const page = renderDashboardPage({
    today: formatApiDate(new Date()),
    added: options.added ?? false,
    formErrors: options.formErrors ?? [],
    range,
    result,
  });

  return c.html(page, options.status ?? status ?? 200);
}

dashboardRoute.get('/', (c) => renderDashboard(c, { added: c.req.query('added') === '1' }));

dashboardRoute.post(
  '/transactions',
  zValidator<typeof CreateTransactionSchema, 'form', AppBindings, '/transactions'>('form', CreateTransactionSchema, (result, c) => {
    if (!result.success) {
      const formErrors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
      return renderDashboard(c, { formErrors, status: 400 });
    }
  }),
  async (c) => {
    const entry = c.req.valid('form');
    const log = c.get('logger');

    try {
      await c.get('ledgerService').addEntry(entry);
      log.info({ category: entry.category, amount: entry.amount }, 'Transaction added');
    } catch (error) {
      const mapped = mapLedgerError(error);
      if (!mapped) throw error;

      log.error({ err: error }, 'Failed to add transaction');
      return renderDashboard(c, { formErrors: [mapped.message], status: mapped.status });
    }

    return c.redirect('/?added=1', 303);
  }
);

export { dashboardRoute };
