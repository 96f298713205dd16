/**
 * Transaction routes
 * Handles ledger appends and range retrieval
 */

import { Hono } from 'hono';
import { createTransactionRoute } from './create.js';
import { listTransactionsRoute } from './list.js';
import type { AppBindings } from '../../../types/context.js';

const transactionsRoute = new Hono<AppBindings>();

transactionsRoute.route('/', createTransactionRoute);
transactionsRoute.route('/', listTransactionsRoute);

export { transactionsRoute };
