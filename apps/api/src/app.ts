import { Hono } from 'hono';
import type { LedgerService } from '@tally/core';
import { logger as defaultLogger } from '@tally/observability';
import type { Logger } from '@tally/observability';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLoggerMiddleware } from './middleware/request-logger.js';
import { dashboardRoute } from './routes/dashboard.js';
import { healthRoute } from './routes/v1/health.js';
import { reportsRoute } from './routes/v1/reports.js';
import { transactionsRoute } from './routes/v1/transactions/index.js';
import type { AppBindings } from './types/context.js';

export interface AppServices {
  ledgerService: LedgerService;
  logger?: Logger;
}

/**
 * Build the Hono application around the given services
 */
export function createApp(services: AppServices) {
  const log = services.logger ?? defaultLogger;
  const app = new Hono<AppBindings>();

  // Apply request ID middleware first for log correlation
  app.use('*', requestIdMiddleware);
  app.use('*', requestLoggerMiddleware(log));

  app.use('*', async (c, next) => {
    c.set('ledgerService', services.ledgerService);
    await next();
  });

  app.onError((error, c) => {
    log.error({ err: error, requestId: c.get('requestId'), path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.route('/health', healthRoute);
  app.route('/', dashboardRoute);

  // Mount v1 routes
  const v1 = new Hono<AppBindings>();
  v1.route('/health', healthRoute);
  v1.route('/transactions', transactionsRoute);
  v1.route('/reports', reportsRoute);

  app.route('/v1', v1);

  return app;
}

export type App = ReturnType<typeof createApp>;
