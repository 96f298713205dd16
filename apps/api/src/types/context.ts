import type { LedgerService } from '@tally/core';
import type { Logger } from '@tally/observability';

/**
 * Shared Hono context variables for API requests
 */
export type ContextVariables = {
  requestId: string;
  logger: Logger;
  ledgerService: LedgerService;
};

export type AppBindings = {
  Variables: ContextVariables;
};
