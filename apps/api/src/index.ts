import { serve } from '@hono/node-server';
import { createLogger } from '@tally/observability';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { createServices } from './services/index.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });
const { ledgerService } = createServices(config);

const created = await ledgerService.initialize();
logger.info({ filePath: config.ledgerFilePath, created }, 'Ledger ready');

const app = createApp({ ledgerService, logger });

logger.info({ port: config.port }, 'Starting server');

serve({
  fetch: app.fetch,
  port: config.port,
});

logger.info({ port: config.port }, 'Server running');
