/**
 * @tally/observability
 *
 * Structured logging for the Tally API, built on Pino.
 */

export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
