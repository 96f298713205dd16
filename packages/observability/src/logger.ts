import pino from 'pino';

/**
 * Paths censored in every log line
 */
const REDACTION_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'headers.authorization',
  'headers.cookie',
];

export type Logger = pino.Logger;

/**
 * Create a structured JSON logger
 *
 * - level from LOG_LEVEL (default "info") unless overridden
 * - ISO 8601 timestamps
 * - `err` values serialized with message and stack
 *
 * Pass `destination` to capture output (tests); stdout otherwise.
 */
export function createLogger(
  options?: pino.LoggerOptions,
  destination?: pino.DestinationStream
): Logger {
  const config: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    redact: {
      paths: REDACTION_PATHS,
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
