import { z } from 'zod';
import { DEFAULT_LEDGER_FILE } from '@tally/core';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LEDGER_FILE_PATH: z.string().min(1).default(DEFAULT_LEDGER_FILE),
});

export type ApiConfig = Readonly<{
  port: number;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  ledgerFilePath: string;
}>;

/**
 * Build the API configuration from environment variables.
 * Empty values count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = EnvSchema.safeParse(present);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid configuration: ${errors}`);
  }

  return Object.freeze({
    port: result.data.PORT,
    logLevel: result.data.LOG_LEVEL,
    ledgerFilePath: result.data.LEDGER_FILE_PATH,
  });
}
