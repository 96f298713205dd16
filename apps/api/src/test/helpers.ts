/**
 * HTTP test helpers
 * Builds an app around a ledger in a temporary directory and sends requests to it
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LedgerRepository, LedgerService, createLedgerConfig } from '@tally/core';
import { createLogger } from '@tally/observability';
import { createApp } from '../app.js';
import type { App } from '../app.js';

export interface RequestOptions {
  /** JSON body */
  body?: unknown;
  /** Form-encoded body */
  form?: Record<string, string>;
  headers?: Record<string, string>;
}

export interface TestContext {
  app: App;
  filePath: string;
  ledgerRepository: LedgerRepository;
  ledgerService: LedgerService;
  cleanup: () => Promise<void>;
}

/**
 * Create an initialized ledger in a fresh temp directory and an app using it
 */
export async function createTestContext(): Promise<TestContext> {
  const dir = await mkdtemp(join(tmpdir(), 'tally-api-'));
  const filePath = join(dir, 'finance_data.csv');
  const config = createLedgerConfig(filePath);
  const ledgerRepository = new LedgerRepository(config);
  const ledgerService = new LedgerService(ledgerRepository, config);
  await ledgerService.initialize();

  const app = createApp({ ledgerService, logger: createLogger({ level: 'silent' }) });

  return {
    app,
    filePath,
    ledgerRepository,
    ledgerService,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/**
 * Make an HTTP request to the Hono app
 */
export async function makeRequest(
  app: App,
  method: string,
  path: string,
  options: RequestOptions = {}
): Promise<Response> {
  const { body, form, headers = {} } = options;

  const init: RequestInit = { method: method.toUpperCase(), headers: { ...headers } };

  if (form !== undefined) {
    init.body = new URLSearchParams(form).toString();
    init.headers = { 'Content-Type': 'application/x-www-form-urlencoded', ...headers };
  } else if (body !== undefined) {
    init.body = JSON.stringify(body);
    init.headers = { 'Content-Type': 'application/json', ...headers };
  }

  return app.fetch(new Request(`http://localhost${path}`, init));
}
