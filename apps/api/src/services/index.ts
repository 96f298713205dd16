/**
 * Service Registry
 *
 * Creates the ledger repository and service from the API configuration
 */

import { LedgerRepository, LedgerService, createLedgerConfig } from '@tally/core';
import type { ApiConfig } from '../config.js';

export interface Services {
  ledgerService: LedgerService;
}

export function createServices(config: ApiConfig): Services {
  const ledgerConfig = createLedgerConfig(config.ledgerFilePath);
  const ledgerService = new LedgerService(new LedgerRepository(ledgerConfig), ledgerConfig);

  return { ledgerService };
}
