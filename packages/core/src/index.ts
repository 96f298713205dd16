/**
 * @tally/core - Domain logic for the Tally finance ledger
 *
 * This package contains the ledger store and the report builder.
 * Report functions are pure and can be consumed by any UI layer.
 */

export * from './ledger/index.js';
export * from './reports/index.js';
