/**
 * @tally/types
 *
 * Shared request schemas and response types for the Tally API and UI.
 */

export * from './transaction.schema.js';
