/**
 * Transaction schemas for ledger entry and range queries
 * Used for request validation by the JSON API and the HTML form
 */

import { isValid, parseISO } from 'date-fns';
import { z } from 'zod';

/**
 * Calendar date as sent by <input type="date"> and JSON clients (YYYY-MM-DD),
 * parsed to local midnight
 */
export const CalendarDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .transform((value, ctx) => {
    const date = parseISO(value);
    if (!isValid(date)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calendar date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

export const TransactionCategorySchema = z.enum(['Income', 'Expense']);

/**
 * Request schema for adding a transaction
 * - amount: positive, at least 0.01 (strings are coerced so form posts validate too)
 * - description: optional free text, trimmed, up to 200 characters
 */
export const CreateTransactionSchema = z.object({
  date: CalendarDateSchema,
  amount: z.coerce
    .number({ invalid_type_error: 'Amount must be a number' })
    .finite('Amount must be a number')
    .min(0.01, 'Amount must be at least 0.01'),
  category: TransactionCategorySchema,
  description: z
    .string()
    .trim()
    .max(200, 'Description must be 200 characters or less')
    .default(''),
});

/**
 * Query schema for date-bounded retrieval. Missing bounds are filled in by the caller.
 */
export const TransactionRangeQuerySchema = z.object({
  start: CalendarDateSchema.optional(),
  end: CalendarDateSchema.optional(),
});

export type TransactionCategoryInput = z.infer<typeof TransactionCategorySchema>;
export type TransactionRangeQuery = z.output<typeof TransactionRangeQuerySchema>;

/**
 * JSON representation of a stored transaction
 */
export interface TransactionResponse {
  date: string; // YYYY-MM-DD
  amount: number;
  category: TransactionCategoryInput;
  description: string;
}
