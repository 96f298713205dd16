/**
 * Reports Domain
 */

export { summarize, buildTimeSeries, buildCategoryBreakdown, buildReport } from './report-builder.js';
export type { LedgerSummary, TimeSeries, CategoryBreakdown, LedgerReport } from './report-types.js';
