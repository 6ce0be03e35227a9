/**
 * Output module exports
 */

export { formatReport, formatJSON, formatDTS, summarize } from './formatter.js';
export type { FunctionSummary, FailureSummary } from './formatter.js';
