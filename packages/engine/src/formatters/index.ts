/**
 * Formatters Module
 */

export { formatRunSummary, formatRunPreview, formatAuditReport } from './summary-formatter.js';
export { formatKey, formatDuration } from './utils.js';
