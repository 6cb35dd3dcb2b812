export { HistoryAuditor, auditHistory } from './history-auditor.js';
