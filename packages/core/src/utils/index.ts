export { toKeyFields, hasField, pickFields, omitFields } from './records.js';
export { formatTimestamp, formatSqlTimestamp, parseTimestamp, isEndOfTime, laterOf } from './timestamps.js';
export { resolveHistoryColumns, parseFlag } from './history.js';
