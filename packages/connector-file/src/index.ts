/**
 * @histrack/connector-file
 *
 * File-based snapshot sources for CSV and JSON files
 */

export { BaseFileSource, FORBIDDEN_RECORD_KEYS } from './base-file-source.js';
export type { FileSourceConfig } from './base-file-source.js';

export { CsvSource, createCsvSource } from './csv-source.js';
export type { CsvSourceConfig } from './csv-source.js';

export { JsonSource, createJsonSource } from './json-source.js';
export type { JsonSourceConfig } from './json-source.js';
