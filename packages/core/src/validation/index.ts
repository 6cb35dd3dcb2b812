export {
  SQL_IDENTIFIER,
  identifierSchema,
  businessKeySchema,
  hashAlgorithmSchema,
  historyColumnsSchema,
  engineConfigSchema,
  formatZodIssues,
} from './schemas.js';
export type {
  HashAlgorithm,
  EngineConfigInput,
  EngineConfig,
  HistoryColumnsInput,
} from './schemas.js';
