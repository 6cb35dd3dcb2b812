/**
 * @histrack/cli
 *
 * Configuration loading and the histrack command
 */

export {
  ConfigError,
  configFileSchema,
  sourceEntrySchema,
  historyEntrySchema,
  runSchema,
  loggingSchema,
  expandEnvVars,
  formatZodError,
  parseConfig,
  loadConfig,
} from './config.js';
export type {
  ConfigFile,
  SourceEntry,
  HistoryEntry,
  RunSettings,
  EnvExpansionOptions,
} from './config.js';

export { createSource, createHistoryStore } from './connector-factory.js';
export { JsonlRunReporter, toRunLogEntry } from './reporter.js';
export type { RunLogEntry } from './reporter.js';

export {
  runCli,
  parseArgs,
  USAGE,
  EXIT_OK,
  EXIT_FAILURE,
  EXIT_INCONSISTENT,
  EXIT_ABORTED,
} from './command.js';
export type { CliArgs, CliIo } from './command.js';
