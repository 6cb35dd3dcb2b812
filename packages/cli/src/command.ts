/**
 * histrack command
 *
 * Usage:
 *   histrack --config ./histrack.json [--as-of <ISO timestamp>] [--dry-run | --audit]
 */

import { resolve } from 'node:path';
import type { IConnector } from '@histrack/core';
import { ConnectorError, Logger } from '@histrack/core';
import {
  HistoryAuditor,
  RunOrchestrator,
  ScdError,
  formatAuditReport,
  formatRunPreview,
  formatRunSummary,
} from '@histrack/engine';
import { ConfigError, loadConfig, type ConfigFile } from './config.js';
import { createHistoryStore, createSource } from './connector-factory.js';
import { JsonlRunReporter } from './reporter.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
/** --audit found overlapping or malformed versions */
export const EXIT_INCONSISTENT = 2;
export const EXIT_ABORTED = 130;

export const USAGE = [
  'Usage: histrack --config <config.json> [--as-of <timestamp>] [--dry-run | --audit]',
  '',
  'Options:',
  '  --config <file>     Pipeline configuration (JSON)',
  '  --as-of <time>      Pin the pass boundary (ISO-8601) instead of the clock',
  '  --dry-run           Classify the snapshot without writing history',
  '  --audit             Check the history table for interval problems',
  '  -h, --help          Show this help',
  '',
  'Source types: csv, json, postgresql, mysql, sqlite',
  'History types: postgresql, mysql, sqlite',
].join('\n');

export interface CliArgs {
  configPath?: string;
  asOf?: Date;
  dryRun: boolean;
  audit: boolean;
  help: boolean;
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Environment for ${VAR} expansion (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Cancels the pass up to the start of the merge */
  signal?: AbortSignal;
}

/**
 * @throws ConfigError on unknown or incomplete arguments
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, audit: false, help: false };

  const valueOf = (flag: string, index: number): string => {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
        args.configPath = valueOf(arg, i++);
        break;
      case '--as-of': {
        const raw = valueOf(arg, i++);
        const asOf = new Date(raw);
        if (Number.isNaN(asOf.getTime())) {
          throw new ConfigError(`Invalid --as-of timestamp: ${raw}`);
        }
        args.asOf = asOf;
        break;
      }
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--audit':
        args.audit = true;
        break;
      case '-h':
      case '--help':
        args.help = true;
        break;
      default:
        throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  if (args.dryRun && args.audit) {
    throw new ConfigError('--dry-run and --audit cannot be combined');
  }

  return args;
}

function describeError(error: unknown): string {
  if (error instanceof ScdError || error instanceof ConnectorError) {
    return error.toActionableMessage();
  }
  return error instanceof Error ? error.message : String(error);
}

async function execute(args: CliArgs, config: ConfigFile, io: CliIo, logger: Logger): Promise<number> {
  const connected: IConnector[] = [];

  try {
    const history = createHistoryStore(config.history, config.pipeline.businessKey);

    if (args.audit) {
      await history.connect();
      connected.push(history);
      const report = await new HistoryAuditor(history).audit();
      io.stdout(`${formatAuditReport(report)}\n`);
      return report.consistent ? EXIT_OK : EXIT_INCONSISTENT;
    }

    const source = createSource(config.source);
    const reportFile = config.run?.reportFile;
    const orchestrator = new RunOrchestrator(source, history, config.pipeline, {
      retry: config.run?.retry,
      extractTimeoutMs: config.run?.extractTimeoutMs,
      verifyLayout: config.run?.verifyLayout,
      logger,
      reporter: reportFile ? new JsonlRunReporter(resolve(process.cwd(), reportFile)) : undefined,
    });

    await source.connect();
    connected.push(source);
    await history.connect();
    connected.push(history);

    if (args.dryRun) {
      const preview = await orchestrator.preview({ asOf: args.asOf, signal: io.signal });
      io.stdout(`${formatRunPreview(preview)}\n`);
      return EXIT_OK;
    }

    const summary = await orchestrator.runOnce({ asOf: args.asOf, signal: io.signal });
    io.stdout(`${formatRunSummary(summary)}\n`);
    return EXIT_OK;
  } catch (error) {
    io.stderr(`${describeError(error)}\n`);
    return error instanceof ScdError && error.code === 'RUN_ABORTED' ? EXIT_ABORTED : EXIT_FAILURE;
  } finally {
    for (const connector of connected.reverse()) {
      try {
        await connector.disconnect();
      } catch (error) {
        logger.warn('Disconnect failed', { connectorId: connector.config.id, error });
      }
    }
  }
}

/**
 * Run the command and return its exit code
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    io.stderr(`${describeError(error)}\n\n${USAGE}\n`);
    return EXIT_FAILURE;
  }

  if (args.help || !args.configPath) {
    io.stderr(`${USAGE}\n`);
    return args.help ? EXIT_OK : EXIT_FAILURE;
  }

  let config: ConfigFile;
  try {
    config = await loadConfig(args.configPath, { env: io.env });
  } catch (error) {
    io.stderr(`${describeError(error)}\n`);
    return EXIT_FAILURE;
  }

  const logger = new Logger({
    level: config.logging?.level,
    format: config.logging?.format,
    write: io.stderr,
  }).child({ command: args.audit ? 'audit' : args.dryRun ? 'dry-run' : 'run' });

  return execute(args, config, io, logger);
}
