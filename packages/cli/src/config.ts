import { z } from 'zod';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { engineConfigSchema, historyColumnsSchema, identifierSchema } from '@histrack/core';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type EnvExpansionOptions = {
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
  /** Variables to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;

  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand ${NAME} and ${NAME:-default} in every string of a parsed JSON value
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

const encodingSchema = z.enum(['utf-8', 'utf8', 'utf16le', 'latin1', 'ascii']);

const sslSchema = z.union([
  z.boolean(),
  z.object({ rejectUnauthorized: z.boolean().optional() }).strict(),
]);

const connectorBase = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
});

const postgresConnection = {
  connectionString: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  ssl: sslSchema.optional(),
  max: z.number().int().min(1).max(100).optional(),
  connectionTimeoutMs: z.number().int().min(1).max(300_000).optional(),
  statementTimeoutMs: z.number().int().min(1).max(3_600_000).optional(),
};

const mysqlConnection = {
  uri: z.string().min(1).optional(),
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  ssl: sslSchema.optional(),
  connectionLimit: z.number().int().min(1).max(100).optional(),
  connectTimeoutMs: z.number().int().min(1).max(300_000).optional(),
};

const sqliteConnection = {
  filename: z.string().min(1),
  busyTimeoutMs: z.number().int().min(0).max(300_000).optional(),
};

const tableSource = {
  table: identifierSchema,
  columns: z.array(identifierSchema).min(1).optional(),
  orderBy: z.array(identifierSchema).min(1).optional(),
};

const fileSourceBase = connectorBase.extend({
  filePath: z.string().min(1),
  encoding: encodingSchema.optional(),
});

const csvSource = fileSourceBase
  .extend({
    type: z.literal('csv'),
    delimiter: z.string().min(1).optional(),
    headers: z.boolean().optional(),
    quote: z.string().min(1).optional(),
    skipEmptyLines: z.boolean().optional(),
    castNumbers: z.boolean().optional(),
    emptyAsNull: z.boolean().optional(),
  })
  .strict();

const jsonSource = fileSourceBase
  .extend({
    type: z.literal('json'),
    recordsPath: z.string().min(1).optional(),
  })
  .strict();

const postgresSource = connectorBase
  .extend({ type: z.literal('postgresql'), ...postgresConnection, ...tableSource, schema: identifierSchema.optional() })
  .strict();

const mysqlSource = connectorBase
  .extend({ type: z.literal('mysql'), ...mysqlConnection, ...tableSource })
  .strict();

const sqliteSource = connectorBase
  .extend({ type: z.literal('sqlite'), ...sqliteConnection, ...tableSource })
  .strict();

export const sourceEntrySchema = z.discriminatedUnion('type', [
  csvSource,
  jsonSource,
  postgresSource,
  mysqlSource,
  sqliteSource,
]);

const historyTable = {
  table: identifierSchema,
  columns: historyColumnsSchema.optional(),
  timestampFormat: z.enum(['iso', 'sql']).optional(),
};

const postgresHistory = connectorBase
  .extend({ type: z.literal('postgresql'), ...postgresConnection, ...historyTable, schema: identifierSchema.optional() })
  .strict();

const mysqlHistory = connectorBase
  .extend({ type: z.literal('mysql'), ...mysqlConnection, ...historyTable })
  .strict();

const sqliteHistory = connectorBase
  .extend({ type: z.literal('sqlite'), ...sqliteConnection, ...historyTable })
  .strict();

export const historyEntrySchema = z.discriminatedUnion('type', [postgresHistory, mysqlHistory, sqliteHistory]);

export const runSchema = z
  .object({
    retry: z
      .object({
        attempts: z.number().int().min(1).max(10).optional(),
        baseDelayMs: z.number().int().min(0).max(60_000).optional(),
        maxDelayMs: z.number().int().min(0).max(300_000).optional(),
        jitter: z.number().min(0).max(1).optional(),
      })
      .strict()
      .optional(),
    extractTimeoutMs: z.number().int().min(1).max(3_600_000).optional(),
    verifyLayout: z.boolean().optional(),
    /** Append every committed summary to this JSON Lines file */
    reportFile: z.string().min(1).optional(),
  })
  .strict();

export const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    format: z.enum(['text', 'json']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    logging: loggingSchema.optional(),
    pipeline: engineConfigSchema,
    source: sourceEntrySchema,
    history: historyEntrySchema,
    run: runSchema.optional(),
  })
  .strict();

export type SourceEntry = z.infer<typeof sourceEntrySchema>;
export type HistoryEntry = z.infer<typeof historyEntrySchema>;
export type RunSettings = z.infer<typeof runSchema>;
export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatZodError(err: z.ZodError): string {
  const issues = err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
  return `Invalid config file:\n${issues}`;
}

/**
 * Validate configuration text (UTF-8 BOM tolerated)
 */
export function parseConfig(content: string, options?: EnvExpansionOptions): ConfigFile {
  // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
  const sanitized = content.replace(/^\uFEFF/, '');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sanitized);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed, options));
  if (!result.success) {
    throw new ConfigError(formatZodError(result.error));
  }
  return result.data;
}

export async function loadConfig(configPath: string, options?: EnvExpansionOptions): Promise<ConfigFile> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(content, options);
}
