import path from 'path';
import { z } from 'zod';
import { AuthenticationError, ValidationError } from './api/errors';
import type { ClientConfig } from './api/types';

export type Env = Record<string, string | undefined>;

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const flag = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform(value => value !== undefined && ['true', '1', 'yes'].includes(value.trim().toLowerCase())),
);

const intWithDefault = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const identifier = z.string().trim().regex(IDENTIFIER, { message: 'must be a plain SQL identifier' });

function toValidationError(error: z.ZodError, source: string): ValidationError {
  const issues = error.issues.map(issue => ({ field: issue.path.join('.'), message: issue.message }));
  const fields = issues.map(issue => issue.field).join(', ');
  return new ValidationError(`Invalid ${source}: ${fields}`, {
    field: issues[0]?.field,
    issues,
  });
}

const clientEnvSchema = z.object({
  AMPLITUDE_API_KEY: optionalString,
  AMPLITUDE_SECRET_KEY: optionalString,
  AMPLITUDE_ACCESS_TOKEN: optionalString,
  AMPLITUDE_REGION: z.preprocess(blankToUndefined, z.enum(['standard', 'eu']).default('standard')),
  AMPLITUDE_TIMEOUT: intWithDefault(30, 1),
  AMPLITUDE_MAX_RETRIES: intWithDefault(3, 0, 10),
  AMPLITUDE_DEBUG: flag,
});

/**
 * Reads AMPLITUDE_* variables. Throws AuthenticationError when neither an
 * API key nor an access token is set.
 */
export function loadClientConfig(env: Env): ClientConfig {
  const parsed = clientEnvSchema.safeParse(env);
  if (!parsed.success) throw toValidationError(parsed.error, 'Amplitude configuration');
  const vars = parsed.data;

  if (!vars.AMPLITUDE_API_KEY && !vars.AMPLITUDE_ACCESS_TOKEN) {
    throw new AuthenticationError('Missing Amplitude credentials. Set AMPLITUDE_API_KEY environment variable.', {
      envVars: ['AMPLITUDE_API_KEY', 'AMPLITUDE_ACCESS_TOKEN'],
      suggestion: 'Set AMPLITUDE_API_KEY in your .env file',
    });
  }

  return {
    apiKey: vars.AMPLITUDE_API_KEY,
    secretKey: vars.AMPLITUDE_SECRET_KEY,
    accessToken: vars.AMPLITUDE_ACCESS_TOKEN,
    region: vars.AMPLITUDE_REGION,
    timeoutSeconds: vars.AMPLITUDE_TIMEOUT,
    maxRetries: vars.AMPLITUDE_MAX_RETRIES,
    debug: vars.AMPLITUDE_DEBUG,
  };
}

export const IDENTIFY_OPERATIONS = [
  '$set',
  '$setOnce',
  '$add',
  '$append',
  '$prepend',
  '$preInsert',
  '$postInsert',
  '$remove',
] as const;

export type IdentifyOperation = (typeof IDENTIFY_OPERATIONS)[number];

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
}

export interface ExportJobConfig {
  start: string;
  end: string;
  table: string;
  manifestPath: string;
  incremental: boolean;
}

export interface IdentifyJobConfig {
  sourceTable: string;
  userIdColumn: string;
  propertyColumns: string[];
  operation: IdentifyOperation;
  chunkSize: number;
  pauseMs: number;
}

export type ExtractorConfig =
  | { mode: 'export'; db: DbConfig; job: ExportJobConfig }
  | { mode: 'identify'; db: DbConfig; job: IdentifyJobConfig };

const extractorEnvSchema = z.object({
  EXTRACTOR_MODE: z.preprocess(blankToUndefined, z.enum(['export', 'identify']).default('export')),
  EXPORT_START: optionalString,
  EXPORT_END: optionalString,
  OUTPUT_TABLE: z.preprocess(blankToUndefined, identifier.default('amplitude_events')),
  OUTPUT_DIR: z.preprocess(blankToUndefined, z.string().default('out')),
  MANIFEST_PATH: optionalString,
  INCREMENTAL: flag,
  IDENTIFY_SOURCE_TABLE: z.preprocess(blankToUndefined, identifier.optional()),
  IDENTIFY_USER_ID_COLUMN: z.preprocess(blankToUndefined, identifier.default('user_id')),
  IDENTIFY_PROPERTY_COLUMNS: z.preprocess(
    blankToUndefined,
    z
      .string()
      .transform(value => value.split(',').map(column => column.trim()).filter(Boolean))
      .pipe(z.array(identifier).min(1))
      .optional(),
  ),
  IDENTIFY_OPERATION: z.preprocess(blankToUndefined, z.enum(IDENTIFY_OPERATIONS).default('$set')),
  IDENTIFY_CHUNK_SIZE: intWithDefault(2000, 1, 2000),
  IDENTIFY_PAUSE_MS: intWithDefault(1000, 0),
  DB_HOST: z.preprocess(blankToUndefined, z.string().default('localhost')),
  DB_PORT: intWithDefault(5432, 1, 65535),
  DB_USER: z.preprocess(blankToUndefined, z.string().default('postgres')),
  DB_PASSWORD: z.preprocess(blankToUndefined, z.string().default('postgres')),
  DB_NAME: z.preprocess(blankToUndefined, z.string().default('warehouse')),
});

function requireVar(value: string | undefined, name: string, mode: string): string {
  if (value === undefined) {
    throw new ValidationError(`${name} is required in ${mode} mode`, { field: name });
  }
  return value;
}

export function loadExtractorConfig(env: Env): ExtractorConfig {
  const parsed = extractorEnvSchema.safeParse(env);
  if (!parsed.success) throw toValidationError(parsed.error, 'extractor configuration');
  const vars = parsed.data;

  const db: DbConfig = {
    host: vars.DB_HOST,
    port: vars.DB_PORT,
    user: vars.DB_USER,
    password: vars.DB_PASSWORD,
    database: vars.DB_NAME,
  };

  if (vars.EXTRACTOR_MODE === 'identify') {
    const propertyColumns = vars.IDENTIFY_PROPERTY_COLUMNS;
    if (!propertyColumns) {
      throw new ValidationError('IDENTIFY_PROPERTY_COLUMNS is required in identify mode', {
        field: 'IDENTIFY_PROPERTY_COLUMNS',
        suggestion: 'Comma separated column names, e.g. plan,country',
      });
    }
    return {
      mode: 'identify',
      db,
      job: {
        sourceTable: requireVar(vars.IDENTIFY_SOURCE_TABLE, 'IDENTIFY_SOURCE_TABLE', 'identify'),
        userIdColumn: vars.IDENTIFY_USER_ID_COLUMN,
        propertyColumns,
        operation: vars.IDENTIFY_OPERATION,
        chunkSize: vars.IDENTIFY_CHUNK_SIZE,
        pauseMs: vars.IDENTIFY_PAUSE_MS,
      },
    };
  }

  return {
    mode: 'export',
    db,
    job: {
      start: requireVar(vars.EXPORT_START, 'EXPORT_START', 'export'),
      end: requireVar(vars.EXPORT_END, 'EXPORT_END', 'export'),
      table: vars.OUTPUT_TABLE,
      manifestPath: vars.MANIFEST_PATH ?? path.join(vars.OUTPUT_DIR, `${vars.OUTPUT_TABLE}.manifest.json`),
      incremental: vars.INCREMENTAL,
    },
  };
}
