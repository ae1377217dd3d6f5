/**
 * Environment Configuration Management
 *
 * Merges dotenv-loaded environment variables with command-line overrides into
 * a typed configuration. Endpoints are immutable once built.
 */

import * as dotenv from 'dotenv';
import { DumpFormat, EndpointRole, OverwriteMode } from '../models/migration-models';
import { ConfigurationError } from './error-handler';

// Load environment variables
dotenv.config();

export const DEFAULT_PORT = 5432;
export const DEFAULT_WORK_DIR = './migration_temp';
export const DEFAULT_ADMIN_DATABASE = 'postgres';

/**
 * One of the two servers taking part in a migration
 */
export interface ServerEndpoint {
  readonly role: EndpointRole;
  readonly host: string;
  readonly port: number;
  readonly user: string;
  readonly password: string;
}

export interface LoggingConfig {
  level: string;
  format: 'text' | 'json';
  enableFileLogging: boolean;
  logDirectory: string;
}

export interface ToolPaths {
  pgDump?: string;
  psql?: string;
}

/**
 * Complete application configuration
 */
export interface AppConfig {
  source: ServerEndpoint;
  destination: ServerEndpoint;
  adminDatabase: string;
  dumpFormat: DumpFormat;
  overwriteMode: OverwriteMode;
  restoreStopOnError: boolean;
  workDir: string;
  tools: ToolPaths;
  connectionTimeoutMillis?: number;
}

/**
 * Values supplied on the command line; each falls back to the environment
 */
export interface ConfigOverrides {
  sourceHost?: string;
  sourceUser?: string;
  sourcePassword?: string;
  destHost?: string;
  destUser?: string;
  destPassword?: string;
  port?: number | string;
  useInserts?: boolean;
  workDir?: string;
  overwriteMode?: string;
}

type Env = Record<string, string | undefined>;

function parsePort(value: number | string | undefined): number {
  if (value === undefined || value === '') {
    return DEFAULT_PORT;
  }
  return typeof value === 'number' ? value : Number(value);
}

function parseOverwriteMode(value: string | undefined): OverwriteMode {
  switch (value) {
    case undefined:
    case '':
    case OverwriteMode.OVERLAY:
      return OverwriteMode.OVERLAY;
    case OverwriteMode.REPLACE:
      return OverwriteMode.REPLACE;
    default:
      throw new ConfigurationError(
        `Invalid overwrite mode: ${value}. Must be one of: ${Object.values(OverwriteMode).join(', ')}`,
        { overwrite_mode: value }
      );
  }
}

/**
 * Builds the configuration from overrides and environment
 */
export function createConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  const port = parsePort(overrides.port ?? env.DB_PORT);
  const timeout = env.DB_CONNECTION_TIMEOUT ? parseInt(env.DB_CONNECTION_TIMEOUT) : undefined;

  return {
    source: {
      role: 'source',
      host: overrides.sourceHost || env.SOURCE_DB_HOST || '',
      port,
      user: overrides.sourceUser || env.SOURCE_DB_USER || 'postgres',
      password: overrides.sourcePassword || env.SOURCE_DB_PASSWORD || ''
    },
    destination: {
      role: 'destination',
      host: overrides.destHost || env.TARGET_DB_HOST || '',
      port,
      user: overrides.destUser || env.TARGET_DB_USER || 'postgres',
      password: overrides.destPassword || env.TARGET_DB_PASSWORD || ''
    },
    adminDatabase: env.ADMIN_DB_NAME || DEFAULT_ADMIN_DATABASE,
    dumpFormat: overrides.useInserts || env.USE_INSERTS === 'true' ? DumpFormat.INSERTS : DumpFormat.COPY,
    overwriteMode: parseOverwriteMode(overrides.overwriteMode ?? env.OVERWRITE_MODE),
    restoreStopOnError: env.RESTORE_STOP_ON_ERROR === 'true',
    workDir: overrides.workDir || env.MIGRATION_WORK_DIR || DEFAULT_WORK_DIR,
    tools: {
      pgDump: env.PG_DUMP_PATH || undefined,
      psql: env.PSQL_PATH || undefined
    },
    connectionTimeoutMillis: timeout
  };
}

/**
 * Validates the configuration and throws descriptive errors for issues
 */
export function validateConfig(cfg: AppConfig): void {
  const missing: string[] = [];
  if (!cfg.source.host) missing.push('--source-host');
  if (!cfg.source.password) missing.push('--source-password');
  if (!cfg.destination.host) missing.push('--dest-host');
  if (!cfg.destination.password) missing.push('--dest-password');

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required settings: ${missing.join(', ')}`, { missing });
  }

  if (!Number.isInteger(cfg.source.port) || cfg.source.port < 1 || cfg.source.port > 65535) {
    throw new ConfigurationError(`Invalid database port: ${cfg.source.port}`);
  }
}

/**
 * Returns a safe configuration object for logging (with sensitive data masked)
 */
export function getConfigForLogging(cfg: AppConfig): Record<string, unknown> {
  return {
    ...cfg,
    source: { ...cfg.source, password: '***masked***' },
    destination: { ...cfg.destination, password: '***masked***' }
  };
}

export function getLoggingConfig(env: Env = process.env): LoggingConfig {
  return {
    level: env.LOG_LEVEL || 'warn',
    format: env.LOG_FORMAT === 'json' ? 'json' : 'text',
    enableFileLogging: env.ENABLE_FILE_LOGGING === 'true',
    logDirectory: env.LOG_DIRECTORY || './logs'
  };
}

let config: AppConfig | null = null;

/**
 * Builds, validates and stores the process-wide configuration
 */
export function initializeConfig(overrides: ConfigOverrides = {}): AppConfig {
  const cfg = createConfig(overrides);
  validateConfig(cfg);
  config = cfg;
  return cfg;
}

/**
 * Gets the configuration stored by initializeConfig
 */
export function getConfig(): AppConfig {
  if (!config) {
    throw new ConfigurationError('Configuration has not been initialized');
  }
  return config;
}
