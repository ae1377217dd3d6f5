/**
 * Dump/Restore Bridge
 *
 * Moves one database's contents through an intermediate SQL file. The
 * orchestrator only sees the DumpRestoreBridge capability; PgDumpRestoreBridge
 * implements it by running pg_dump against the source and psql against the
 * destination.
 *
 * Connection parameters and the password reach the utilities through the
 * child process environment (PGHOST, PGPORT, PGUSER, PGDATABASE, PGPASSWORD),
 * never through arguments visible in a process listing. The exit status is
 * the only success signal; stderr is passed through untouched.
 */

import * as fs from 'fs';
import { ServerEndpoint } from '../lib/environment-config';
import { ExportError, getLogger, ImportError, Logger, errorMessage } from '../lib/error-handler';
import { ProcessResult, runProcess } from '../lib/process-runner';
import { PostgresTools } from '../lib/tool-locator';
import { DumpFormat } from '../models/migration-models';

export interface DumpRestoreBridge {
  /** Writes the database to the artifact and returns the artifact size in bytes */
  exportDatabase(database: string, artifactPath: string, format: DumpFormat): Promise<number>;
  importDatabase(database: string, artifactPath: string): Promise<void>;
}

export interface PgBridgeOptions {
  source: ServerEndpoint;
  destination: ServerEndpoint;
  tools: PostgresTools;
  /** Make psql exit non-zero on the first failing statement */
  restoreStopOnError?: boolean;
  logger?: Logger;
}

type ProcessRunner = typeof runProcess;

/**
 * libpq environment for one utility invocation
 */
export function connectionEnvironment(endpoint: ServerEndpoint, database: string): Record<string, string> {
  return {
    PGHOST: endpoint.host,
    PGPORT: String(endpoint.port),
    PGUSER: endpoint.user,
    PGPASSWORD: endpoint.password,
    PGDATABASE: database
  };
}

export function buildDumpArgs(artifactPath: string, format: DumpFormat): string[] {
  const args = ['--file', artifactPath, '--no-password', '--verbose'];
  if (format === DumpFormat.INSERTS) {
    args.push('--inserts');
  }
  return args;
}

export function buildRestoreArgs(artifactPath: string, stopOnError: boolean): string[] {
  const args = ['--file', artifactPath, '--no-password'];
  if (stopOnError) {
    args.push('--set', 'ON_ERROR_STOP=1');
  }
  return args;
}

export class PgDumpRestoreBridge implements DumpRestoreBridge {
  private options: PgBridgeOptions;
  private logger: Logger;
  private run: ProcessRunner;

  constructor(options: PgBridgeOptions, run: ProcessRunner = runProcess) {
    this.options = options;
    this.logger = options.logger || getLogger();
    this.run = run;
  }

  async exportDatabase(database: string, artifactPath: string, format: DumpFormat): Promise<number> {
    const { pgDump } = this.options.tools;
    const args = buildDumpArgs(artifactPath, format);

    this.logger.debug('Running pg_dump', { database, artifact: artifactPath, format });

    let result: ProcessResult;
    try {
      result = await this.run(pgDump, args, {
        env: connectionEnvironment(this.options.source, database)
      });
    } catch (error) {
      throw new ExportError(`Backup failed: ${errorMessage(error)}`, null, '', { database, tool: pgDump });
    }

    if (!result.success) {
      throw new ExportError(`Backup failed: ${result.stderr}`, result.exitCode, result.stderr, { database });
    }

    try {
      return fs.statSync(artifactPath).size;
    } catch (error) {
      throw new ExportError(
        `Backup produced no artifact: ${errorMessage(error)}`,
        result.exitCode,
        result.stderr,
        { database, artifact: artifactPath }
      );
    }
  }

  async importDatabase(database: string, artifactPath: string): Promise<void> {
    const { psql } = this.options.tools;
    const args = buildRestoreArgs(artifactPath, this.options.restoreStopOnError === true);

    this.logger.debug('Running psql', { database, artifact: artifactPath });

    let result: ProcessResult;
    try {
      result = await this.run(psql, args, {
        env: connectionEnvironment(this.options.destination, database)
      });
    } catch (error) {
      throw new ImportError(`Restore failed: ${errorMessage(error)}`, null, '', { database, tool: psql });
    }

    if (!result.success) {
      throw new ImportError(`Restore failed: ${result.stderr}`, result.exitCode, result.stderr, { database });
    }
  }
}
