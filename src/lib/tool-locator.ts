/**
 * Locates the pg_dump and psql executables on the host
 */

import * as fs from 'fs';
import * as path from 'path';
import { runProcess } from './process-runner';
import { ConfigurationError, getLogger, Logger } from './error-handler';
import { ToolPaths } from './environment-config';

export interface PostgresTools {
  pgDump: string;
  psql: string;
}

export interface LocatorOptions {
  platform?: NodeJS.Platform;
  /** Directory patterns; a `*` segment matches any child directory */
  searchPatterns?: string[];
  logger?: Logger;
}

const UNIX_PATTERNS = ['/usr/bin', '/usr/local/bin', '/usr/lib/postgresql/*/bin', '/opt/postgresql/*/bin'];

const WINDOWS_PATTERNS = [
  'C:\\Program Files\\PostgreSQL\\*\\bin',
  'C:\\Program Files (x86)\\PostgreSQL\\*\\bin',
  'C:\\PostgreSQL\\*\\bin'
];

/**
 * Expand a directory pattern containing `*` segments into existing directories
 */
export function expandDirectoryPattern(pattern: string, pathApi: path.PlatformPath = path): string[] {
  const parts = pattern.split(/[\\/]/);
  let candidates = [parts[0] === '' ? pathApi.sep : parts[0] + pathApi.sep];

  for (const part of parts.slice(1)) {
    if (part === '') continue;

    const next: string[] = [];
    for (const base of candidates) {
      if (part !== '*') {
        next.push(pathApi.join(base, part));
        continue;
      }
      if (!fs.existsSync(base)) continue;

      fs.readdirSync(base, { withFileTypes: true })
        .filter(entry => entry.isDirectory())
        .map(entry => entry.name)
        .sort()
        .reverse() // newest major version first
        .forEach(name => next.push(pathApi.join(base, name)));
    }
    candidates = next;
  }

  return candidates.filter(dir => fs.existsSync(dir));
}

async function onPath(command: string): Promise<boolean> {
  try {
    const result = await runProcess(command, ['--version']);
    return result.success;
  } catch {
    return false;
  }
}

/**
 * Resolve the utilities: explicit paths first, then PATH, then the common
 * installation directories
 */
export async function locatePostgresTools(
  configured: ToolPaths = {},
  options: LocatorOptions = {}
): Promise<PostgresTools> {
  const logger = options.logger || getLogger();
  const platform = options.platform || process.platform;

  if (configured.pgDump && configured.psql) {
    logger.debug('Using configured PostgreSQL tools', { ...configured });
    return { pgDump: configured.pgDump, psql: configured.psql };
  }

  if (await onPath('pg_dump')) {
    logger.debug('Found PostgreSQL tools in PATH');
    return { pgDump: 'pg_dump', psql: 'psql' };
  }

  const isWindows = platform === 'win32';
  const pathApi = isWindows ? path.win32 : path.posix;
  const suffix = isWindows ? '.exe' : '';
  const patterns = options.searchPatterns || (isWindows ? WINDOWS_PATTERNS : UNIX_PATTERNS);

  for (const pattern of patterns) {
    for (const dir of expandDirectoryPattern(pattern, pathApi)) {
      const pgDump = pathApi.join(dir, `pg_dump${suffix}`);
      const psql = pathApi.join(dir, `psql${suffix}`);

      if (fs.existsSync(pgDump) && fs.existsSync(psql)) {
        logger.debug(`Found PostgreSQL tools at: ${dir}`);
        return { pgDump, psql };
      }
    }
  }

  throw new ConfigurationError(
    'PostgreSQL tools (pg_dump/psql) not found. Install PostgreSQL client tools, add them to PATH, ' +
      'or set PG_DUMP_PATH and PSQL_PATH.',
    { searched: patterns }
  );
}
