/**
 * Console Reporter
 *
 * Human-readable output for the bulk migrator CLI. Every formatter returns
 * the lines to print so the CLI decides where they go.
 */

import chalk from 'chalk';
import { PostgresTools } from '../lib/tool-locator';
import {
  BatchPlan,
  BatchSummary,
  ConnectionTestResult,
  DumpFormat,
  JobState,
  MigrationJobResult,
  ServerComparison
} from '../models/migration-models';
import { JobTransitionEvent } from '../services/migration-orchestrator';

export function formatLabel(format: DumpFormat): string {
  return format === DumpFormat.INSERTS ? 'INSERT statements' : 'COPY statements';
}

function bullets(names: string[]): string[] {
  return names.map(name => `  - ${name}`);
}

export function formatTools(tools: PostgresTools, format: DumpFormat): string[] {
  return [
    chalk.green(`✓ Using pg_dump: ${tools.pgDump}`),
    chalk.green(`✓ Using psql: ${tools.psql}`),
    chalk.green(`✓ Dump format: ${formatLabel(format)}`)
  ];
}

export function formatConnectionResults(results: ConnectionTestResult[]): string[] {
  return results.map(result => {
    const label = result.role === 'source' ? 'Source' : 'Destination';
    if (result.success) {
      return chalk.green(`✓ ${label} connection successful (${result.host})`);
    }
    return chalk.red(`✗ ${label} connection failed (${result.host}): ${result.error}`);
  });
}

export function formatComparison(comparison: ServerComparison, sourceHost: string, destinationHost: string): string[] {
  const { source, destination, result } = comparison;
  const lines = [
    chalk.blue('=== SERVER COMPARISON ==='),
    '',
    `Source server (${sourceHost}):`,
    ...bullets(source),
    '',
    `Destination server (${destinationHost}):`,
    ...bullets(destination)
  ];

  if (result.onlyInSource.length > 0) {
    lines.push('', chalk.yellow(`Only in source (${result.onlyInSource.length}):`), ...bullets(result.onlyInSource));
  }
  if (result.onlyInDestination.length > 0) {
    lines.push(
      '',
      chalk.yellow(`Only in destination (${result.onlyInDestination.length}):`),
      ...bullets(result.onlyInDestination)
    );
  }
  if (result.common.length > 0) {
    lines.push('', chalk.green(`Common databases (${result.common.length}):`), ...bullets(result.common));
  }

  return lines;
}

export function formatBatchPlan(plan: BatchPlan): string[] {
  const lines = [`Databases to migrate: ${plan.candidates.length}`, ...bullets(plan.candidates)];

  if (plan.excluded.length > 0) {
    lines.push('', `Excluded databases: ${plan.excluded.join(', ')}`);
  }

  lines.push('', `About to migrate ${plan.candidates.length} databases using ${formatLabel(plan.dumpFormat)}.`);
  if (plan.dumpFormat === DumpFormat.INSERTS) {
    lines.push(chalk.yellow('⚠ Note: INSERT format is slower but more portable than COPY format.'));
  }
  if (plan.overwrite) {
    lines.push(chalk.yellow('⚠ Existing databases on the destination will be overwritten.'));
  }

  return lines;
}

/**
 * Progress line for a completed step, or undefined when the change is not shown
 */
export function formatTransition(event: JobTransitionEvent, format: DumpFormat): string | undefined {
  switch (event.to) {
    case JobState.EXPORTED:
      return `  ✓ 1. Backup created (${format === DumpFormat.INSERTS ? 'INSERT' : 'COPY'} format)`;
    case JobState.PROVISIONED:
      return '  ✓ 2. Database ready on destination';
    case JobState.IMPORTED:
      return '  ✓ 3. Restore completed';
    case JobState.CLEANED:
      return '  ✓ 4. Temporary files removed';
    default:
      return undefined;
  }
}

export function formatJobResult(result: MigrationJobResult): string[] {
  if (result.status === 'succeeded') {
    const size = result.artifactBytes !== undefined ? ` (${result.artifactBytes} bytes transferred)` : '';
    return [chalk.green(`✓ Successfully migrated database '${result.database}'${size}`)];
  }

  return [
    chalk.red(`✗ Migration failed for '${result.database}' [${result.reason}]`),
    result.message
  ];
}

/**
 * Explains why a batch had nothing to run
 */
export function formatEmptyBatch(summary: BatchSummary): string {
  if (summary.listed === 0) {
    return 'No databases found on source server.';
  }
  return `All ${summary.listed} source databases are excluded; nothing to migrate.`;
}

export function formatBatchSummary(summary: BatchSummary): string[] {
  const lines = [
    '',
    chalk.blue('=== MIGRATION SUMMARY ==='),
    chalk.green(`✓ Successful: ${summary.successful}`),
    chalk.red(`✗ Failed: ${summary.failed}`),
    `Total: ${summary.total}`
  ];

  const failures = summary.results.filter(result => result.status === 'failed');
  if (failures.length > 0) {
    lines.push('', 'Failed databases:', ...bullets(failures.map(result => result.database)));
  }

  return lines;
}
