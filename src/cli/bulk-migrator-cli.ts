#!/usr/bin/env node
/**
 * Bulk Migrator CLI
 *
 * Copies whole PostgreSQL databases from a source server to a destination
 * server with pg_dump and psql.
 *
 *   bulk-migrator [global options] test
 *   bulk-migrator [global options] compare
 *   bulk-migrator [global options] migrate-single <database> [--overwrite]
 *   bulk-migrator [global options] migrate-all [--exclude <names...>] [--overwrite] [--yes]
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'readline';
import { AppConfig, DEFAULT_PORT, DEFAULT_WORK_DIR, getConfigForLogging, initializeConfig } from '../lib/environment-config';
import { DatabaseConnectionManager } from '../lib/database-connections';
import { errorMessage, generateCorrelationId, getLogger, Logger, LogLevel } from '../lib/error-handler';
import { locatePostgresTools, PostgresTools } from '../lib/tool-locator';
import { BatchPlan, MigrationJob, MigrationJobResult } from '../models/migration-models';
import { DatabaseCatalogService } from '../services/database-catalog';
import { PgDumpRestoreBridge } from '../services/dump-restore-bridge';
import { compareServers } from '../services/inventory-comparator';
import { JobTransitionEvent, MigrationOrchestrator } from '../services/migration-orchestrator';
import {
  formatBatchPlan,
  formatBatchSummary,
  formatComparison,
  formatConnectionResults,
  formatEmptyBatch,
  formatJobResult,
  formatTools,
  formatTransition
} from './console-reporter';

interface GlobalOptions {
  sourceHost?: string;
  sourceUser?: string;
  sourcePassword?: string;
  destHost?: string;
  destUser?: string;
  destPassword?: string;
  port?: string;
  useInserts?: boolean;
  workDir?: string;
  overwriteMode?: string;
  verbose?: boolean;
}

interface MigrateSingleOptions {
  overwrite?: boolean;
}

interface MigrateAllOptions {
  exclude?: string[];
  overwrite?: boolean;
  yes?: boolean;
}

interface Services {
  config: AppConfig;
  tools: PostgresTools;
  connections: DatabaseConnectionManager;
  catalog: DatabaseCatalogService;
  orchestrator: MigrationOrchestrator;
}

/**
 * Ask a yes/no question on the terminal; anything but y/yes is a no
 */
export async function confirm(message: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });

  return new Promise(resolve => {
    rl.question(`${message} (y/N): `, (answer: string) => {
      rl.close();
      resolve(['y', 'yes'].includes(answer.trim().toLowerCase()));
    });
  });
}

export class BulkMigratorCli {
  private program: Command;
  private logger: Logger = getLogger();

  constructor() {
    this.program = new Command();
    this.setupCommands();
  }

  private setupCommands(): void {
    this.program
      .name('bulk-migrator')
      .description('Bulk PostgreSQL database migration tool')
      .version('1.0.0')
      .option('--source-host <host>', 'Source database host')
      .option('--source-user <user>', 'Source database user')
      .option('--source-password <password>', 'Source database password')
      .option('--dest-host <host>', 'Destination database host')
      .option('--dest-user <user>', 'Destination database user')
      .option('--dest-password <password>', 'Destination database password')
      .option('--port <port>', `Database port, same for both servers (default: ${DEFAULT_PORT})`)
      .option('--use-inserts', 'Use INSERT statements instead of COPY (slower but more portable)')
      .option('--work-dir <dir>', `Directory for temporary dump files (default: ${DEFAULT_WORK_DIR})`)
      .option('--overwrite-mode <mode>', 'How --overwrite treats an existing database: overlay or replace')
      .option('--verbose', 'Enable verbose logging');

    this.program
      .command('test')
      .description('Test connections to both servers')
      .action(async () => {
        await this.handleTestCommand();
      });

    this.program
      .command('compare')
      .description('Compare databases between servers')
      .action(async () => {
        await this.handleCompareCommand();
      });

    this.program
      .command('migrate-single')
      .description('Migrate a single database')
      .argument('<database>', 'Database name to migrate')
      .option('--overwrite', 'Overwrite if exists on destination')
      .action(async (database: string, options: MigrateSingleOptions) => {
        await this.handleMigrateSingleCommand(database, options);
      });

    this.program
      .command('migrate-all')
      .description('Migrate all databases')
      .option('--exclude <databases...>', 'Databases to exclude from migration')
      .option('--overwrite', 'Overwrite existing databases on destination')
      .option('-y, --yes', 'Skip the confirmation prompt')
      .action(async (options: MigrateAllOptions) => {
        await this.handleMigrateAllCommand(options);
      });
  }

  /**
   * Build configuration and services from the global options
   */
  private async createServices(): Promise<Services> {
    const globals = this.program.opts<GlobalOptions>();

    if (globals.verbose) {
      this.logger.setLevel(LogLevel.DEBUG);
    }
    this.logger.setCorrelationId(generateCorrelationId());

    const config = initializeConfig({
      sourceHost: globals.sourceHost,
      sourceUser: globals.sourceUser,
      sourcePassword: globals.sourcePassword,
      destHost: globals.destHost,
      destUser: globals.destUser,
      destPassword: globals.destPassword,
      port: globals.port,
      useInserts: globals.useInserts,
      workDir: globals.workDir,
      overwriteMode: globals.overwriteMode
    });
    this.logger.debug('Configuration loaded', getConfigForLogging(config));

    const tools = await locatePostgresTools(config.tools, { logger: this.logger });
    const connections = new DatabaseConnectionManager(config, this.logger);
    const catalog = new DatabaseCatalogService(connections, this.logger);
    const bridge = new PgDumpRestoreBridge({
      source: config.source,
      destination: config.destination,
      tools,
      restoreStopOnError: config.restoreStopOnError,
      logger: this.logger
    });
    const orchestrator = new MigrationOrchestrator(catalog, bridge, {
      workDir: config.workDir,
      dumpFormat: config.dumpFormat,
      overwriteMode: config.overwriteMode,
      logger: this.logger
    });
    orchestrator.initialize();

    return { config, tools, connections, catalog, orchestrator };
  }

  /**
   * Report tools and test both connections. False when either fails.
   */
  private async testConnections(services: Services): Promise<boolean> {
    console.log(chalk.blue('Testing connections...'));
    formatTools(services.tools, services.config.dumpFormat).forEach(line => console.log(line));

    const results = await services.connections.testConnections();
    formatConnectionResults(results).forEach(line => console.log(line));

    return results.length === 2 && results.every(result => result.success);
  }

  private async handleTestCommand(): Promise<void> {
    const services = await this.createServices();

    if (await this.testConnections(services)) {
      console.log(chalk.green('✓ All connections successful!'));
    } else {
      console.log(chalk.red('✗ Connection test failed!'));
      process.exitCode = 1;
    }
  }

  private async handleCompareCommand(): Promise<void> {
    const services = await this.createServices();
    if (!(await this.testConnections(services))) {
      process.exitCode = 1;
      return;
    }

    const comparison = await compareServers(services.catalog);
    console.log('');
    formatComparison(comparison, services.config.source.host, services.config.destination.host)
      .forEach(line => console.log(line));
  }

  private async handleMigrateSingleCommand(database: string, options: MigrateSingleOptions): Promise<void> {
    const services = await this.createServices();
    if (!(await this.testConnections(services))) {
      process.exitCode = 1;
      return;
    }

    this.attachProgressReporting(services);

    const result = await services.orchestrator.migrateDatabase(database, { overwrite: options.overwrite });
    if (result.status === 'failed') {
      process.exitCode = 1;
    }
  }

  private async handleMigrateAllCommand(options: MigrateAllOptions): Promise<void> {
    const services = await this.createServices();
    if (!(await this.testConnections(services))) {
      process.exitCode = 1;
      return;
    }

    console.log(chalk.blue('\n=== BULK DATABASE MIGRATION ==='));
    console.log(`Source: ${services.config.source.host}`);
    console.log(`Destination: ${services.config.destination.host}`);

    this.attachProgressReporting(services);

    const summary = await services.orchestrator.migrateAll({
      exclude: options.exclude,
      overwrite: options.overwrite,
      confirm: async (plan: BatchPlan) => {
        console.log('');
        formatBatchPlan(plan).forEach(line => console.log(line));
        return options.yes === true || confirm('Continue?');
      }
    });

    if (summary.cancelled) {
      console.log('Migration cancelled.');
      return;
    }

    if (summary.total === 0) {
      console.log(formatEmptyBatch(summary));
      return;
    }

    formatBatchSummary(summary).forEach(line => console.log(line));
    if (summary.failed > 0) {
      process.exitCode = 1;
    }
  }

  private attachProgressReporting(services: Services): void {
    const { orchestrator, config } = services;

    orchestrator.on('jobStarted', (job: MigrationJob) => {
      console.log(chalk.blue(`\n--- Migrating database: ${job.database} ---`));
    });

    orchestrator.on('transition', (event: JobTransitionEvent) => {
      const line = formatTransition(event, config.dumpFormat);
      if (line) {
        console.log(line);
      }
    });

    orchestrator.on('jobFinished', (result: MigrationJobResult) => {
      formatJobResult(result).forEach(line => console.log(line));
    });
  }

  async run(argv: string[]): Promise<void> {
    await this.program.parseAsync(argv);
  }
}

// CLI entry point
if (require.main === module) {
  new BulkMigratorCli()
    .run(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red('✗ ' + errorMessage(error)));
      getLogger().error('Command failed', error);
      process.exitCode = 1;
    });
}
