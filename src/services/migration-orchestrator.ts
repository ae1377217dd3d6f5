/**
 * Migration Orchestrator
 *
 * Drives one database at a time through
 *
 *   PENDING → CHECKED → EXPORTED → PROVISIONED → IMPORTED → CLEANED
 *
 * with FAILED reachable from every non-terminal state. A job never throws:
 * every fault ends as a FailedJobResult. The artifact file is removed when
 * the job ends, whatever the outcome.
 *
 * Emits:
 * - `jobStarted` (MigrationJob)
 * - `transition` (JobTransitionEvent)
 * - `jobFinished` (MigrationJobResult)
 * - `batchFinished` (BatchSummary)
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { AlreadyExistsError, errorMessage, getLogger, Logger } from '../lib/error-handler';
import {
  BatchPlan,
  BatchSummary,
  DumpFormat,
  ExistenceOutcome,
  FailedJobResult,
  FailureReason,
  JobState,
  MigrationJob,
  MigrationJobResult,
  OverwriteMode
} from '../models/migration-models';
import { artifactPath } from '../utils/artifact-naming';
import { ServerCatalog } from './database-catalog';
import { DumpRestoreBridge } from './dump-restore-bridge';

export interface OrchestratorOptions {
  workDir: string;
  dumpFormat: DumpFormat;
  overwriteMode: OverwriteMode;
  logger?: Logger;
  /** Clock used for artifact timestamps and durations */
  now?: () => Date;
}

export interface JobOptions {
  overwrite?: boolean;
}

export interface BatchOptions {
  exclude?: string[];
  overwrite?: boolean;
  /** Asked once before any job runs; false cancels the batch */
  confirm: (plan: BatchPlan) => Promise<boolean>;
}

export interface JobTransitionEvent {
  jobId: string;
  database: string;
  from: JobState;
  to: JobState;
}

interface JobRun {
  job: MigrationJob;
  state: JobState;
  states: JobState[];
  artifactPath: string;
  artifactBytes?: number;
  startedAt: Date;
}

export function emptySummary(
  candidates: string[],
  excluded: string[],
  listed: number = candidates.length
): BatchSummary {
  return {
    listed,
    candidates,
    excluded,
    results: [],
    successful: 0,
    failed: 0,
    total: candidates.length,
    cancelled: false
  };
}

/**
 * Fold one job result into the batch summary
 */
export function accumulate(summary: BatchSummary, result: MigrationJobResult): BatchSummary {
  return {
    ...summary,
    results: [...summary.results, result],
    successful: summary.successful + (result.status === 'succeeded' ? 1 : 0),
    failed: summary.failed + (result.status === 'failed' ? 1 : 0)
  };
}

export class MigrationOrchestrator extends EventEmitter {
  private catalog: ServerCatalog;
  private bridge: DumpRestoreBridge;
  private options: OrchestratorOptions;
  private logger: Logger;
  private now: () => Date;

  constructor(catalog: ServerCatalog, bridge: DumpRestoreBridge, options: OrchestratorOptions) {
    super();
    this.catalog = catalog;
    this.bridge = bridge;
    this.options = options;
    this.logger = options.logger || getLogger();
    this.now = options.now || (() => new Date());
  }

  /**
   * Create the working directory that holds artifacts
   */
  initialize(): void {
    fs.mkdirSync(this.options.workDir, { recursive: true });
  }

  /**
   * Migrate one database from source to destination
   */
  async migrateDatabase(database: string, options: JobOptions = {}): Promise<MigrationJobResult> {
    const job: MigrationJob = { id: uuidv4(), database, overwrite: options.overwrite === true };
    const startedAt = this.now();
    const run: JobRun = {
      job,
      state: JobState.PENDING,
      states: [JobState.PENDING],
      artifactPath: artifactPath(this.options.workDir, database, startedAt),
      startedAt
    };

    this.logger.setJobId(job.id);
    this.logger.info(`Migrating database: ${database}`, { overwrite: job.overwrite });
    this.notify('jobStarted', job);

    let result: MigrationJobResult;
    try {
      result = await this.runJob(run);
    } catch (error) {
      result = this.fail(run, FailureReason.UNEXPECTED, error);
    } finally {
      this.logger.setJobId(null);
    }

    this.notify('jobFinished', result);
    return result;
  }

  /**
   * Migrate every user database on the source except the excluded names,
   * strictly one after another. A failed job does not stop the batch.
   * Listing failures propagate.
   */
  async migrateAll(options: BatchOptions): Promise<BatchSummary> {
    const exclude = options.exclude || [];
    const overwrite = options.overwrite === true;

    const inventory = await this.catalog.listDatabases('source', true);
    const exclusions = new Set(exclude);
    const candidates = inventory.filter(name => !exclusions.has(name));

    if (candidates.length === 0) {
      this.logger.info('No databases to migrate', { listed: inventory.length, excluded: exclude });
      return emptySummary([], exclude, inventory.length);
    }

    const confirmed = await options.confirm({
      candidates,
      excluded: exclude,
      overwrite,
      dumpFormat: this.options.dumpFormat
    });

    if (!confirmed) {
      this.logger.info('Batch migration cancelled', { candidates: candidates.length });
      return { ...emptySummary(candidates, exclude, inventory.length), cancelled: true };
    }

    let summary = emptySummary(candidates, exclude, inventory.length);
    for (const database of candidates) {
      summary = accumulate(summary, await this.migrateDatabase(database, { overwrite }));
    }

    this.logger.info('Batch migration finished', {
      successful: summary.successful,
      failed: summary.failed,
      total: summary.total
    });
    this.notify('batchFinished', summary);

    return summary;
  }

  private async runJob(run: JobRun): Promise<MigrationJobResult> {
    const { job } = run;

    // PENDING → CHECKED
    const existing = await this.catalog.checkExistence('destination', job.database);
    this.transition(run, JobState.CHECKED);

    if (existing === ExistenceOutcome.EXISTS) {
      if (!job.overwrite) {
        return this.fail(run, FailureReason.ALREADY_EXISTS, new AlreadyExistsError(job.database));
      }
      this.logger.warn(`Overwriting existing database '${job.database}'`, {
        mode: this.options.overwriteMode
      });
    }

    // CHECKED → EXPORTED
    try {
      run.artifactBytes = await this.bridge.exportDatabase(
        job.database,
        run.artifactPath,
        this.options.dumpFormat
      );
    } catch (error) {
      return this.fail(run, FailureReason.EXPORT_FAILED, error);
    }
    this.transition(run, JobState.EXPORTED);

    // EXPORTED → PROVISIONED
    const provisioningFailure = await this.provision(run);
    if (provisioningFailure) {
      return provisioningFailure;
    }
    this.transition(run, JobState.PROVISIONED);

    // PROVISIONED → IMPORTED
    try {
      await this.bridge.importDatabase(job.database, run.artifactPath);
    } catch (error) {
      return this.fail(run, FailureReason.IMPORT_FAILED, error);
    }
    this.transition(run, JobState.IMPORTED);

    // IMPORTED → CLEANED
    this.removeArtifact(run.artifactPath);
    this.transition(run, JobState.CLEANED);

    const result: MigrationJobResult = {
      status: 'succeeded',
      jobId: job.id,
      database: job.database,
      states: [...run.states],
      artifactPath: run.artifactPath,
      artifactBytes: run.artifactBytes,
      durationMs: this.elapsed(run)
    };

    this.logger.info(`Successfully migrated database '${job.database}'`, {
      duration_ms: result.durationMs,
      artifact_bytes: result.artifactBytes
    });

    return result;
  }

  /**
   * Make sure the destination database is ready to receive the restore.
   * Returns a failure result, or undefined when provisioning succeeded.
   */
  private async provision(run: JobRun): Promise<FailedJobResult | undefined> {
    const { database } = run.job;
    const existence = await this.catalog.checkExistence('destination', database);

    if (existence === ExistenceOutcome.EXISTS) {
      // the first check may have been inconclusive
      if (!run.job.overwrite) {
        return this.fail(run, FailureReason.ALREADY_EXISTS, new AlreadyExistsError(database));
      }
      if (this.options.overwriteMode === OverwriteMode.OVERLAY) {
        this.logger.info(`Database '${database}' already exists; restoring on top of it`);
        return undefined;
      }

      try {
        await this.catalog.dropDatabase(database);
      } catch (error) {
        return this.fail(run, FailureReason.DROP_FAILED, error);
      }
    }

    try {
      await this.catalog.createDatabase(database);
    } catch (error) {
      return this.fail(run, FailureReason.CREATE_FAILED, error);
    }

    return undefined;
  }

  private transition(run: JobRun, to: JobState): void {
    const event: JobTransitionEvent = {
      jobId: run.job.id,
      database: run.job.database,
      from: run.state,
      to
    };

    run.state = to;
    run.states.push(to);

    this.logger.debug(`Job state ${event.from} → ${event.to}`, { database: run.job.database });
    this.notify('transition', event);
  }

  private fail(run: JobRun, reason: FailureReason, error: unknown): FailedJobResult {
    const failedIn = run.state;

    this.removeArtifact(run.artifactPath);
    this.transition(run, JobState.FAILED);

    const result: FailedJobResult = {
      status: 'failed',
      jobId: run.job.id,
      database: run.job.database,
      states: [...run.states],
      artifactPath: run.artifactPath,
      artifactBytes: run.artifactBytes,
      durationMs: this.elapsed(run),
      reason,
      failedIn,
      message: errorMessage(error)
    };

    if (reason === FailureReason.ALREADY_EXISTS) {
      this.logger.warn(result.message, { reason });
    } else {
      this.logger.error(`Migration failed for '${run.job.database}'`, error, { reason, failed_in: failedIn });
    }

    return result;
  }

  /**
   * Best-effort delete; a failure is logged and never changes the job outcome
   */
  private removeArtifact(file: string): void {
    try {
      if (fs.existsSync(file)) {
        fs.unlinkSync(file);
        this.logger.debug('Removed artifact', { artifact: file });
      }
    } catch (error) {
      this.logger.warn('Failed to remove artifact', { artifact: file, error_message: errorMessage(error) });
    }
  }

  /**
   * Emit to listeners; a throwing listener is logged and never affects the job
   */
  private notify(event: string, payload: unknown): void {
    try {
      this.emit(event, payload);
    } catch (error) {
      this.logger.warn(`Listener for '${event}' failed`, { error_message: errorMessage(error) });
    }
  }

  private elapsed(run: JobRun): number {
    return this.now().getTime() - run.startedAt.getTime();
  }
}
