/**
 * Unit Tests: MigrationOrchestrator
 * Job lifecycle, failure classification, artifact cleanup and batch runs
 */

import * as fs from 'fs';
import * as path from 'path';
import { DumpRestoreBridge } from '../../../src/services/dump-restore-bridge';
import { ServerCatalog } from '../../../src/services/database-catalog';
import {
  accumulate,
  emptySummary,
  JobTransitionEvent,
  MigrationOrchestrator
} from '../../../src/services/migration-orchestrator';
import { CreateError, DropError, ExportError, ImportError, QueryError } from '../../../src/lib/error-handler';
import {
  BatchPlan,
  DumpFormat,
  EndpointRole,
  ExistenceOutcome,
  FailureReason,
  JobState,
  MigrationJobResult,
  OverwriteMode
} from '../../../src/models/migration-models';
import { makeTempDir, removeDir, silentLogger } from '../../helpers';

const FIXED_DATE = new Date(2024, 2, 5, 14, 30, 9);

class FakeCatalog implements ServerCatalog {
  inventory: string[] = [];
  destination = new Map<string, ExistenceOutcome>();
  listDatabases = jest.fn(async (_role: EndpointRole, _excludeSystem?: boolean): Promise<string[]> => this.inventory);
  checkExistence = jest.fn(
    async (_role: EndpointRole, database: string): Promise<ExistenceOutcome> =>
      this.destination.get(database) || ExistenceOutcome.NOT_EXISTS
  );
  createDatabase = jest.fn(async (_database: string): Promise<void> => undefined);
  dropDatabase = jest.fn(async (_database: string): Promise<void> => undefined);
}

class FakeBridge implements DumpRestoreBridge {
  exportDatabase = jest.fn(async (_database: string, artifactPath: string, _format: DumpFormat): Promise<number> => {
    fs.writeFileSync(artifactPath, 'CREATE TABLE t (id int);\n');
    return fs.statSync(artifactPath).size;
  });
  importDatabase = jest.fn(async (_database: string, _artifactPath: string): Promise<void> => undefined);
}

const SUCCESS_STATES = [
  JobState.PENDING,
  JobState.CHECKED,
  JobState.EXPORTED,
  JobState.PROVISIONED,
  JobState.IMPORTED,
  JobState.CLEANED
];

describe('MigrationOrchestrator', () => {
  let workDir: string;
  let catalog: FakeCatalog;
  let bridge: FakeBridge;

  const createOrchestrator = (overwriteMode: OverwriteMode = OverwriteMode.OVERLAY, dumpFormat = DumpFormat.COPY) =>
    new MigrationOrchestrator(catalog, bridge, {
      workDir,
      dumpFormat,
      overwriteMode,
      logger: silentLogger(),
      now: () => FIXED_DATE
    });

  const artifactsLeft = (): string[] => fs.readdirSync(workDir);

  beforeEach(() => {
    workDir = makeTempDir('orchestrator-');
    catalog = new FakeCatalog();
    bridge = new FakeBridge();
  });

  afterEach(() => {
    removeDir(workDir);
  });

  describe('initialize', () => {
    it('should create a missing working directory', () => {
      const nested = path.join(workDir, 'nested', 'temp');
      const orchestrator = new MigrationOrchestrator(catalog, bridge, {
        workDir: nested,
        dumpFormat: DumpFormat.COPY,
        overwriteMode: OverwriteMode.OVERLAY,
        logger: silentLogger()
      });

      orchestrator.initialize();

      expect(fs.statSync(nested).isDirectory()).toBe(true);
    });
  });

  describe('migrateDatabase', () => {
    it('should walk every state and remove the artifact on success', async () => {
      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('succeeded');
      expect(result.states).toEqual(SUCCESS_STATES);
      expect(result.artifactBytes).toBe(25);
      expect(catalog.createDatabase).toHaveBeenCalledWith('app_db');
      expect(bridge.importDatabase).toHaveBeenCalledWith('app_db', result.artifactPath);
      expect(artifactsLeft()).toEqual([]);
    });

    it('should name the artifact after the database and the start time', async () => {
      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.artifactPath).toBe(path.join(workDir, 'app_db_20240305_143009.sql'));
      expect(bridge.exportDatabase).toHaveBeenCalledWith('app_db', result.artifactPath, DumpFormat.COPY);
    });

    it('should pass the configured dump format to the export', async () => {
      await createOrchestrator(OverwriteMode.OVERLAY, DumpFormat.INSERTS).migrateDatabase('app_db');

      expect(bridge.exportDatabase).toHaveBeenCalledWith('app_db', expect.any(String), DumpFormat.INSERTS);
    });

    it('should fail with ALREADY_EXISTS before exporting when overwrite is off', async () => {
      catalog.destination.set('app_db', ExistenceOutcome.EXISTS);

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.ALREADY_EXISTS);
      expect(result.failedIn).toBe(JobState.CHECKED);
      expect(result.states).toEqual([JobState.PENDING, JobState.CHECKED, JobState.FAILED]);
      expect(result.message).toBe(`Database 'app_db' exists on destination. Use --overwrite to replace.`);
      expect(bridge.exportDatabase).not.toHaveBeenCalled();
      expect(bridge.importDatabase).not.toHaveBeenCalled();
      expect(catalog.createDatabase).not.toHaveBeenCalled();
    });

    it('should restore on top of an existing database in overlay mode', async () => {
      catalog.destination.set('app_db', ExistenceOutcome.EXISTS);

      const result = await createOrchestrator(OverwriteMode.OVERLAY).migrateDatabase('app_db', { overwrite: true });

      expect(result.status).toBe('succeeded');
      expect(result.states).toEqual(SUCCESS_STATES);
      expect(catalog.dropDatabase).not.toHaveBeenCalled();
      expect(catalog.createDatabase).not.toHaveBeenCalled();
      expect(bridge.importDatabase).toHaveBeenCalledTimes(1);
    });

    it('should drop and recreate an existing database in replace mode', async () => {
      catalog.destination.set('app_db', ExistenceOutcome.EXISTS);
      const calls: string[] = [];
      catalog.dropDatabase.mockImplementation(async (database: string) => {
        calls.push(`drop:${database}`);
      });
      catalog.createDatabase.mockImplementation(async (database: string) => {
        calls.push(`create:${database}`);
      });

      const result = await createOrchestrator(OverwriteMode.REPLACE).migrateDatabase('app_db', { overwrite: true });

      expect(result.status).toBe('succeeded');
      expect(calls).toEqual(['drop:app_db', 'create:app_db']);
    });

    it('should report DROP_FAILED when replacing fails to drop', async () => {
      catalog.destination.set('app_db', ExistenceOutcome.EXISTS);
      catalog.dropDatabase.mockRejectedValue(
        new DropError(`Error dropping database 'app_db': database "app_db" is being accessed by other users`)
      );

      const result = await createOrchestrator(OverwriteMode.REPLACE).migrateDatabase('app_db', { overwrite: true });

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.DROP_FAILED);
      expect(result.failedIn).toBe(JobState.EXPORTED);
      expect(catalog.createDatabase).not.toHaveBeenCalled();
      expect(bridge.importDatabase).not.toHaveBeenCalled();
      expect(artifactsLeft()).toEqual([]);
    });

    it('should refuse to replace a database that appears after an inconclusive check', async () => {
      catalog.checkExistence
        .mockResolvedValueOnce(ExistenceOutcome.CHECK_FAILED)
        .mockResolvedValueOnce(ExistenceOutcome.EXISTS);

      const result = await createOrchestrator(OverwriteMode.REPLACE).migrateDatabase('app_db', { overwrite: false });

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.ALREADY_EXISTS);
      expect(result.failedIn).toBe(JobState.EXPORTED);
      expect(catalog.dropDatabase).not.toHaveBeenCalled();
      expect(catalog.createDatabase).not.toHaveBeenCalled();
      expect(bridge.importDatabase).not.toHaveBeenCalled();
      expect(artifactsLeft()).toEqual([]);
    });

    it('should refuse to overlay a database that appears after an inconclusive check', async () => {
      catalog.checkExistence
        .mockResolvedValueOnce(ExistenceOutcome.CHECK_FAILED)
        .mockResolvedValueOnce(ExistenceOutcome.EXISTS);

      const result = await createOrchestrator(OverwriteMode.OVERLAY).migrateDatabase('app_db');

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.ALREADY_EXISTS);
      expect(bridge.importDatabase).not.toHaveBeenCalled();
    });

    it('should treat an inconclusive existence check as absent', async () => {
      catalog.destination.set('app_db', ExistenceOutcome.CHECK_FAILED);

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('succeeded');
      expect(catalog.createDatabase).toHaveBeenCalledWith('app_db');
    });

    it('should report EXPORT_FAILED with the utility diagnostics and skip provisioning', async () => {
      bridge.exportDatabase.mockRejectedValue(
        new ExportError('Backup failed: pg_dump: error: database "app_db" does not exist', 1, 'pg_dump: error: database "app_db" does not exist')
      );

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.EXPORT_FAILED);
      expect(result.failedIn).toBe(JobState.CHECKED);
      expect(result.message).toBe('Backup failed: pg_dump: error: database "app_db" does not exist');
      expect(catalog.createDatabase).not.toHaveBeenCalled();
      expect(bridge.importDatabase).not.toHaveBeenCalled();
    });

    it('should remove a partial artifact left by a failed export', async () => {
      bridge.exportDatabase.mockImplementation(async (_database: string, artifactPath: string) => {
        fs.writeFileSync(artifactPath, '-- partial');
        throw new ExportError('Backup failed: connection lost', 1, 'connection lost');
      });

      await createOrchestrator().migrateDatabase('app_db');

      expect(artifactsLeft()).toEqual([]);
    });

    it('should report CREATE_FAILED and remove the artifact', async () => {
      catalog.createDatabase.mockRejectedValue(
        new CreateError(`Error creating database 'app_db': permission denied to create database`)
      );

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.CREATE_FAILED);
      expect(result.failedIn).toBe(JobState.EXPORTED);
      expect(result.states).toEqual([JobState.PENDING, JobState.CHECKED, JobState.EXPORTED, JobState.FAILED]);
      expect(result.message).toBe(`Error creating database 'app_db': permission denied to create database`);
      expect(bridge.importDatabase).not.toHaveBeenCalled();
      expect(artifactsLeft()).toEqual([]);
    });

    it('should report IMPORT_FAILED and remove the artifact', async () => {
      bridge.importDatabase.mockRejectedValue(new ImportError('Restore failed: psql: error: FATAL', 2, 'psql: error: FATAL'));

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.IMPORT_FAILED);
      expect(result.failedIn).toBe(JobState.PROVISIONED);
      expect(artifactsLeft()).toEqual([]);
    });

    it('should classify an unforeseen fault as UNEXPECTED', async () => {
      catalog.checkExistence.mockRejectedValue(new Error('socket hang up'));

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') return;
      expect(result.reason).toBe(FailureReason.UNEXPECTED);
      expect(result.failedIn).toBe(JobState.PENDING);
      expect(result.message).toBe('socket hang up');
    });

    it('should still succeed when the artifact cannot be deleted', async () => {
      bridge.importDatabase.mockImplementation(async (_database: string, artifactPath: string) => {
        fs.unlinkSync(artifactPath);
        fs.mkdirSync(artifactPath);
        fs.writeFileSync(path.join(artifactPath, 'keep'), 'x');
      });

      const result = await createOrchestrator().migrateDatabase('app_db');

      expect(result.status).toBe('succeeded');
      expect(result.states[result.states.length - 1]).toBe(JobState.CLEANED);
    });

    it('should emit lifecycle events in order', async () => {
      const orchestrator = createOrchestrator();
      const events: string[] = [];
      orchestrator.on('jobStarted', () => events.push('jobStarted'));
      orchestrator.on('transition', (event: JobTransitionEvent) => events.push(`${event.from}->${event.to}`));
      orchestrator.on('jobFinished', (result: MigrationJobResult) => events.push(`jobFinished:${result.status}`));

      await orchestrator.migrateDatabase('app_db');

      expect(events).toEqual([
        'jobStarted',
        'pending->checked',
        'checked->exported',
        'exported->provisioned',
        'provisioned->imported',
        'imported->cleaned',
        'jobFinished:succeeded'
      ]);
    });

    it('should keep a finished job succeeded when a jobFinished listener throws', async () => {
      const orchestrator = createOrchestrator();
      const listener = jest.fn(() => {
        throw new Error('listener broke');
      });
      orchestrator.on('jobFinished', listener);

      const result = await orchestrator.migrateDatabase('app_db');

      expect(result.status).toBe('succeeded');
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should not let a throwing transition listener fail the job', async () => {
      const orchestrator = createOrchestrator();
      orchestrator.on('transition', () => {
        throw new Error('listener broke');
      });

      const result = await orchestrator.migrateDatabase('app_db');

      expect(result.status).toBe('succeeded');
      expect(result.states).toEqual(SUCCESS_STATES);
    });

    it('should give every job a distinct id', async () => {
      const orchestrator = createOrchestrator();

      const first = await orchestrator.migrateDatabase('app_db');
      const second = await orchestrator.migrateDatabase('app_db');

      expect(first.jobId).not.toBe(second.jobId);
    });
  });

  describe('migrateAll', () => {
    const approve = jest.fn(async (_plan: BatchPlan) => true);

    beforeEach(() => {
      approve.mockClear();
    });

    it('should keep going after a failed job and count the outcomes', async () => {
      catalog.inventory = ['a_db', 'b_db', 'c_db'];
      catalog.destination.set('b_db', ExistenceOutcome.EXISTS);

      const summary = await createOrchestrator().migrateAll({ confirm: approve });

      expect(summary.successful).toBe(2);
      expect(summary.failed).toBe(1);
      expect(summary.total).toBe(3);
      expect(summary.cancelled).toBe(false);
      expect(summary.results.map(result => `${result.database}:${result.status}`)).toEqual([
        'a_db:succeeded',
        'b_db:failed',
        'c_db:succeeded'
      ]);
      expect(catalog.listDatabases).toHaveBeenCalledWith('source', true);
    });

    it('should leave excluded databases out of the plan', async () => {
      catalog.inventory = ['app_db', 'billing_db', 'scratch'];

      const summary = await createOrchestrator().migrateAll({ exclude: ['scratch', 'unknown'], confirm: approve });

      expect(approve).toHaveBeenCalledWith({
        candidates: ['app_db', 'billing_db'],
        excluded: ['scratch', 'unknown'],
        overwrite: false,
        dumpFormat: DumpFormat.COPY
      });
      expect(summary.candidates).toEqual(['app_db', 'billing_db']);
      expect(summary.total).toBe(2);
      expect(bridge.exportDatabase).toHaveBeenCalledTimes(2);
    });

    it('should pass overwrite to every job', async () => {
      catalog.inventory = ['app_db'];
      catalog.destination.set('app_db', ExistenceOutcome.EXISTS);

      const summary = await createOrchestrator().migrateAll({ overwrite: true, confirm: approve });

      expect(summary.successful).toBe(1);
      expect(approve.mock.calls[0][0].overwrite).toBe(true);
    });

    it('should run nothing when confirmation is declined', async () => {
      catalog.inventory = ['app_db', 'billing_db'];

      const summary = await createOrchestrator().migrateAll({ confirm: async () => false });

      expect(summary.cancelled).toBe(true);
      expect(summary.results).toEqual([]);
      expect(summary.total).toBe(2);
      expect(bridge.exportDatabase).not.toHaveBeenCalled();
    });

    it('should not ask for confirmation when there is nothing to migrate', async () => {
      catalog.inventory = ['scratch'];

      const summary = await createOrchestrator().migrateAll({ exclude: ['scratch'], confirm: approve });

      expect(approve).not.toHaveBeenCalled();
      expect(summary.total).toBe(0);
      expect(summary.listed).toBe(1);
      expect(summary.cancelled).toBe(false);
    });

    it('should propagate inventory listing failures', async () => {
      catalog.listDatabases.mockRejectedValue(new QueryError('Error listing databases: permission denied'));

      await expect(createOrchestrator().migrateAll({ confirm: approve })).rejects.toThrow(
        'Error listing databases: permission denied'
      );
      expect(approve).not.toHaveBeenCalled();
    });

    it('should finish one job before starting the next', async () => {
      catalog.inventory = ['a_db', 'b_db'];
      const trace: string[] = [];
      bridge.exportDatabase.mockImplementation(async (database: string, artifactPath: string) => {
        trace.push(`export:${database}`);
        await new Promise(resolve => setTimeout(resolve, 5));
        fs.writeFileSync(artifactPath, '--');
        return 2;
      });
      bridge.importDatabase.mockImplementation(async (database: string) => {
        trace.push(`import:${database}`);
      });

      await createOrchestrator().migrateAll({ confirm: approve });

      expect(trace).toEqual(['export:a_db', 'import:a_db', 'export:b_db', 'import:b_db']);
    });

    it('should emit batchFinished with the summary', async () => {
      catalog.inventory = ['app_db'];
      const orchestrator = createOrchestrator();
      const finished = jest.fn();
      orchestrator.on('batchFinished', finished);

      const summary = await orchestrator.migrateAll({ confirm: approve });

      expect(finished).toHaveBeenCalledWith(summary);
    });
  });
});

describe('accumulate', () => {
  it('should fold results without mutating the previous summary', () => {
    const start = emptySummary(['a_db', 'b_db'], ['scratch']);
    const ok: MigrationJobResult = {
      status: 'succeeded',
      jobId: 'job-1',
      database: 'a_db',
      states: SUCCESS_STATES,
      artifactPath: '/tmp/a_db.sql',
      durationMs: 10
    };
    const failed: MigrationJobResult = {
      status: 'failed',
      jobId: 'job-2',
      database: 'b_db',
      states: [JobState.PENDING, JobState.CHECKED, JobState.FAILED],
      artifactPath: '/tmp/b_db.sql',
      durationMs: 3,
      reason: FailureReason.ALREADY_EXISTS,
      failedIn: JobState.CHECKED,
      message: 'exists'
    };

    const afterFirst = accumulate(start, ok);
    const afterSecond = accumulate(afterFirst, failed);

    expect(start.results).toEqual([]);
    expect(afterFirst.successful).toBe(1);
    expect(afterSecond).toEqual({
      listed: 2,
      candidates: ['a_db', 'b_db'],
      excluded: ['scratch'],
      results: [ok, failed],
      successful: 1,
      failed: 1,
      total: 2,
      cancelled: false
    });
  });
});
