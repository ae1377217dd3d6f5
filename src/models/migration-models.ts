/**
 * Bulk Migration Data Models
 *
 * Types shared by the catalog, bridge, orchestrator and comparison services.
 * Nothing here is persisted; every value lives for one process run at most.
 */

export type EndpointRole = 'source' | 'destination';

/** Database names reflecting one server's catalog, sorted. */
export type Inventory = string[];

export enum DumpFormat {
  /** COPY blocks: faster, less portable across server versions */
  COPY = 'copy',
  /** INSERT statements: slower, portable */
  INSERTS = 'inserts'
}

/**
 * What happens when the database already exists on the destination and
 * overwrite is requested
 */
export enum OverwriteMode {
  /** Restore on top of the existing database */
  OVERLAY = 'overlay',
  /** Drop and recreate the destination database before restoring */
  REPLACE = 'replace'
}

export enum ExistenceOutcome {
  EXISTS = 'exists',
  NOT_EXISTS = 'not_exists',
  CHECK_FAILED = 'check_failed'
}

export enum JobState {
  PENDING = 'pending',
  CHECKED = 'checked',
  EXPORTED = 'exported',
  PROVISIONED = 'provisioned',
  IMPORTED = 'imported',
  CLEANED = 'cleaned',
  FAILED = 'failed'
}

export enum FailureReason {
  ALREADY_EXISTS = 'already_exists',
  EXPORT_FAILED = 'export_failed',
  DROP_FAILED = 'drop_failed',
  CREATE_FAILED = 'create_failed',
  IMPORT_FAILED = 'import_failed',
  UNEXPECTED = 'unexpected'
}

export interface MigrationJob {
  id: string;
  database: string;
  overwrite: boolean;
}

interface JobResultBase {
  jobId: string;
  database: string;
  /** States visited in order, ending with the terminal one */
  states: JobState[];
  artifactPath: string;
  artifactBytes?: number;
  durationMs: number;
}

export interface SucceededJobResult extends JobResultBase {
  status: 'succeeded';
}

export interface FailedJobResult extends JobResultBase {
  status: 'failed';
  reason: FailureReason;
  /** State the job was in when it failed */
  failedIn: JobState;
  /** Driver or utility diagnostic text, verbatim */
  message: string;
}

export type MigrationJobResult = SucceededJobResult | FailedJobResult;

export interface ComparisonResult {
  onlyInSource: string[];
  onlyInDestination: string[];
  common: string[];
}

export interface ServerComparison {
  source: Inventory;
  destination: Inventory;
  result: ComparisonResult;
}

/**
 * What a batch run is about to do; handed to the confirmation step
 */
export interface BatchPlan {
  candidates: string[];
  excluded: string[];
  overwrite: boolean;
  dumpFormat: DumpFormat;
}

export interface BatchSummary {
  /** User databases found on the source, before exclusions */
  listed: number;
  candidates: string[];
  excluded: string[];
  results: MigrationJobResult[];
  successful: number;
  failed: number;
  total: number;
  cancelled: boolean;
}

export interface ConnectionTestResult {
  role: EndpointRole;
  host: string;
  success: boolean;
  latencyMs?: number;
  serverVersion?: string;
  error?: string;
}
