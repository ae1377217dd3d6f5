/**
 * Database Catalog Service
 *
 * Reads and changes the set of databases on a server through `pg_database`:
 * inventory listing, existence checks and destination provisioning. All
 * statements run on the administrative database in the driver's autocommit
 * mode, outside any user transaction.
 */

import { DatabaseConnectionManager } from '../lib/database-connections';
import {
  CreateError,
  DropError,
  errorMessage,
  getLogger,
  Logger,
  QueryError
} from '../lib/error-handler';
import { EndpointRole, ExistenceOutcome, Inventory } from '../models/migration-models';

/** Administrative databases hidden when system databases are excluded. */
export const SYSTEM_DATABASES: ReadonlySet<string> = new Set(['postgres', 'template0', 'template1']);

const LIST_DATABASES_SQL = `
  SELECT datname, datistemplate
  FROM pg_database
  ORDER BY datname
`;

const DATABASE_EXISTS_SQL = 'SELECT 1 FROM pg_database WHERE datname = $1';

interface DatabaseRow {
  datname: string;
  datistemplate: boolean;
}

/**
 * Catalog operations the orchestrator depends on
 */
export interface ServerCatalog {
  listDatabases(role: EndpointRole, excludeSystem?: boolean): Promise<Inventory>;
  checkExistence(role: EndpointRole, database: string): Promise<ExistenceOutcome>;
  createDatabase(database: string): Promise<void>;
  dropDatabase(database: string): Promise<void>;
}

/**
 * Double-quote an identifier for use in DDL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class DatabaseCatalogService implements ServerCatalog {
  private connections: DatabaseConnectionManager;
  private logger: Logger;

  constructor(connections: DatabaseConnectionManager, logger: Logger = getLogger()) {
    this.connections = connections;
    this.logger = logger;
  }

  /**
   * List the user databases of a server. Template databases are never
   * returned. Throws instead of returning an empty inventory when the listing
   * cannot be read.
   */
  async listDatabases(role: EndpointRole, excludeSystem: boolean = true): Promise<Inventory> {
    return this.connections.withConnection(role, async client => {
      let rows: DatabaseRow[];
      try {
        const result = await client.query<DatabaseRow>(LIST_DATABASES_SQL);
        rows = result.rows;
      } catch (error) {
        throw new QueryError(`Error listing databases: ${errorMessage(error)}`, { role });
      }

      const databases = rows
        .filter(row => !row.datistemplate)
        .map(row => row.datname)
        .filter(name => !excludeSystem || !SYSTEM_DATABASES.has(name))
        .sort(compareNames);

      this.logger.debug(`Listed ${databases.length} databases on ${role}`, {
        role,
        exclude_system: excludeSystem
      });

      return databases;
    });
  }

  /**
   * Look a database up in the catalog without connecting to it. Failures are
   * reported as CHECK_FAILED, never thrown.
   */
  async checkExistence(role: EndpointRole, database: string): Promise<ExistenceOutcome> {
    try {
      const found = await this.connections.withConnection(role, async client => {
        const result = await client.query(DATABASE_EXISTS_SQL, [database]);
        return result.rows.length > 0;
      });

      return found ? ExistenceOutcome.EXISTS : ExistenceOutcome.NOT_EXISTS;
    } catch (error) {
      this.logger.warn(`Existence check for '${database}' on ${role} failed; treating as absent`, {
        role,
        database,
        error_message: errorMessage(error)
      });
      return ExistenceOutcome.CHECK_FAILED;
    }
  }

  /**
   * Boolean view of checkExistence
   */
  async exists(role: EndpointRole, database: string): Promise<boolean> {
    return (await this.checkExistence(role, database)) === ExistenceOutcome.EXISTS;
  }

  /**
   * Create an empty database on the destination with server defaults
   */
  async createDatabase(database: string): Promise<void> {
    try {
      await this.connections.withConnection('destination', async client => {
        await client.query(`CREATE DATABASE ${quoteIdentifier(database)}`);
      });
      this.logger.info(`Created database '${database}' on destination`, { database });
    } catch (error) {
      throw new CreateError(
        `Error creating database '${database}': ${errorMessage(error)}`,
        { database }
      );
    }
  }

  /**
   * Drop a database on the destination. Only used when overwriting in
   * replace mode.
   */
  async dropDatabase(database: string): Promise<void> {
    try {
      await this.connections.withConnection('destination', async client => {
        await client.query(`DROP DATABASE ${quoteIdentifier(database)}`);
      });
      this.logger.info(`Dropped database '${database}' on destination`, { database });
    } catch (error) {
      throw new DropError(
        `Error dropping database '${database}': ${errorMessage(error)}`,
        { database }
      );
    }
  }
}
