// Database Connection Utility
// Opens short-lived connections to the source or destination server

import { Client, ClientConfig } from 'pg';
import { AppConfig, ServerEndpoint } from './environment-config';
import { ConnectionError, errorMessage, getLogger, Logger } from './error-handler';
import { ConnectionTestResult, EndpointRole } from '../models/migration-models';

export class DatabaseConnectionManager {
  private endpoints: Map<EndpointRole, ServerEndpoint> = new Map();
  private readonly adminDatabase: string;
  private readonly connectionTimeoutMillis?: number;
  private logger: Logger;

  constructor(config: AppConfig, logger: Logger = getLogger()) {
    this.endpoints.set('source', config.source);
    this.endpoints.set('destination', config.destination);
    this.adminDatabase = config.adminDatabase;
    this.connectionTimeoutMillis = config.connectionTimeoutMillis;
    this.logger = logger;
  }

  /**
   * Endpoint configured for a role
   */
  getEndpoint(role: EndpointRole): ServerEndpoint {
    const endpoint = this.endpoints.get(role);
    if (!endpoint) {
      throw new ConnectionError(`No endpoint configured for role '${role}'`, { role });
    }
    return endpoint;
  }

  /**
   * Open a connection to a database on the given server. Defaults to the
   * administrative database. Never retried.
   */
  async connect(role: EndpointRole, database: string = this.adminDatabase): Promise<Client> {
    const endpoint = this.getEndpoint(role);

    const clientConfig: ClientConfig = {
      host: endpoint.host,
      port: endpoint.port,
      user: endpoint.user,
      password: endpoint.password,
      database,
      connectionTimeoutMillis: this.connectionTimeoutMillis
    };

    const client = new Client(clientConfig);

    try {
      await client.connect();
    } catch (error) {
      this.logger.debug(`Connection to ${role} failed`, { host: endpoint.host, database });
      throw new ConnectionError(errorMessage(error), { role, host: endpoint.host, database });
    }

    return client;
  }

  /**
   * Run an operation on a fresh connection and always close it afterwards
   */
  async withConnection<T>(
    role: EndpointRole,
    operation: (client: Client) => Promise<T>,
    database?: string
  ): Promise<T> {
    const client = await this.connect(role, database);

    try {
      return await operation(client);
    } finally {
      await this.close(client, role);
    }
  }

  /**
   * Test database connectivity
   */
  async testConnection(role: EndpointRole): Promise<ConnectionTestResult> {
    const endpoint = this.getEndpoint(role);

    try {
      const startTime = Date.now();
      const version = await this.withConnection(role, async client => {
        const result = await client.query<{ version: string }>('SELECT version() AS version');
        return result.rows[0]?.version;
      });

      return {
        role,
        host: endpoint.host,
        success: true,
        latencyMs: Date.now() - startTime,
        serverVersion: version
      };
    } catch (error) {
      return {
        role,
        host: endpoint.host,
        success: false,
        error: errorMessage(error)
      };
    }
  }

  /**
   * Test source, then destination. Stops at the first failure.
   */
  async testConnections(): Promise<ConnectionTestResult[]> {
    const results: ConnectionTestResult[] = [];

    for (const role of ['source', 'destination'] as const) {
      const result = await this.testConnection(role);
      results.push(result);

      if (!result.success) {
        break;
      }
    }

    return results;
  }

  private async close(client: Client, role: EndpointRole): Promise<void> {
    try {
      await client.end();
    } catch (error) {
      this.logger.warn(`Error closing ${role} connection`, { error_message: errorMessage(error) });
    }
  }
}
