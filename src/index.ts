/**
 * Bulk PostgreSQL migration: public API
 */

export * from './models/migration-models';
export {
  AppConfig,
  ConfigOverrides,
  ServerEndpoint,
  createConfig,
  getConfig,
  initializeConfig,
  validateConfig
} from './lib/environment-config';
export * from './lib/error-handler';
export { DatabaseConnectionManager } from './lib/database-connections';
export { locatePostgresTools, PostgresTools } from './lib/tool-locator';
export { DatabaseCatalogService, ServerCatalog, SYSTEM_DATABASES } from './services/database-catalog';
export { DumpRestoreBridge, PgDumpRestoreBridge } from './services/dump-restore-bridge';
export { compareInventories, compareServers } from './services/inventory-comparator';
export {
  BatchOptions,
  JobOptions,
  JobTransitionEvent,
  MigrationOrchestrator,
  OrchestratorOptions
} from './services/migration-orchestrator';
