// Re-export everything for library consumers
export * from './domain';
export * from './repos';
export * from './services/job-status';
export {
  collectRelation,
  type RelationDescriptor,
  type RelationIndex,
  type BaseTable,
  type ProjectionRow,
} from './services/aggregation';
export { bootstrap } from './bootstrap';
export { initConfig, getConfig, loadConfig, resetConfig, type RegistryConfig } from './config';
export { db, closeDbConnection, reopenDbConnection } from './db/client';
export { runMigrations } from './db/migrate';
