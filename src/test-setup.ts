import { runMigrations } from './db/migrate';
import { initConfig } from './config';

// Test databases start empty; apply the schema and load default config.
runMigrations();
initConfig();
