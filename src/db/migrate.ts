import { db, transaction } from './client';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';

interface Migration {
  version: number;
  file: string;
  sql: string;
}

const MIGRATION_FILE = /^(\d{3})_[a-z0-9_]+\.sql$/;
const MIGRATIONS_DIR = fileURLToPath(new URL('./migrations', import.meta.url));

// Columns the repos read by name. An empty list still requires the table.
const EXPECTED_SCHEMA: Record<string, readonly string[]> = {
  project_cycles: ['id', 'name', 'archived', 'created_at', 'updated_at'],
  volunteers: ['id', 'project_cycle_id', 'email', 'ethnicity', 'fli', 'hear_about'],
  mentors: [],
  nonprofit_clients: [],
  team_roles: [],
  volunteer_team_roles: [],
  client_volunteers: ['project_cycle_id', 'volunteer_id', 'client_id', 'currently_active'],
  client_mentors: [],
  volunteer_mentors: [],
  jobs: ['id', 'project_cycle_id', 'status', 'label', 'details'],
  volunteers_exported_to_workspace: ['id', 'volunteer_id', 'job_id', 'workspace_email', 'org_unit'],
};

function readMigrationFiles(): Migration[] {
  const migrations: Migration[] = [];
  for (const file of readdirSync(MIGRATIONS_DIR).sort()) {
    const version = MIGRATION_FILE.exec(file)?.[1];
    if (version === undefined) continue;
    migrations.push({
      version: Number(version),
      file,
      sql: readFileSync(join(MIGRATIONS_DIR, file), 'utf-8'),
    });
  }
  return migrations;
}

function appliedVersions(): Map<number, string> {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    )
  `);
  const rows = db.prepare<[], { version: number; name: string }>('SELECT version, name FROM _migrations').all();
  return new Map(rows.map(row => [row.version, row.name]));
}

/** Refuse a datastore whose recorded migrations differ from the files shipped here. */
function checkHistory(applied: Map<number, string>, migrations: Migration[]): void {
  const shipped = new Map(migrations.map(migration => [migration.version, migration.file]));

  for (const [version, recorded] of applied) {
    const file = shipped.get(version);
    if (file === undefined) {
      throw new Error(
        `Registry datastore has migration ${recorded} (version ${version}), which this build does not ship. ` +
        'Upgrade cohort-registry before opening it.'
      );
    }
    if (file !== recorded) {
      throw new Error(
        `Incompatible migration history at version ${version}: found "${recorded}" but expected "${file}". ` +
        'Check COHORT_REGISTRY_HOME.'
      );
    }
  }
}

/** Problems found in the live schema, one line per table. */
export function describeSchemaDrift(): string[] {
  const drift: string[] = [];
  for (const [table, columns] of Object.entries(EXPECTED_SCHEMA)) {
    const present = new Set(
      db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all().map(row => row.name)
    );
    if (present.size === 0) {
      drift.push(`${table}: table missing`);
      continue;
    }
    const missing = columns.filter(column => !present.has(column));
    if (missing.length > 0) {
      drift.push(`${table}: no column ${missing.join(', ')}`);
    }
  }
  return drift;
}

export function runMigrations(): void {
  const migrations = readMigrationFiles();
  const applied = appliedVersions();
  checkHistory(applied, migrations);

  for (const migration of migrations) {
    if (applied.has(migration.version)) continue;
    transaction(() => {
      db.exec(migration.sql);
      db.prepare('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)')
        .run(migration.version, migration.file, new Date().toISOString());
    });
  }

  const drift = describeSchemaDrift();
  if (drift.length > 0) {
    throw new Error(`Registry schema does not match this build: ${drift.join('; ')}`);
  }
}
