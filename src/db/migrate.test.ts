import { describe, it, expect } from 'vitest';
import { db } from './client';
import { describeSchemaDrift, runMigrations } from './migrate';

function tableNames(): string[] {
  return db
    .prepare<[], { name: string }>(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`
    )
    .all()
    .map(row => row.name);
}

describe('runMigrations', () => {
  it('creates every registry table', () => {
    expect(tableNames()).toEqual([
      '_migrations',
      'client_mentors',
      'client_volunteers',
      'jobs',
      'mentors',
      'nonprofit_clients',
      'project_cycles',
      'team_roles',
      'volunteer_mentors',
      'volunteer_team_roles',
      'volunteers',
      'volunteers_exported_to_workspace',
    ]);
  });

  it('is a no-op the second time', () => {
    runMigrations();

    const applied = db.prepare<[], { version: number; name: string }>('SELECT version, name FROM _migrations').all();
    expect(applied).toEqual([{ version: 1, name: '001_initial_schema.sql' }]);
  });

  it('refuses a datastore whose migration names differ', () => {
    db.prepare('UPDATE _migrations SET name = ? WHERE version = 1').run('001_other.sql');
    try {
      expect(() => runMigrations()).toThrow(
        'Incompatible migration history at version 1: found "001_other.sql" but expected "001_initial_schema.sql".'
      );
    } finally {
      db.prepare('UPDATE _migrations SET name = ? WHERE version = 1').run('001_initial_schema.sql');
    }
  });

  it('refuses a datastore migrated by a newer build', () => {
    db.prepare('INSERT INTO _migrations (version, name, applied_at) VALUES (?, ?, ?)')
      .run(2, '002_future.sql', '2026-01-01T00:00:00.000Z');
    try {
      expect(() => runMigrations()).toThrow(
        'Registry datastore has migration 002_future.sql (version 2), which this build does not ship.'
      );
    } finally {
      db.prepare('DELETE FROM _migrations WHERE version = 2').run();
    }
  });
});

describe('describeSchemaDrift', () => {
  it('finds nothing on a migrated datastore', () => {
    expect(describeSchemaDrift()).toEqual([]);
  });
});
