import { execute, type SqlParam } from './base';
import type { DeletionSummary } from '../domain/types';

/**
 * Ownership map for cascading deletes.
 *
 * Each owner lists every table holding a direct reference to it. Dependents
 * that are owners themselves are expanded recursively, so a delete walks the
 * graph children-first. The schema's ON DELETE CASCADE covers the same edges.
 */

export type OwnerKind = 'project_cycle' | 'volunteer' | 'mentor' | 'client' | 'job' | 'team_role';

interface Dependent {
  table: string;
  column: string;
  /** Set when the dependent rows own further rows. */
  owner?: OwnerKind;
}

const OWNER_TABLES: Record<OwnerKind, string> = {
  project_cycle: 'project_cycles',
  volunteer: 'volunteers',
  mentor: 'mentors',
  client: 'nonprofit_clients',
  job: 'jobs',
  team_role: 'team_roles',
};

const DEPENDENTS: Record<OwnerKind, readonly Dependent[]> = {
  project_cycle: [
    { table: 'volunteer_team_roles', column: 'project_cycle_id' },
    { table: 'client_volunteers', column: 'project_cycle_id' },
    { table: 'client_mentors', column: 'project_cycle_id' },
    { table: 'volunteer_mentors', column: 'project_cycle_id' },
    { table: 'jobs', column: 'project_cycle_id', owner: 'job' },
    { table: 'volunteers', column: 'project_cycle_id', owner: 'volunteer' },
    { table: 'mentors', column: 'project_cycle_id', owner: 'mentor' },
    { table: 'nonprofit_clients', column: 'project_cycle_id', owner: 'client' },
  ],
  volunteer: [
    { table: 'volunteer_team_roles', column: 'volunteer_id' },
    { table: 'client_volunteers', column: 'volunteer_id' },
    { table: 'volunteer_mentors', column: 'volunteer_id' },
    { table: 'volunteers_exported_to_workspace', column: 'volunteer_id' },
  ],
  mentor: [
    { table: 'client_mentors', column: 'mentor_id' },
    { table: 'volunteer_mentors', column: 'mentor_id' },
  ],
  client: [
    { table: 'client_volunteers', column: 'client_id' },
    { table: 'client_mentors', column: 'client_id' },
  ],
  job: [
    { table: 'volunteers_exported_to_workspace', column: 'job_id' },
  ],
  team_role: [
    { table: 'volunteer_team_roles', column: 'role_id' },
  ],
};

interface Selection {
  sql: string;
  params: SqlParam[];
}

function tally(summary: DeletionSummary, table: string, count: number): void {
  summary[table] = (summary[table] ?? 0) + count;
}

function deleteSelection(kind: OwnerKind, selection: Selection, summary: DeletionSummary): void {
  for (const dependent of DEPENDENTS[kind]) {
    if (dependent.owner) {
      deleteSelection(
        dependent.owner,
        {
          sql: `SELECT id FROM ${dependent.table} WHERE ${dependent.column} IN (${selection.sql})`,
          params: selection.params,
        },
        summary
      );
      continue;
    }
    const removed = execute(
      `DELETE FROM ${dependent.table} WHERE ${dependent.column} IN (${selection.sql})`,
      selection.params
    );
    tally(summary, dependent.table, removed);
  }

  const table = OWNER_TABLES[kind];
  tally(summary, table, execute(`DELETE FROM ${table} WHERE id IN (${selection.sql})`, selection.params));
}

/**
 * Delete an owner row and everything that references it. Must run inside the
 * caller's transaction. Returns rows removed per table.
 */
export function deleteOwned(kind: OwnerKind, id: string): DeletionSummary {
  const summary: DeletionSummary = {};
  deleteSelection(kind, { sql: `SELECT id FROM ${OWNER_TABLES[kind]} WHERE id = ?`, params: [id] }, summary);
  return summary;
}
