import {
  queryOne,
  execute,
  now,
  toDate,
  toOptionalDate,
  toFlag,
  fromFlag,
  ok,
  fail,
  transaction,
  type SqlParam,
} from './base';
import { requireCycle } from './cycles';
import type { ClientVolunteer, Result } from '../domain/types';
import {
  ConstraintError,
  DuplicateRelationError,
  NotFoundError,
  ValidationError,
} from '../domain/types';

/**
 * Many-to-many relations between cycle records. Every relation is keyed by
 * its cycle plus the two endpoint ids, and both endpoints must belong to
 * that cycle (team roles are global and exempt).
 */

export type RelationKeys = {
  volunteer_team_role: { projectCycleId: string; volunteerId: string; roleId: string };
  client_volunteer: { projectCycleId: string; volunteerId: string; clientId: string; currentlyActive?: boolean };
  client_mentor: { projectCycleId: string; mentorId: string; clientId: string };
  volunteer_mentor: { projectCycleId: string; mentorId: string; volunteerId: string };
};

export type RelationKind = keyof RelationKeys;

export const RELATION_KINDS = [
  'volunteer_team_role',
  'client_volunteer',
  'client_mentor',
  'volunteer_mentor',
] as const satisfies readonly RelationKind[];

type EndpointKey = 'volunteerId' | 'mentorId' | 'clientId' | 'roleId';

interface Endpoint {
  key: EndpointKey;
  column: string;
  table: string;
  entity: string;
  cycleScoped: boolean;
}

interface RelationTable {
  table: string;
  endpoints: readonly [Endpoint, Endpoint];
}

const VOLUNTEER: Endpoint = { key: 'volunteerId', column: 'volunteer_id', table: 'volunteers', entity: 'Volunteer', cycleScoped: true };
const MENTOR: Endpoint = { key: 'mentorId', column: 'mentor_id', table: 'mentors', entity: 'Mentor', cycleScoped: true };
const CLIENT: Endpoint = { key: 'clientId', column: 'client_id', table: 'nonprofit_clients', entity: 'NonprofitClient', cycleScoped: true };
const ROLE: Endpoint = { key: 'roleId', column: 'role_id', table: 'team_roles', entity: 'TeamRole', cycleScoped: false };

const RELATIONS: Record<RelationKind, RelationTable> = {
  volunteer_team_role: { table: 'volunteer_team_roles', endpoints: [VOLUNTEER, ROLE] },
  client_volunteer: { table: 'client_volunteers', endpoints: [VOLUNTEER, CLIENT] },
  client_mentor: { table: 'client_mentors', endpoints: [MENTOR, CLIENT] },
  volunteer_mentor: { table: 'volunteer_mentors', endpoints: [MENTOR, VOLUNTEER] },
};

type AnyRelationKeys = { projectCycleId: string } & Partial<Record<EndpointKey, string>>;

function endpointId(keys: AnyRelationKeys, endpoint: Endpoint): string {
  const id = keys[endpoint.key];
  if (!id) {
    throw new ValidationError(`Missing ${endpoint.key}`);
  }
  return id;
}

function keyDetails(keys: AnyRelationKeys, relation: RelationTable): Record<string, string> {
  const details: Record<string, string> = { projectCycleId: keys.projectCycleId };
  for (const endpoint of relation.endpoints) {
    details[endpoint.key] = endpointId(keys, endpoint);
  }
  return details;
}

function whereClause(relation: RelationTable): string {
  return ['project_cycle_id = ?', ...relation.endpoints.map(endpoint => `${endpoint.column} = ?`)].join(' AND ');
}

function whereParams(keys: AnyRelationKeys, relation: RelationTable): SqlParam[] {
  return [keys.projectCycleId, ...relation.endpoints.map(endpoint => endpointId(keys, endpoint))];
}

function assertEndpoint(keys: AnyRelationKeys, endpoint: Endpoint): void {
  const id = endpointId(keys, endpoint);
  if (!endpoint.cycleScoped) {
    if (!queryOne<{ id: string }>(`SELECT id FROM ${endpoint.table} WHERE id = ?`, [id])) {
      throw new NotFoundError(endpoint.entity, id);
    }
    return;
  }

  const row = queryOne<{ project_cycle_id: string }>(
    `SELECT project_cycle_id FROM ${endpoint.table} WHERE id = ?`,
    [id]
  );
  if (!row) {
    throw new NotFoundError(endpoint.entity, id);
  }
  if (row.project_cycle_id !== keys.projectCycleId) {
    throw new ConstraintError(
      'relation_cycle_mismatch',
      `relation cycle mismatch: ${endpoint.entity} ${id} belongs to cycle ${row.project_cycle_id}, not ${keys.projectCycleId}`
    );
  }
}

function insertRelation(kind: RelationKind, keys: AnyRelationKeys, currentlyActive: boolean | undefined): void {
  const relation = RELATIONS[kind];
  requireCycle(keys.projectCycleId);
  for (const endpoint of relation.endpoints) {
    assertEndpoint(keys, endpoint);
  }

  if (queryOne<{ found: number }>(`SELECT 1 AS found FROM ${relation.table} WHERE ${whereClause(relation)}`, whereParams(keys, relation))) {
    throw new DuplicateRelationError(relation.table, keyDetails(keys, relation));
  }

  const columns = ['project_cycle_id', ...relation.endpoints.map(endpoint => endpoint.column), 'created_at'];
  const params: SqlParam[] = [...whereParams(keys, relation), now()];
  if (kind === 'client_volunteer') {
    columns.push('currently_active');
    params.push(toFlag(currentlyActive ?? true));
  }

  execute(
    `INSERT INTO ${relation.table} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`,
    params
  );
}

function activeFlag(keys: AnyRelationKeys & { currentlyActive?: boolean }): boolean | undefined {
  return keys.currentlyActive;
}

export function link<K extends RelationKind>(kind: K, keys: RelationKeys[K]): Result<true> {
  try {
    transaction(() => insertRelation(kind, keys, activeFlag(keys)));
    return ok(true);
  } catch (error) {
    return fail(error);
  }
}

/** Link every pairing or none. */
export function batchLink<K extends RelationKind>(kind: K, keysList: readonly RelationKeys[K][]): Result<number> {
  try {
    const linked = transaction(() => {
      for (const keys of keysList) {
        insertRelation(kind, keys, activeFlag(keys));
      }
      return keysList.length;
    });
    return ok(linked);
  } catch (error) {
    return fail(error);
  }
}

/** Returns false when there was nothing to remove. */
export function unlink<K extends RelationKind>(kind: K, keys: RelationKeys[K]): Result<boolean> {
  try {
    const relation = RELATIONS[kind];
    const removed = execute(`DELETE FROM ${relation.table} WHERE ${whereClause(relation)}`, whereParams(keys, relation));
    return ok(removed > 0);
  } catch (error) {
    return fail(error);
  }
}

export function hasRelation<K extends RelationKind>(kind: K, keys: RelationKeys[K]): Result<boolean> {
  try {
    const relation = RELATIONS[kind];
    const row = queryOne<{ found: number }>(
      `SELECT 1 AS found FROM ${relation.table} WHERE ${whereClause(relation)}`,
      whereParams(keys, relation)
    );
    return ok(row !== null);
  } catch (error) {
    return fail(error);
  }
}

type ClientVolunteerRow = {
  project_cycle_id: string;
  volunteer_id: string;
  client_id: string;
  currently_active: number;
  created_at: string;
  updated_at: string | null;
};

function rowToClientVolunteer(row: ClientVolunteerRow): ClientVolunteer {
  return {
    projectCycleId: row.project_cycle_id,
    volunteerId: row.volunteer_id,
    clientId: row.client_id,
    currentlyActive: fromFlag(row.currently_active),
    createdAt: toDate(row.created_at),
    updatedAt: toOptionalDate(row.updated_at),
  };
}

/** Flip a pairing between live and historical. updated_at moves only on change. */
export function setClientVolunteerActive(
  keys: Omit<RelationKeys['client_volunteer'], 'currentlyActive'>,
  active: boolean
): Result<ClientVolunteer> {
  const where = 'project_cycle_id = ? AND volunteer_id = ? AND client_id = ?';
  const params: SqlParam[] = [keys.projectCycleId, keys.volunteerId, keys.clientId];
  try {
    const relation = transaction(() => {
      const existing = queryOne<ClientVolunteerRow>(`SELECT * FROM client_volunteers WHERE ${where}`, params);
      if (!existing) {
        throw new NotFoundError('ClientVolunteer', `${keys.volunteerId}/${keys.clientId}`);
      }
      if (fromFlag(existing.currently_active) === active) {
        return rowToClientVolunteer(existing);
      }
      execute(
        `UPDATE client_volunteers SET currently_active = ?, updated_at = ? WHERE ${where}`,
        [toFlag(active), now(), ...params]
      );
      const updated = queryOne<ClientVolunteerRow>(`SELECT * FROM client_volunteers WHERE ${where}`, params);
      if (!updated) {
        throw new NotFoundError('ClientVolunteer', `${keys.volunteerId}/${keys.clientId}`);
      }
      return rowToClientVolunteer(updated);
    });
    return ok(relation);
  } catch (error) {
    return fail(error);
  }
}
