import { queryOne, queryAll, execute, generateId, now, toDate, ok, fail, transaction } from './base';
import { deleteOwned } from './ownership';
import type { DeletionSummary, Result, TeamRole } from '../domain/types';
import { NotFoundError, ValidationError } from '../domain/types';

type TeamRoleRow = {
  id: string;
  name: string;
  description: string;
  created_at: string;
};

function rowToTeamRole(row: TeamRoleRow): TeamRole {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: toDate(row.created_at),
  };
}

export function listTeamRoles(): Result<TeamRole[]> {
  try {
    return ok(queryAll<TeamRoleRow>('SELECT * FROM team_roles ORDER BY name').map(rowToTeamRole));
  } catch (error) {
    return fail(error);
  }
}

export function getTeamRole(id: string): Result<TeamRole> {
  try {
    const row = queryOne<TeamRoleRow>('SELECT * FROM team_roles WHERE id = ?', [id]);
    if (!row) {
      throw new NotFoundError('TeamRole', id);
    }
    return ok(rowToTeamRole(row));
  } catch (error) {
    return fail(error);
  }
}

export function getTeamRoleByName(name: string): Result<TeamRole> {
  try {
    const row = queryOne<TeamRoleRow>('SELECT * FROM team_roles WHERE name = ?', [name.trim()]);
    if (!row) {
      throw new NotFoundError('TeamRole', name);
    }
    return ok(rowToTeamRole(row));
  } catch (error) {
    return fail(error);
  }
}

export function createTeamRole(name: string, description: string): Result<TeamRole> {
  try {
    const trimmedName = name.trim();
    if (!trimmedName) {
      throw new ValidationError('Team role name cannot be empty');
    }
    const row: TeamRoleRow = {
      id: generateId(),
      name: trimmedName,
      description: description.trim(),
      created_at: now(),
    };
    execute(
      'INSERT INTO team_roles (id, name, description, created_at) VALUES (?, ?, ?, ?)',
      [row.id, row.name, row.description, row.created_at]
    );
    return ok(rowToTeamRole(row));
  } catch (error) {
    return fail(error);
  }
}

export function deleteTeamRole(id: string): Result<DeletionSummary> {
  try {
    const summary = transaction(() => {
      if (!queryOne<{ id: string }>('SELECT id FROM team_roles WHERE id = ?', [id])) {
        throw new NotFoundError('TeamRole', id);
      }
      return deleteOwned('team_role', id);
    });
    return ok(summary);
  } catch (error) {
    return fail(error);
  }
}
