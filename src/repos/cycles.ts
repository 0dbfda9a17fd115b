import {
  queryOne,
  queryAll,
  execute,
  countWhere,
  generateId,
  now,
  toDate,
  toOptionalDate,
  toFlag,
  fromFlag,
  toNullableText,
  writeChangedColumns,
  ok,
  fail,
  transaction,
} from './base';
import { deleteOwned } from './ownership';
import type { CycleStats, DeletionSummary, ProjectCycle, Result } from '../domain/types';
import { NotFoundError, ValidationError } from '../domain/types';

type CycleRow = {
  id: string;
  name: string;
  description: string | null;
  archived: number;
  created_at: string;
  updated_at: string | null;
};

function rowToCycle(row: CycleRow): ProjectCycle {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? undefined,
    archived: fromFlag(row.archived),
    createdAt: toDate(row.created_at),
    updatedAt: toOptionalDate(row.updated_at),
  };
}

function loadCycleRow(id: string): CycleRow {
  const row = queryOne<CycleRow>('SELECT * FROM project_cycles WHERE id = ?', [id]);
  if (!row) {
    throw new NotFoundError('ProjectCycle', id);
  }
  return row;
}

/** Throws NotFoundError unless the cycle exists. */
export function requireCycle(id: string): ProjectCycle {
  return rowToCycle(loadCycleRow(id));
}

export function createCycle(params: { name: string; description?: string | null }): Result<ProjectCycle> {
  try {
    const name = params.name.trim();
    if (!name) {
      throw new ValidationError('Project cycle name cannot be empty');
    }

    const id = generateId();
    const timestamp = now();
    const description = toNullableText(params.description) ?? null;
    execute(
      'INSERT INTO project_cycles (id, name, description, archived, created_at, updated_at) VALUES (?, ?, ?, 0, ?, NULL)',
      [id, name, description, timestamp]
    );

    return ok(rowToCycle({ id, name, description, archived: 0, created_at: timestamp, updated_at: null }));
  } catch (error) {
    return fail(error);
  }
}

export function getCycle(id: string): Result<ProjectCycle> {
  try {
    return ok(requireCycle(id));
  } catch (error) {
    return fail(error);
  }
}

export function getCycleByName(name: string): Result<ProjectCycle> {
  try {
    const row = queryOne<CycleRow>('SELECT * FROM project_cycles WHERE name = ?', [name.trim()]);
    if (!row) {
      throw new NotFoundError('ProjectCycle', name);
    }
    return ok(rowToCycle(row));
  } catch (error) {
    return fail(error);
  }
}

export function listCycles(params: { includeArchived?: boolean } = {}): Result<ProjectCycle[]> {
  try {
    const where = params.includeArchived === false ? 'WHERE archived = 0' : '';
    const rows = queryAll<CycleRow>(`SELECT * FROM project_cycles ${where} ORDER BY created_at, name`);
    return ok(rows.map(rowToCycle));
  } catch (error) {
    return fail(error);
  }
}

export function updateCycle(
  id: string,
  params: { name?: string; description?: string | null; archived?: boolean }
): Result<ProjectCycle> {
  try {
    if (params.name !== undefined && !params.name.trim()) {
      throw new ValidationError('Project cycle name cannot be empty');
    }

    const cycle = transaction(() => {
      const existing = loadCycleRow(id);
      writeChangedColumns('project_cycles', id, existing, {
        name: params.name?.trim(),
        description: toNullableText(params.description),
        archived: params.archived === undefined ? undefined : toFlag(params.archived),
      });
      return requireCycle(id);
    });

    return ok(cycle);
  } catch (error) {
    return fail(error);
  }
}

/** Archiving blocks exports for the cycle's volunteers; data stays in place. */
export function archiveCycle(id: string): Result<ProjectCycle> {
  return updateCycle(id, { archived: true });
}

export function deleteCycle(id: string): Result<DeletionSummary> {
  try {
    const summary = transaction(() => {
      loadCycleRow(id);
      return deleteOwned('project_cycle', id);
    });
    return ok(summary);
  } catch (error) {
    return fail(error);
  }
}

export function getCycleStats(id: string): Result<CycleStats> {
  try {
    requireCycle(id);
    return ok({
      projectCycleId: id,
      volunteers: countWhere('volunteers', 'project_cycle_id = ?', [id]),
      mentors: countWhere('mentors', 'project_cycle_id = ?', [id]),
      nonprofits: countWhere('nonprofit_clients', 'project_cycle_id = ?', [id]),
    });
  } catch (error) {
    return fail(error);
  }
}
