import {
  queryOne,
  queryAll,
  execute,
  generateId,
  now,
  toDate,
  toOptionalDate,
  fromFlag,
  readEnum,
  placeholders,
  ok,
  fail,
  transaction,
} from './base';
import { requireCycle } from './cycles';
import { getConfig } from '../config';
import type { ExportReceipt, ExportedVolunteerDetail, Result } from '../domain/types';
import {
  ConstraintError,
  DuplicateExportError,
  NotFoundError,
  ValidationError,
} from '../domain/types';

type ReceiptRow = {
  id: string;
  volunteer_id: string;
  job_id: string;
  workspace_email: string;
  org_unit: string;
  created_at: string;
  updated_at: string | null;
};

type ExportedDetailRow = ReceiptRow & {
  project_cycle_id: string;
  job_status: string;
};

export interface RecordExportParams {
  volunteerId: string;
  jobId: string;
  workspaceEmail: string;
  orgUnit?: string;
}

function rowToReceipt(row: ReceiptRow): ExportReceipt {
  return {
    id: row.id,
    volunteerId: row.volunteer_id,
    jobId: row.job_id,
    workspaceEmail: row.workspace_email,
    orgUnit: row.org_unit,
    createdAt: toDate(row.created_at),
    updatedAt: toOptionalDate(row.updated_at),
  };
}

function insertReceipt(params: RecordExportParams): ExportReceipt {
  const workspaceEmail = params.workspaceEmail.trim();
  if (!workspaceEmail) {
    throw new ValidationError('Workspace email cannot be empty');
  }
  const orgUnit = params.orgUnit?.trim() || getConfig().exports.defaultOrgUnit;

  const volunteer = queryOne<{ project_cycle_id: string; archived: number }>(
    `SELECT v.project_cycle_id, pc.archived
     FROM volunteers v JOIN project_cycles pc ON pc.id = v.project_cycle_id
     WHERE v.id = ?`,
    [params.volunteerId]
  );
  if (!volunteer) {
    throw new NotFoundError('Volunteer', params.volunteerId);
  }
  if (!queryOne<{ id: string }>('SELECT id FROM jobs WHERE id = ?', [params.jobId])) {
    throw new NotFoundError('Job', params.jobId);
  }
  if (fromFlag(volunteer.archived)) {
    throw new ConstraintError(
      'project_cycles.archived',
      `Project cycle ${volunteer.project_cycle_id} is archived; exports are blocked`
    );
  }
  if (queryOne<{ id: string }>(
    'SELECT id FROM volunteers_exported_to_workspace WHERE volunteer_id = ? AND job_id = ?',
    [params.volunteerId, params.jobId]
  )) {
    throw new DuplicateExportError(params.volunteerId, params.jobId);
  }

  const row: ReceiptRow = {
    id: generateId(),
    volunteer_id: params.volunteerId,
    job_id: params.jobId,
    workspace_email: workspaceEmail,
    org_unit: orgUnit,
    created_at: now(),
    updated_at: null,
  };
  execute(
    `INSERT INTO volunteers_exported_to_workspace
       (id, volunteer_id, job_id, workspace_email, org_unit, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`,
    [row.id, row.volunteer_id, row.job_id, row.workspace_email, row.org_unit, row.created_at, row.updated_at]
  );
  return rowToReceipt(row);
}

/** Record that a volunteer was provisioned in the workspace by a job. */
export function recordExport(params: RecordExportParams): Result<ExportReceipt> {
  try {
    return ok(transaction(() => insertReceipt(params)));
  } catch (error) {
    return fail(error);
  }
}

/** All receipts or none. */
export function batchRecordExports(receipts: readonly RecordExportParams[]): Result<ExportReceipt[]> {
  try {
    return ok(transaction(() => receipts.map(insertReceipt)));
  } catch (error) {
    return fail(error);
  }
}

export function getExportReceipt(id: string): Result<ExportReceipt> {
  try {
    const row = queryOne<ReceiptRow>('SELECT * FROM volunteers_exported_to_workspace WHERE id = ?', [id]);
    if (!row) {
      throw new NotFoundError('ExportReceipt', id);
    }
    return ok(rowToReceipt(row));
  } catch (error) {
    return fail(error);
  }
}

export function listExportsForJob(jobId: string): Result<ExportReceipt[]> {
  try {
    const rows = queryAll<ReceiptRow>(
      'SELECT * FROM volunteers_exported_to_workspace WHERE job_id = ? ORDER BY created_at, id',
      [jobId]
    );
    return ok(rows.map(rowToReceipt));
  } catch (error) {
    return fail(error);
  }
}

/** Undo exports by receipt id. Returns how many receipts were removed. */
export function removeExports(receiptIds: readonly string[]): Result<number> {
  try {
    if (receiptIds.length === 0) {
      return ok(0);
    }
    const removed = execute(
      `DELETE FROM volunteers_exported_to_workspace WHERE id IN (${placeholders(receiptIds.length)})`,
      [...receiptIds]
    );
    return ok(removed);
  } catch (error) {
    return fail(error);
  }
}

/** Receipts written by the cycle's jobs, with each job's current status. */
export function getExportedDetails(projectCycleId: string): Result<ExportedVolunteerDetail[]> {
  try {
    requireCycle(projectCycleId);
    const rows = queryAll<ExportedDetailRow>(
      `SELECT r.*, j.project_cycle_id, j.status AS job_status
       FROM volunteers_exported_to_workspace r
       JOIN jobs j ON j.id = r.job_id
       WHERE j.project_cycle_id = ?
       ORDER BY r.created_at, r.id`,
      [projectCycleId]
    );
    return ok(rows.map(row => ({
      ...rowToReceipt(row),
      projectCycleId: row.project_cycle_id,
      jobStatus: readEnum('job_status', 'jobStatus', row.job_status),
    })));
  } catch (error) {
    return fail(error);
  }
}
