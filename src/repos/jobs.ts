import { z } from 'zod';
import {
  queryOne,
  queryAll,
  execute,
  generateId,
  now,
  toDate,
  toOptionalDate,
  toNullableText,
  readEnum,
  writeChangedColumns,
  ok,
  fail,
  transaction,
  immediateTransaction,
  type SqlParam,
} from './base';
import { requireCycle } from './cycles';
import { deleteOwned } from './ownership';
import { getConfig } from '../config';
import type { DeletionSummary, Job, JobDetails, Result } from '../domain/types';
import {
  ConstraintError,
  InternalConsistencyError,
  NotFoundError,
  ValidationError,
} from '../domain/types';
import { assertInDomain, type JobStatus } from '../domain/value-sets';
import { assertJobTransition } from '../services/job-status';

type JobRow = {
  id: string;
  project_cycle_id: string | null;
  status: string;
  label: string;
  description: string | null;
  details: string;
  created_at: string;
  updated_at: string | null;
};

/** Reserved details key written only by setJobStatus. */
export const JOB_ERROR_KEY = 'error';

export const jobDetailsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * One statement moves the status and merges or drops details.error.
 * Params: status, error message (twice), id.
 */
const UPDATE_STATUS_SQL = `
  UPDATE jobs
  SET status = ?,
      details = CASE
        WHEN ? IS NOT NULL THEN json_set(details, '$.error', ?)
        WHEN json_type(details, '$.error') IS NOT NULL THEN json_remove(details, '$.error')
        ELSE details
      END
  WHERE id = ?
`;

function parseDetails(json: string, jobId: string): JobDetails {
  const parsed = jobDetailsSchema.safeParse(JSON.parse(json));
  if (!parsed.success) {
    throw new InternalConsistencyError(`Job ${jobId} details are not a flat object of scalars`, { jobId });
  }
  return parsed.data;
}

function rowToJob(row: JobRow): Job {
  return {
    id: row.id,
    projectCycleId: row.project_cycle_id ?? undefined,
    status: readEnum('status', 'jobStatus', row.status),
    label: row.label,
    description: row.description ?? undefined,
    details: parseDetails(row.details, row.id),
    createdAt: toDate(row.created_at),
    updatedAt: toOptionalDate(row.updated_at),
  };
}

function loadJobRow(id: string): JobRow {
  const row = queryOne<JobRow>('SELECT * FROM jobs WHERE id = ?', [id]);
  if (!row) {
    throw new NotFoundError('Job', id);
  }
  return row;
}

/** Throws NotFoundError unless the job exists. */
export function requireJob(id: string): Job {
  return rowToJob(loadJobRow(id));
}

function validateDetails(details: unknown): JobDetails {
  const parsed = jobDetailsSchema.safeParse(details ?? {});
  if (!parsed.success) {
    throw new ConstraintError('jobs.details', 'Job details must be an object of string, number, boolean or null values');
  }
  if (JOB_ERROR_KEY in parsed.data) {
    throw new ConstraintError('jobs.details.error', 'Job details cannot carry an error key at creation');
  }
  return parsed.data;
}

export function createJob(params: {
  projectCycleId?: string | null;
  label: string;
  description?: string | null;
  details?: Record<string, unknown>;
}): Result<Job> {
  try {
    const label = params.label.trim();
    if (!label) {
      throw new ValidationError('Job label cannot be empty');
    }
    const details = validateDetails(params.details);

    const job = transaction(() => {
      if (params.projectCycleId) {
        requireCycle(params.projectCycleId);
      }
      const row: JobRow = {
        id: generateId(),
        project_cycle_id: params.projectCycleId || null,
        status: 'pending',
        label,
        description: toNullableText(params.description) ?? null,
        details: JSON.stringify(details),
        created_at: now(),
        updated_at: null,
      };
      execute(
        `INSERT INTO jobs (id, project_cycle_id, status, label, description, details, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        [row.id, row.project_cycle_id, row.status, row.label, row.description, row.details, row.created_at, row.updated_at]
      );
      return rowToJob(row);
    });

    return ok(job);
  } catch (error) {
    return fail(error);
  }
}

export function getJob(id: string): Result<Job> {
  try {
    return ok(requireJob(id));
  } catch (error) {
    return fail(error);
  }
}

export function listJobs(params: {
  projectCycleId?: string;
  status?: string;
  jobType?: string;
  limit?: number;
  offset?: number;
} = {}): Result<Job[]> {
  try {
    const conditions: string[] = [];
    const values: SqlParam[] = [];

    if (params.projectCycleId) {
      conditions.push('project_cycle_id = ?');
      values.push(params.projectCycleId);
    }
    if (params.status) {
      conditions.push('status = ?');
      values.push(assertInDomain('status', 'jobStatus', params.status));
    }
    if (params.jobType) {
      conditions.push(`json_extract(details, '$.jobType') = ?`);
      values.push(params.jobType);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const limit = params.limit ?? 50;
    const offset = params.offset ?? 0;
    const rows = queryAll<JobRow>(
      `SELECT * FROM jobs ${where} ORDER BY created_at DESC, id LIMIT ? OFFSET ?`,
      [...values, limit, offset]
    );
    return ok(rows.map(rowToJob));
  } catch (error) {
    return fail(error);
  }
}

/**
 * Move a job to a new status.
 *
 * A non-empty `errorMessage` (whitespace counts) sets details.error as given;
 * omitted, null or '' removes an existing details.error, and details without
 * one are left as stored.
 */
export function setJobStatus(id: string, status: string, errorMessage?: string | null): Result<Job> {
  try {
    const next: JobStatus = assertInDomain('status', 'jobStatus', status);
    const message = errorMessage || null;
    const strict = getConfig().jobs.strictTransitions;

    const job = immediateTransaction(() => {
      const before = loadJobRow(id);
      assertJobTransition(readEnum('status', 'jobStatus', before.status), next, strict);

      execute(UPDATE_STATUS_SQL, [next, message, message, id]);

      const after = loadJobRow(id);
      if (after.status !== before.status || after.details !== before.details) {
        execute('UPDATE jobs SET updated_at = ? WHERE id = ?', [now(), id]);
        return requireJob(id);
      }
      return rowToJob(after);
    });

    return ok(job);
  } catch (error) {
    return fail(error);
  }
}

export function cancelJob(id: string): Result<Job> {
  return setJobStatus(id, 'cancelled');
}

export function editJob(id: string, params: { label?: string; description?: string | null }): Result<Job> {
  try {
    if (params.label !== undefined && !params.label.trim()) {
      throw new ValidationError('Job label cannot be empty');
    }
    const job = transaction(() => {
      const existing = loadJobRow(id);
      writeChangedColumns('jobs', id, existing, {
        label: params.label?.trim(),
        description: toNullableText(params.description),
      });
      return requireJob(id);
    });
    return ok(job);
  } catch (error) {
    return fail(error);
  }
}

/** Attach a job to a cycle, or detach it with null. */
export function setJobCycle(id: string, projectCycleId: string | null): Result<Job> {
  try {
    const job = transaction(() => {
      const existing = loadJobRow(id);
      if (projectCycleId) {
        requireCycle(projectCycleId);
      }
      writeChangedColumns('jobs', id, existing, { project_cycle_id: projectCycleId });
      return requireJob(id);
    });
    return ok(job);
  } catch (error) {
    return fail(error);
  }
}

/** Removes the job and its export receipts. */
export function deleteJob(id: string): Result<DeletionSummary> {
  try {
    const summary = transaction(() => {
      loadJobRow(id);
      return deleteOwned('job', id);
    });
    return ok(summary);
  } catch (error) {
    return fail(error);
  }
}
