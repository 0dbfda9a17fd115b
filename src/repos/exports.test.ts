import { describe, it, expect, beforeEach } from 'vitest';
import { db } from '../db/client';
import { getDefaultConfig, initConfig } from '../config';
import {
  batchRecordExports,
  getExportReceipt,
  getExportedDetails,
  listExportsForJob,
  recordExport,
  removeExports,
} from './exports';
import { archiveCycle } from './cycles';
import { createVolunteer } from './volunteers';
import { createJob, setJobStatus } from './jobs';
import { expectOk, makeCycle, resetDatabase, volunteerInput } from '../test-fixtures';
import type { Job, ProjectCycle, Volunteer } from '../domain/types';

let cycle: ProjectCycle;
let volunteer: Volunteer;
let job: Job;

function receiptCount(volunteerId: string, jobId: string): number | undefined {
  return db.prepare<[string, string], { count: number }>(
    'SELECT COUNT(*) AS count FROM volunteers_exported_to_workspace WHERE volunteer_id = ? AND job_id = ?'
  ).get(volunteerId, jobId)?.count;
}

beforeEach(() => {
  resetDatabase();
  initConfig(getDefaultConfig());
  cycle = makeCycle();
  volunteer = expectOk(createVolunteer(cycle.id, volunteerInput()));
  job = expectOk(createJob({ projectCycleId: cycle.id, label: 'Export users', details: { jobType: 'export_users' } }));
});

describe('recordExport', () => {
  it('writes a receipt with the default org unit', () => {
    const receipt = expectOk(recordExport({
      volunteerId: volunteer.id,
      jobId: job.id,
      workspaceEmail: ' ada@workspace.example.org ',
    }));

    expect(receipt.volunteerId).toBe(volunteer.id);
    expect(receipt.jobId).toBe(job.id);
    expect(receipt.workspaceEmail).toBe('ada@workspace.example.org');
    expect(receipt.orgUnit).toBe('/Programs/Volunteers');
    expect(expectOk(getExportReceipt(receipt.id))).toEqual(receipt);
  });

  it('takes the org unit default from config', () => {
    initConfig({ ...getDefaultConfig(), exports: { defaultOrgUnit: '/Cohorts/Spring' } });
    const receipt = expectOk(recordExport({ volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'a@w.example.org' }));

    expect(receipt.orgUnit).toBe('/Cohorts/Spring');
  });

  it('refuses a second receipt for the same volunteer and job', () => {
    const params = { volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'ada@workspace.example.org', orgUnit: '/Eng' };
    expectOk(recordExport(params));
    const result = recordExport(params);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('DUPLICATE_EXPORT');
      expect(result.details).toEqual({ volunteerId: volunteer.id, jobId: job.id });
    }
    expect(receiptCount(volunteer.id, job.id)).toBe(1);
  });

  it('refuses exports from an archived cycle', () => {
    expectOk(archiveCycle(cycle.id));
    const result = recordExport({ volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'ada@workspace.example.org' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('CONSTRAINT_ERROR');
      expect(result.details).toEqual({ constraint: 'project_cycles.archived' });
    }
  });

  it('reports a missing job as NOT_FOUND', () => {
    const result = recordExport({ volunteerId: volunteer.id, jobId: '1'.repeat(32), workspaceEmail: 'a@w.example.org' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.details).toEqual({ entity: 'Job', id: '1'.repeat(32) });
    }
  });

  it('rejects a blank workspace email', () => {
    const result = recordExport({ volunteerId: volunteer.id, jobId: job.id, workspaceEmail: '' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.code).toBe('VALIDATION_ERROR');
    }
  });
});

describe('batchRecordExports', () => {
  it('records nothing when one receipt fails', () => {
    const second = expectOk(createVolunteer(cycle.id, volunteerInput({ email: 'second@example.org' })));
    const result = batchRecordExports([
      { volunteerId: second.id, jobId: job.id, workspaceEmail: 'second@w.example.org' },
      { volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'ada@w.example.org' },
      { volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'ada@w.example.org' },
    ]);

    expect(result.success).toBe(false);
    expect(expectOk(listExportsForJob(job.id))).toEqual([]);
  });
});

describe('removeExports', () => {
  it('deletes the named receipts and counts them', () => {
    const receipt = expectOk(recordExport({ volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'a@w.example.org' }));

    expect(expectOk(removeExports([receipt.id, '2'.repeat(32)]))).toBe(1);
    expect(expectOk(removeExports([]))).toBe(0);
    expect(receiptCount(volunteer.id, job.id)).toBe(0);
  });
});

describe('getExportedDetails', () => {
  it('joins receipts with the owning job status', () => {
    const receipt = expectOk(recordExport({ volunteerId: volunteer.id, jobId: job.id, workspaceEmail: 'a@w.example.org' }));
    expectOk(setJobStatus(job.id, 'complete'));

    expect(expectOk(getExportedDetails(cycle.id))).toEqual([
      { ...receipt, projectCycleId: cycle.id, jobStatus: 'complete' },
    ]);
  });

  it('ignores receipts of jobs in other cycles', () => {
    const other = makeCycle('Other');
    const otherJob = expectOk(createJob({ projectCycleId: other.id, label: 'Export elsewhere' }));
    expectOk(recordExport({ volunteerId: volunteer.id, jobId: otherJob.id, workspaceEmail: 'a@w.example.org' }));

    expect(expectOk(getExportedDetails(cycle.id))).toEqual([]);
    expect(expectOk(getExportedDetails(other.id))).toHaveLength(1);
  });
});
