/**
 * Startup validation checks.
 *
 * Runs after config load and migrations. Emits warnings (non-fatal) about
 * data the import/export workers will not pick up again.
 */

import { queryAll } from '../repos/base';

export interface StrandedJobs {
  projectCycleId: string;
  cycleName: string;
  count: number;
}

/**
 * Pending jobs whose cycle is archived. Archiving blocks exports, so these
 * jobs cannot finish their work.
 */
export function checkStrandedJobs(): StrandedJobs[] {
  return queryAll<StrandedJobs>(
    `SELECT pc.id AS projectCycleId, pc.name AS cycleName, COUNT(*) AS count
     FROM jobs j JOIN project_cycles pc ON pc.id = j.project_cycle_id
     WHERE j.status = 'pending' AND pc.archived = 1
     GROUP BY pc.id, pc.name
     ORDER BY pc.name`
  );
}

/**
 * Run startup checks and emit warnings to stderr.
 * Non-fatal: a failing check is reported, never thrown.
 */
export function runStartupChecks(): void {
  try {
    const stranded = checkStrandedJobs();

    if (stranded.length > 0) {
      console.error('[cohort-registry] WARNING: Found pending jobs in archived project cycles:');
      for (const entry of stranded) {
        console.error(`  - ${entry.count} job(s) in "${entry.cycleName}" (${entry.projectCycleId})`);
      }
      console.error('[cohort-registry] Cancel them or unarchive the cycle to let exports finish.');
    }
  } catch (error) {
    console.error(
      `[cohort-registry] WARNING: startup checks failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
