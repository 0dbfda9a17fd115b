import { InvalidTransitionError } from '../domain/types';
import { JOB_STATUSES, type JobStatus } from '../domain/value-sets';

/**
 * Job status transitions.
 *
 * pending may be re-reported (a progress update) or move to any outcome.
 * The outcomes are terminal.
 */
export const JOB_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['pending', 'complete', 'cancelled', 'error'],
  complete: [],
  cancelled: [],
  error: [],
};

export const TERMINAL_JOB_STATUSES: readonly JobStatus[] = JOB_STATUSES.filter(
  status => JOB_TRANSITIONS[status].length === 0
);

export function isTerminalJobStatus(status: JobStatus): boolean {
  return TERMINAL_JOB_STATUSES.includes(status);
}

export function getAllowedJobTransitions(from: JobStatus): readonly JobStatus[] {
  return JOB_TRANSITIONS[from];
}

export function isValidJobTransition(from: JobStatus, to: JobStatus): boolean {
  return JOB_TRANSITIONS[from].includes(to);
}

/**
 * Throws InvalidTransitionError for a disallowed move. With `strict` off
 * every move is accepted.
 */
export function assertJobTransition(from: JobStatus, to: JobStatus, strict: boolean): void {
  if (!strict || isValidJobTransition(from, to)) {
    return;
  }
  throw new InvalidTransitionError(from, to, getAllowedJobTransitions(from));
}
