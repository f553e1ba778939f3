/**
 * Finite state machine for an enrichment job.
 *
 * Valid transitions:
 * - `CREATED` → `PROCESSING`
 * - `PROCESSING` → `PAUSED` | `COMPLETED` | `ABORTED` | `FAILED`
 * - `PAUSED` → `PROCESSING` | `ABORTED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 */
export const JobStatus = {
  CREATED: 'CREATED',
  PROCESSING: 'PROCESSING',
  PAUSED: 'PAUSED',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.CREATED]: [JobStatus.PROCESSING],
  [JobStatus.PROCESSING]: [JobStatus.PAUSED, JobStatus.COMPLETED, JobStatus.ABORTED, JobStatus.FAILED],
  [JobStatus.PAUSED]: [JobStatus.PROCESSING, JobStatus.ABORTED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.ABORTED]: [],
  [JobStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the job lifecycle FSM. */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(VALID_TRANSITIONS, value);
}
