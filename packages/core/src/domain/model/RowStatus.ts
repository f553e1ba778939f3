/**
 * Lifecycle of a row key during enrichment.
 *
 * - `PENDING` → `RESOLVED` | `NOT_FOUND` | `ERROR` | `PENDING` (deferred after a transient failure)
 * - `RESOLVED`, `NOT_FOUND`, `ERROR` → (terminal, never looked up again)
 */
export const RowStatus = {
  PENDING: 'PENDING',
  RESOLVED: 'RESOLVED',
  NOT_FOUND: 'NOT_FOUND',
  ERROR: 'ERROR',
} as const;

export type RowStatus = (typeof RowStatus)[keyof typeof RowStatus];

const VALID_TRANSITIONS: Record<RowStatus, readonly RowStatus[]> = {
  [RowStatus.PENDING]: [RowStatus.PENDING, RowStatus.RESOLVED, RowStatus.NOT_FOUND, RowStatus.ERROR],
  [RowStatus.RESOLVED]: [],
  [RowStatus.NOT_FOUND]: [],
  [RowStatus.ERROR]: [],
};

export function canTransition(from: RowStatus, to: RowStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/** Terminal statuses are final answers and survive every resume. */
export function isTerminal(status: RowStatus): boolean {
  return status !== RowStatus.PENDING;
}

export function isRowStatus(value: unknown): value is RowStatus {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(VALID_TRANSITIONS, value);
}
