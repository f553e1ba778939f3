import type { CellValue } from './LookupResult.js';
import type { RowStatus } from './RowStatus.js';
import { canTransition, isRowStatus } from './RowStatus.js';
import { isCellValue } from './LookupResult.js';

/** What is known about one row key. */
export interface RowOutcome {
  /** Row key: the normalized key cell, or the row index in `keyBy: 'index'` mode. */
  readonly key: string;
  readonly status: RowStatus;
  /** Populated when `status` is `'RESOLVED'`. */
  readonly value?: CellValue;
  /** Permanent error for `'ERROR'`, or the last transient error of a deferred `'PENDING'` key. */
  readonly error?: string;
  /** Lookup calls made for this key in the run that produced the outcome. `0` when none. */
  readonly attempts: number;
}

export function createPendingOutcome(key: string): RowOutcome {
  return { key, status: 'PENDING', attempts: 0 };
}

function transition(outcome: RowOutcome, to: RowStatus): void {
  if (!canTransition(outcome.status, to)) {
    throw new Error(`Invalid row transition for key '${outcome.key}': ${outcome.status} → ${to}`);
  }
}

export function markResolved(outcome: RowOutcome, value: CellValue, attempts: number): RowOutcome {
  transition(outcome, 'RESOLVED');
  return { key: outcome.key, status: 'RESOLVED', value, attempts };
}

export function markNotFound(outcome: RowOutcome, attempts: number): RowOutcome {
  transition(outcome, 'NOT_FOUND');
  return { key: outcome.key, status: 'NOT_FOUND', attempts };
}

export function markError(outcome: RowOutcome, error: string, attempts: number): RowOutcome {
  transition(outcome, 'ERROR');
  return { key: outcome.key, status: 'ERROR', error, attempts };
}

/** Keep the key pending after a transient failure so a later run retries it. */
export function markDeferred(outcome: RowOutcome, error: string, attempts: number): RowOutcome {
  transition(outcome, 'PENDING');
  return { key: outcome.key, status: 'PENDING', error, attempts };
}

/** Structural check for outcomes read back from storage. */
export function isRowOutcome(value: unknown): value is RowOutcome {
  if (typeof value !== 'object' || value === null) return false;
  const candidate: { [key: string]: unknown } = { ...value };
  return (
    typeof candidate['key'] === 'string' &&
    isRowStatus(candidate['status']) &&
    typeof candidate['attempts'] === 'number' &&
    (candidate['value'] === undefined || isCellValue(candidate['value'])) &&
    (candidate['error'] === undefined || typeof candidate['error'] === 'string')
  );
}
