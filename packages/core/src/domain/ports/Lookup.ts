import type { LookupResult } from '../model/LookupResult.js';
import type { Row } from '../model/Table.js';
import type { ValidationResult } from '../model/ValidationResult.js';

/** Context passed to every lookup call. */
export interface LookupContext {
  readonly jobId: string;
  /** Index of the first row carrying this key. */
  readonly rowIndex: number;
  /** The full row, for lookups that need more than the key (e.g. a query suffix per row). */
  readonly row: Row;
  /** 1-based attempt number. */
  readonly attempt: number;
  /** Aborted when the job is aborted or the call times out. */
  readonly signal: AbortSignal;
}

/**
 * The external lookup capability: given a key, answer with a value, a
 * not-found, or an error. A rejected promise counts as a transient error.
 */
export type LookupFn = (key: string, context: LookupContext) => Promise<LookupResult>;

/** Checks a key before any lookup is made. Invalid keys become permanent errors. */
export type KeyValidateFn = (key: string) => ValidationResult;

/** Return `true` to leave a row out of the enrichment (no lookup, empty cell). */
export type SkipKeyFn = (key: string, row: Row) => boolean;
