import type { Table, ValidationError } from '@chemkit/core';
import type { CasValidationFailure } from './CasValidationResult.js';

/** One row whose identifier is not a valid CAS number. */
export interface InvalidIdentifierFinding {
  /** Position of the row in the input table. */
  readonly rowIndex: number;
  /** The cell as found in the table, before any normalization. */
  readonly value: unknown;
  readonly result: CasValidationFailure;
  readonly error: ValidationError;
}

/**
 * Result of `findInvalid()`.
 *
 * `table` always exists: when every identifier is valid it has the input's
 * columns and no rows.
 */
export interface InvalidIdentifierReport {
  /** Column that was checked. */
  readonly column: string;
  /** The invalid rows, in input order, with every input column. */
  readonly table: Table;
  readonly findings: readonly InvalidIdentifierFinding[];
  readonly checkedRows: number;
}
