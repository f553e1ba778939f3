import type { EnricherConfig, KeyValidateFn, Table } from '@chemkit/core';
import type { CasValidationResult } from './domain/model/CasValidationResult.js';
import type { InvalidIdentifierReport } from './domain/model/InvalidIdentifierReport.js';
import {
  normalizeIdentifier,
  toValidationResult,
  validateIdentifier,
} from './domain/services/CasChecksum.js';
import { FindInvalidIdentifiers } from './application/usecases/FindInvalidIdentifiers.js';
import type { FindInvalidOptions } from './application/usecases/FindInvalidIdentifiers.js';

/** Options for `casKeyValidator()`. */
export interface CasKeyValidatorOptions {
  /** Field name reported in validation errors. Default: `'CAS'`. */
  readonly field?: string;
}

/** Key settings for an `Enricher` keyed by CAS number. */
export type CasKeySettings = Required<Pick<EnricherConfig, 'normalizeKey' | 'validateKey'>>;

/**
 * Return the rows of `table` whose `column` does not hold a valid CAS number.
 *
 * Format and checksum problems are reported per row and never stop the scan;
 * only a missing column throws.
 *
 * @example
 * ```typescript
 * const report = findInvalid(substances, 'CAS Number');
 * if (report.table.rows.length === 0) console.log('All CAS numbers are valid');
 * ```
 *
 * @throws ColumnNotFoundError when the column does not exist.
 */
export function findInvalid(
  table: Table,
  column: string | number,
  options?: FindInvalidOptions,
): InvalidIdentifierReport {
  return new FindInvalidIdentifiers(options).execute(table, column);
}

/**
 * Key validator for the enricher: keys that are not valid CAS numbers become
 * permanent errors without a lookup call.
 *
 * The key is checked exactly as the lookup will receive it, that is after the
 * enricher's `normalizeKey`. Use `casKeys()` to strip spreadsheet quotes too.
 */
export function casKeyValidator(options?: CasKeyValidatorOptions): KeyValidateFn {
  const field = options?.field ?? 'CAS';

  return (key) => {
    const result: CasValidationResult = validateIdentifier(key);
    return toValidationResult(result, field, key);
  };
}

/**
 * `normalizeKey` and `validateKey` for an enricher keyed by CAS number:
 * cells are cleaned with `normalizeIdentifier`, so `'50-00-0` is both
 * validated and looked up as `50-00-0`.
 *
 * @example
 * ```typescript
 * const enricher = new Enricher({ keyColumn: 'CAS', column: 'HMDB_id', lookup, ...casKeys() });
 * ```
 */
export function casKeys(options?: CasKeyValidatorOptions): CasKeySettings {
  return {
    normalizeKey: normalizeIdentifier,
    validateKey: casKeyValidator(options),
  };
}
