import type { Table } from '@chemkit/core';
import { ColumnNotFoundError, requireColumn, selectRows } from '@chemkit/core';
import type { InvalidIdentifierFinding, InvalidIdentifierReport } from '../../domain/model/InvalidIdentifierReport.js';
import { normalizeIdentifier, toValidationError, validateIdentifier } from '../../domain/services/CasChecksum.js';

/** Options for `findInvalid()`. */
export interface FindInvalidOptions {
  /** Apply `normalizeIdentifier` to string cells before validating. Default: `false`. */
  readonly normalize?: boolean;
}

/** Use case: classify every identifier of a table column and keep the invalid rows. */
export class FindInvalidIdentifiers {
  private readonly normalize: boolean;

  constructor(options?: FindInvalidOptions) {
    this.normalize = options?.normalize ?? false;
  }

  /**
   * @param column - Column name, or its position in `table.columns`.
   * @throws ColumnNotFoundError when the column does not exist.
   */
  execute(table: Table, column: string | number): InvalidIdentifierReport {
    const name = this.resolveColumn(table, column);
    const findings: InvalidIdentifierFinding[] = [];

    table.rows.forEach((row, rowIndex) => {
      const value = row[name];
      const candidate = this.normalize && typeof value === 'string' ? normalizeIdentifier(value) : value;
      const result = validateIdentifier(candidate);
      if (result.status === 'VALID') return;

      findings.push({ rowIndex, value, result, error: toValidationError(result, name, value) });
    });

    return {
      column: name,
      table: selectRows(
        table,
        findings.map((f) => f.rowIndex),
      ),
      findings,
      checkedRows: table.rows.length,
    };
  }

  private resolveColumn(table: Table, column: string | number): string {
    if (typeof column === 'string') {
      requireColumn(table, column);
      return column;
    }

    const name = table.columns[column];
    if (name === undefined) throw new ColumnNotFoundError(`#${String(column)}`, table.columns);
    return name;
  }
}
