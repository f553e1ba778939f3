import { ColumnNotFoundError } from '../errors/ColumnNotFoundError.js';

/** A row of a table as read from a spreadsheet, CSV file or data frame. */
export interface Row {
  readonly [column: string]: unknown;
}

/** An immutable table with an explicit column order. */
export interface Table {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
}

/**
 * Build a table from rows.
 *
 * When `columns` is omitted the column list is the union of row keys in order
 * of first appearance.
 */
export function createTable(rows: readonly Row[], columns?: readonly string[]): Table {
  if (columns) return { columns: [...columns], rows: [...rows] };

  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return { columns: [...seen], rows: [...rows] };
}

/** A table with columns but no rows. */
export function emptyTable(columns: readonly string[]): Table {
  return { columns: [...columns], rows: [] };
}

export function hasColumn(table: Table, column: string): boolean {
  return table.columns.includes(column);
}

/** @throws ColumnNotFoundError when the table does not declare `column`. */
export function requireColumn(table: Table, column: string): void {
  if (!hasColumn(table, column)) {
    throw new ColumnNotFoundError(column, table.columns);
  }
}

/**
 * Return a new table where `column` holds `values[i]` for row `i`.
 * The column is appended when absent and overwritten in place otherwise.
 */
export function withColumn(table: Table, column: string, values: readonly unknown[]): Table {
  if (values.length !== table.rows.length) {
    throw new Error(`Expected ${String(table.rows.length)} values for column '${column}', got ${String(values.length)}`);
  }

  const columns = hasColumn(table, column) ? table.columns : [...table.columns, column];
  const rows = table.rows.map((row, i) => ({ ...row, [column]: values[i] }));
  return { columns, rows };
}

/** Return the rows at `indices`, in the order given, keeping every column. */
export function selectRows(table: Table, indices: readonly number[]): Table {
  const rows: Row[] = [];
  for (const index of indices) {
    const row = table.rows[index];
    if (row) rows.push(row);
  }
  return { columns: table.columns, rows };
}

/** Check whether every value in a row is empty (`undefined`, `null`, or `''`). */
export function isEmptyRow(row: Row): boolean {
  return Object.values(row).every((v) => v === undefined || v === null || v === '');
}
