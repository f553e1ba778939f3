/** Thrown when an operation names a column the table does not have. */
export class ColumnNotFoundError extends Error {
  readonly code = 'COLUMN_NOT_FOUND';

  constructor(
    readonly column: string,
    readonly availableColumns: readonly string[],
  ) {
    super(`Column '${column}' not found. Available columns: ${availableColumns.join(', ') || '(none)'}`);
    this.name = 'ColumnNotFoundError';
  }
}
