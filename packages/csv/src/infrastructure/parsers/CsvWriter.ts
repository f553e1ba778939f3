import Papa from 'papaparse';
import type { Table } from '@chemkit/core';

export interface CsvWriterOptions {
  /** Default: `','`. */
  readonly delimiter?: string;
  /** Default: `'\n'`. */
  readonly newline?: string;
  /** Quote every cell instead of only those that need it. Default: `false`. */
  readonly quoteAll?: boolean;
}

/** Write a `Table` as CSV with a header row, using PapaParse. Empty cells are written as `''`. */
export class CsvWriter {
  private readonly delimiter: string;
  private readonly newline: string;
  private readonly quoteAll: boolean;

  constructor(options?: CsvWriterOptions) {
    this.delimiter = options?.delimiter ?? ',';
    this.newline = options?.newline ?? '\n';
    this.quoteAll = options?.quoteAll ?? false;
  }

  write(table: Table): string {
    const data = table.rows.map((row) => table.columns.map((column) => toCell(row[column])));
    return Papa.unparse(
      { fields: [...table.columns], data },
      { delimiter: this.delimiter, newline: this.newline, quotes: this.quoteAll, header: true },
    );
  }
}

function toCell(value: unknown): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}
