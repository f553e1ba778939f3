import type { Row, Table } from '@chemkit/core';

/** Auto-detected or configured parser options. */
export interface ParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). */
  readonly delimiter?: string;
  /** Character encoding of `Buffer` input. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
  /** Whether the first row contains column headers. Default: `true`. */
  readonly hasHeader?: boolean;
  /** Drop rows whose cells are all empty. Default: `true`. */
  readonly skipEmptyRows?: boolean;
}

/**
 * Port for reading tabular text into a `Table`.
 *
 * Implement this interface to support new formats. `parse()` yields rows
 * lazily; `parseTable()` also reports the column order.
 */
export interface TableParser {
  parse(data: string | Buffer): Iterable<Row>;
  parseTable(data: string | Buffer): Table;
  /** Auto-detect parser options from a small sample of data. */
  detect?(sample: string | Buffer): ParserOptions;
}
