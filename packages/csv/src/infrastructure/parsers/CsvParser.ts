import Papa from 'papaparse';
import type { Row, Table } from '@chemkit/core';
import { createTable, isEmptyRow } from '@chemkit/core';
import type { TableParser, ParserOptions } from '../../domain/ports/TableParser.js';

/**
 * CSV parser adapter using PapaParse. Supports auto-delimiter detection and
 * header mapping. Cells are kept as strings.
 *
 * Without a header row, columns are named by position: `'0'`, `'1'`, …
 */
export class CsvParser implements TableParser {
  private readonly options: Required<Omit<ParserOptions, 'delimiter'>> & Pick<ParserOptions, 'delimiter'>;

  constructor(options?: ParserOptions) {
    this.options = {
      delimiter: options?.delimiter,
      encoding: options?.encoding ?? 'utf-8',
      hasHeader: options?.hasHeader ?? true,
      skipEmptyRows: options?.skipEmptyRows ?? true,
    };
  }

  parse(data: string | Buffer): Iterable<Row> {
    return this.parseTable(data).rows;
  }

  parseTable(data: string | Buffer): Table {
    const content = this.decode(data);
    return this.options.hasHeader ? this.parseWithHeader(content) : this.parseWithoutHeader(content);
  }

  detect(sample: string | Buffer): ParserOptions {
    const content = this.decode(sample);
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    const delimiters = [',', ';', '\t', '|'];
    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of delimiters) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return {
      delimiter: bestDelimiter,
      encoding: this.options.encoding,
      hasHeader: true,
    };
  }

  private decode(data: string | Buffer): string {
    const content = typeof data === 'string' ? data : data.toString(this.options.encoding);
    // Spreadsheet exports often start with a byte order mark
    return content.startsWith('\uFEFF') ? content.slice(1) : content;
  }

  private parseWithHeader(content: string): Table {
    const result = Papa.parse<Record<string, string>>(content, {
      header: true,
      delimiter: this.options.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const columns = result.meta.fields ?? [];
    const rows = result.data.filter((row) => !this.options.skipEmptyRows || !isEmptyRow(row));
    return createTable(rows, columns);
  }

  private parseWithoutHeader(content: string): Table {
    const result = Papa.parse<string[]>(content, {
      header: false,
      delimiter: this.options.delimiter ?? '',
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    const width = result.data.reduce((max, cells) => Math.max(max, cells.length), 0);
    const columns = Array.from({ length: width }, (_, i) => String(i));
    const rows = result.data
      .map((cells) => Object.fromEntries(columns.map((column, i) => [column, cells[i] ?? ''])))
      .filter((row) => !this.options.skipEmptyRows || !isEmptyRow(row));
    return createTable(rows, columns);
  }
}
