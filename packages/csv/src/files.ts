import { readFile } from 'node:fs/promises';
import type { Table } from '@chemkit/core';
import { writeFileAtomic } from '@chemkit/core';
import type { ParserOptions } from './domain/ports/TableParser.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { CsvWriter } from './infrastructure/parsers/CsvWriter.js';
import type { CsvWriterOptions } from './infrastructure/parsers/CsvWriter.js';

/** Read a CSV file into a `Table`. */
export async function readCsvTable(filePath: string, options?: ParserOptions): Promise<Table> {
  const content = await readFile(filePath);
  return new CsvParser(options).parseTable(content);
}

/** Write a `Table` to a CSV file, replacing it atomically. */
export async function writeCsvTable(filePath: string, table: Table, options?: CsvWriterOptions): Promise<void> {
  await writeFileAtomic(filePath, new CsvWriter(options).write(table));
}
