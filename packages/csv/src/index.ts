// Ports
export type { TableParser, ParserOptions } from './domain/ports/TableParser.js';

// Infrastructure adapters
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { CsvWriter } from './infrastructure/parsers/CsvWriter.js';
export type { CsvWriterOptions } from './infrastructure/parsers/CsvWriter.js';
export { CsvTableStateStore } from './infrastructure/state/CsvTableStateStore.js';
export type { CsvTableStateStoreOptions } from './infrastructure/state/CsvTableStateStore.js';
export { readCsvTable, writeCsvTable } from './files.js';
