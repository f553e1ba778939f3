import { describe, it, expect } from 'vitest';
import { createTable } from '@chemkit/core';
import { CsvWriter } from '../../src/infrastructure/parsers/CsvWriter.js';
import { CsvParser } from '../../src/infrastructure/parsers/CsvParser.js';

describe('CsvWriter', () => {
  const table = createTable(
    [
      { CAS: '50-00-0', HMDB_id: 'HMDB01', HMDB_id_status: 'RESOLVED' },
      { CAS: '7732-18-5', HMDB_id: null, HMDB_id_status: 'PENDING' },
    ],
    ['CAS', 'HMDB_id', 'HMDB_id_status'],
  );

  it('should write a header row and empty cells for missing values', () => {
    expect(new CsvWriter().write(table)).toBe(
      'CAS,HMDB_id,HMDB_id_status\n50-00-0,HMDB01,RESOLVED\n7732-18-5,,PENDING',
    );
  });

  it('should quote cells that need it', () => {
    const tricky = createTable([{ Name: 'formaldehyde, aqueous', Note: 'say "hi"' }]);
    expect(new CsvWriter().write(tricky)).toBe('Name,Note\n"formaldehyde, aqueous","say ""hi"""');
  });

  it('should stringify numbers and booleans', () => {
    expect(new CsvWriter().write(createTable([{ Mass: 30.026, Toxic: true }]))).toBe('Mass,Toxic\n30.026,true');
  });

  it('should follow the table column order, not the row key order', () => {
    const reordered = createTable([{ b: '2', a: '1' }], ['a', 'b']);
    expect(new CsvWriter().write(reordered)).toBe('a,b\n1,2');
  });

  it('should use the configured delimiter', () => {
    expect(new CsvWriter({ delimiter: ';' }).write(createTable([{ a: '1', b: '2' }]))).toBe('a;b\n1;2');
  });

  it('should read back what it wrote', () => {
    const parsed = new CsvParser().parseTable(new CsvWriter().write(table));

    expect(parsed.columns).toEqual(table.columns);
    expect(parsed.rows).toEqual([
      { CAS: '50-00-0', HMDB_id: 'HMDB01', HMDB_id_status: 'RESOLVED' },
      { CAS: '7732-18-5', HMDB_id: '', HMDB_id_status: 'PENDING' },
    ]);
  });
});
