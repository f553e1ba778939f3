import { describe, it, expect } from 'vitest';
import * as JobMapper from '../../src/mappers/JobMapper.js';
import type { JobRow } from '../../src/models/JobModel.js';

describe('JobMapper', () => {
  describe('toRow', () => {
    it('should map a job state to a row', () => {
      const row = JobMapper.toRow({
        id: 'job-001',
        keyColumn: 'CAS',
        column: 'hmdb_id',
        status: 'PROCESSING',
        totalRows: 12,
        startedAt: 1700000000000,
      });

      expect(row).toEqual({
        id: 'job-001',
        keyColumn: 'CAS',
        column: 'hmdb_id',
        status: 'PROCESSING',
        totalRows: 12,
        startedAt: 1700000000000,
        completedAt: null,
      });
    });
  });

  describe('toDomain', () => {
    const row: JobRow = {
      id: 'job-001',
      keyColumn: 'CAS',
      column: 'hmdb_id',
      status: 'COMPLETED',
      totalRows: 12,
      startedAt: '1700000000000',
      completedAt: '1700000009000',
    };

    it('should convert BIGINT strings to numbers', () => {
      const job = JobMapper.toDomain(row);

      expect(job.startedAt).toBe(1700000000000);
      expect(job.completedAt).toBe(1700000009000);
    });

    it('should leave null timestamps out', () => {
      const job = JobMapper.toDomain({ ...row, startedAt: null, completedAt: null });

      expect(job).toEqual({ id: 'job-001', keyColumn: 'CAS', column: 'hmdb_id', status: 'COMPLETED', totalRows: 12 });
      expect('startedAt' in job).toBe(false);
    });

    it('should reject an unknown status', () => {
      expect(() => JobMapper.toDomain({ ...row, status: 'DONE' })).toThrow("Unknown job status 'DONE' for job 'job-001'");
    });
  });
});
