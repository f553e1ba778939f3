import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Sequelize } from 'sequelize';
import { rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Enricher, createTable, found } from '@chemkit/core';
import type { EnrichmentSnapshot, JobState, LookupFn, RowOutcome } from '@chemkit/core';
import { SQLite3Wrapper } from '../better-sqlite3-adapter.js';
import { SequelizeStateStore } from '../../src/SequelizeStateStore.js';

function createJobState(overrides?: Partial<JobState>): JobState {
  return {
    id: 'job-001',
    keyColumn: 'CAS',
    column: 'hmdb_id',
    status: 'PROCESSING',
    totalRows: 6,
    startedAt: 1700000000000,
    ...overrides,
  };
}

const OUTCOMES: readonly RowOutcome[] = [
  { key: '7732-18-5', status: 'RESOLVED', value: 'HMDB0002111', attempts: 1 },
  { key: '50-00-0', status: 'RESOLVED', value: 1712, attempts: 2 },
  { key: '64-17-5', status: 'RESOLVED', value: true, attempts: 1 },
  { key: '80-05-7', status: 'NOT_FOUND', attempts: 1 },
  { key: '123-45-6', status: 'ERROR', error: 'Invalid check digit', attempts: 0 },
  { key: '67-64-1', status: 'PENDING', error: 'HTTP 503', attempts: 3 },
];

function createSnapshot(job: JobState, outcomes: readonly RowOutcome[]): EnrichmentSnapshot {
  return {
    job,
    state: { column: job.column, outcomes },
    table: createTable([], ['CAS', job.column]),
  };
}

describe('SequelizeStateStore', () => {
  let sequelize: Sequelize;
  let store: SequelizeStateStore;
  let dbPath: string;

  beforeEach(async () => {
    dbPath = path.join(os.tmpdir(), `chemkit-seq-${String(Date.now())}-${String(Math.random())}.sqlite`);
    sequelize = new Sequelize({
      dialect: 'sqlite',
      storage: dbPath,
      logging: false,
      dialectModule: { Database: SQLite3Wrapper },
      pool: {
        max: 1,
        min: 1,
        idle: 30000,
        acquire: 60000,
        evict: 30000,
      },
    });
    store = new SequelizeStateStore(sequelize);
    await store.initialize();
  });

  afterEach(async () => {
    await sequelize.close();
    await rm(dbPath, { force: true });
  });

  describe('initialize', () => {
    it('should create tables on a fresh database', async () => {
      const fresh = new Sequelize({
        dialect: 'sqlite',
        storage: ':memory:',
        logging: false,
        dialectModule: { Database: SQLite3Wrapper },
      });
      await expect(new SequelizeStateStore(fresh).initialize()).resolves.toBeUndefined();
      await fresh.close();
    });

    it('should be idempotent', async () => {
      await expect(store.initialize()).resolves.toBeUndefined();
      await expect(store.initialize()).resolves.toBeUndefined();
    });
  });

  describe('getJobState', () => {
    it('should return the saved job', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));

      expect(await store.getJobState('job-001')).toEqual({
        id: 'job-001',
        keyColumn: 'CAS',
        column: 'hmdb_id',
        status: 'PROCESSING',
        totalRows: 6,
        startedAt: 1700000000000,
      });
    });

    it('should return null for an unknown job', async () => {
      expect(await store.getJobState('missing')).toBeNull();
    });

    it('should update the job on a later save', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));
      await store.saveSnapshot(
        createSnapshot(createJobState({ status: 'COMPLETED', completedAt: 1700000005000 }), OUTCOMES),
      );

      const job = await store.getJobState('job-001');
      expect(job?.status).toBe('COMPLETED');
      expect(job?.completedAt).toBe(1700000005000);
    });
  });

  describe('loadState', () => {
    it('should return null for an unknown job', async () => {
      expect(await store.loadState('missing')).toBeNull();
    });

    it('should restore outcomes in order with their value types', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));

      const state = await store.loadState('job-001');

      expect(state).toEqual({ column: 'hmdb_id', outcomes: OUTCOMES });
    });

    it('should return an empty state for a job saved before any outcome', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), []));

      expect(await store.loadState('job-001')).toEqual({ column: 'hmdb_id', outcomes: [] });
    });

    it('should replace the outcomes of the previous snapshot', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));
      const next: readonly RowOutcome[] = [
        { key: '67-64-1', status: 'RESOLVED', value: 'HMDB0001659', attempts: 1 },
        { key: '7732-18-5', status: 'RESOLVED', value: 'HMDB0002111', attempts: 1 },
      ];
      await store.saveSnapshot(createSnapshot(createJobState(), next));

      const state = await store.loadState('job-001');
      expect(state?.outcomes).toEqual(next);
    });

    it('should keep jobs apart', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));
      await store.saveSnapshot(createSnapshot(createJobState({ id: 'job-002' }), OUTCOMES.slice(0, 1)));

      expect((await store.loadState('job-001'))?.outcomes).toHaveLength(6);
      expect((await store.loadState('job-002'))?.outcomes).toEqual(OUTCOMES.slice(0, 1));
    });
  });

  describe('deleteJob', () => {
    it('should remove the job and its outcomes', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));

      await store.deleteJob('job-001');

      expect(await store.getJobState('job-001')).toBeNull();
      expect(await store.loadState('job-001')).toBeNull();
    });

    it('should ignore an unknown job', async () => {
      await expect(store.deleteJob('missing')).resolves.toBeUndefined();
    });
  });

  describe('tablePrefix', () => {
    it('should store jobs in separate tables per prefix', async () => {
      const labStore = new SequelizeStateStore(sequelize, { tablePrefix: 'lab_' });
      await labStore.initialize();

      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));

      expect(await labStore.getJobState('job-001')).toBeNull();
      expect(await store.getJobState('job-001')).not.toBeNull();
    });
  });

  describe('incremental snapshots', () => {
    let written: string[];

    beforeEach(() => {
      written = [];
      sequelize.addHook('beforeBulkCreate', (instances) => {
        for (const instance of instances) written.push(String(instance.get('rowKey')));
      });
    });

    it('should write only new and changed outcomes after the first snapshot', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));
      const next: readonly RowOutcome[] = [
        ...OUTCOMES.slice(0, 5),
        { key: '67-64-1', status: 'RESOLVED', value: 'HMDB0001659', attempts: 1 },
        { key: '71-43-2', status: 'NOT_FOUND', attempts: 1 },
      ];
      await store.saveSnapshot(createSnapshot(createJobState(), next));

      expect(written).toHaveLength(8);
      expect(written.slice(6)).toEqual(['67-64-1', '71-43-2']);
      expect((await store.loadState('job-001'))?.outcomes).toEqual(next);
    });

    it('should delete keys that left the state', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES.slice(1)));

      expect((await store.loadState('job-001'))?.outcomes).toEqual(OUTCOMES.slice(1));
    });

    it('should continue incrementally from a loaded state', async () => {
      await store.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));
      const reopened = new SequelizeStateStore(sequelize);
      await reopened.loadState('job-001');
      written = [];

      await reopened.saveSnapshot(createSnapshot(createJobState(), OUTCOMES));

      expect(written).toEqual([]);
      expect((await reopened.loadState('job-001'))?.outcomes).toEqual(OUTCOMES);
    });

    it('should write each outcome once over a whole run', async () => {
      const rows = Array.from({ length: 20 }, (_, i) => ({ CAS: `key-${String(i + 1)}` }));
      const result = await new Enricher({
        keyColumn: 'CAS',
        column: 'id',
        lookup: (key) => Promise.resolve(found(key.toUpperCase())),
        jobId: 'long-run',
        stateStore: store,
        batchSize: 1,
      }).enrich(createTable(rows, ['CAS']));

      expect(result.status).toBe('COMPLETED');
      expect(written).toHaveLength(20);
      expect((await store.loadState('long-run'))?.outcomes).toHaveLength(20);
    });
  });

  describe('with Enricher', () => {
    const echo: LookupFn = (key) => Promise.resolve(found(key.toUpperCase()));
    const table = createTable(
      [{ CAS: 'key-1' }, { CAS: 'key-2' }, { CAS: 'key-3' }, { CAS: 'key-4' }],
      ['CAS'],
    );

    it('should resume an interrupted job', async () => {
      const controller = new AbortController();
      const interrupted: LookupFn = (key, context) => {
        if (key === 'key-2') controller.abort();
        return echo(key, context);
      };

      const first = await new Enricher({
        keyColumn: 'CAS',
        column: 'id',
        lookup: interrupted,
        jobId: 'resume-me',
        stateStore: store,
        signal: controller.signal,
      }).enrich(table);
      expect(first.status).toBe('ABORTED');
      expect((await store.getJobState('resume-me'))?.status).toBe('ABORTED');

      const lookup = vi.fn(echo);
      const second = await new Enricher({
        keyColumn: 'CAS',
        column: 'id',
        lookup,
        jobId: 'resume-me',
        stateStore: new SequelizeStateStore(sequelize),
      }).enrich(table);

      expect(lookup.mock.calls.map((call) => call[0])).toEqual(['key-3', 'key-4']);
      expect(second.table.rows.map((r) => r['id'])).toEqual(['KEY-1', 'KEY-2', 'KEY-3', 'KEY-4']);
      expect((await store.getJobState('resume-me'))?.status).toBe('COMPLETED');
    });
  });
});
