import { describe, it, expect, vi } from 'vitest';
import { Enricher } from '../../src/Enricher.js';
import { createTable } from '../../src/domain/model/Table.js';
import { found } from '../../src/domain/model/LookupResult.js';
import { InMemoryStateStore } from '../../src/infrastructure/state/InMemoryStateStore.js';
import type { LookupFn } from '../../src/domain/ports/Lookup.js';

const table = createTable(['a', 'b', 'c'].map((key) => ({ key })));

describe('Abort', () => {
  it('should stop after the row in flight', async () => {
    const calls: string[] = [];
    const enricher: Enricher = new Enricher({
      keyColumn: 'key',
      column: 'value',
      lookup: async (key) => {
        calls.push(key);
        if (key === 'b') await enricher.abort();
        return found(key.toUpperCase());
      },
    });
    const aborted = vi.fn();
    enricher.on('job:aborted', aborted);

    const result = await enricher.enrich(table);

    expect(result.status).toBe('ABORTED');
    expect(calls).toEqual(['a', 'b']);
    expect(result.table.rows.map((r) => r['value'])).toEqual(['A', 'B', null]);
    expect(result.table.rows.map((r) => r['value_status'])).toEqual(['RESOLVED', 'RESOLVED', 'PENDING']);
    expect(aborted).toHaveBeenCalledOnce();
  });

  it('should stop when the configured signal is aborted', async () => {
    const controller = new AbortController();
    const lookup = vi.fn<LookupFn>((key, context) => {
      if (key === 'a') controller.abort();
      expect(context.signal.aborted).toBe(key === 'a');
      return Promise.resolve(found(key));
    });

    const result = await new Enricher({ keyColumn: 'key', column: 'value', lookup, signal: controller.signal }).enrich(
      table,
    );

    expect(result.status).toBe('ABORTED');
    expect(lookup).toHaveBeenCalledOnce();
  });

  it('should not look anything up when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const lookup = vi.fn<LookupFn>(() => Promise.resolve(found('x')));

    const result = await new Enricher({ keyColumn: 'key', column: 'value', lookup, signal: controller.signal }).enrich(
      table,
    );

    expect(result.status).toBe('ABORTED');
    expect(lookup).not.toHaveBeenCalled();
  });

  it('should persist a paused job when it is aborted', async () => {
    const stateStore = new InMemoryStateStore();
    const enricher = new Enricher({
      keyColumn: 'key',
      column: 'value',
      jobId: 'paused-then-aborted',
      stateStore,
      lookup: (key) => Promise.resolve(found(key)),
    });

    await enricher.enrichChunk(table, { maxLookups: 1 });
    await enricher.abort();

    expect(enricher.getStatus().status).toBe('ABORTED');
    expect((await stateStore.getJobState('paused-then-aborted'))?.status).toBe('ABORTED');
    await expect(enricher.enrich(table)).rejects.toThrow("Cannot start enrichment from status 'ABORTED'");
  });

  it('should refuse to abort a job that has not started', async () => {
    const enricher = new Enricher({ keyColumn: 'key', column: 'value', lookup: () => Promise.resolve(found('x')) });
    await expect(enricher.abort()).rejects.toThrow("Cannot abort enrichment from status 'CREATED'");
  });
});
