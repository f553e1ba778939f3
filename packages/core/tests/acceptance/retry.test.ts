import { describe, it, expect, vi } from 'vitest';
import { Enricher } from '../../src/Enricher.js';
import { createTable } from '../../src/domain/model/Table.js';
import { found, notFound, permanentError, transientError } from '../../src/domain/model/LookupResult.js';
import { LookupUnreachableError } from '../../src/domain/errors/LookupUnreachableError.js';
import { InMemoryStateStore } from '../../src/infrastructure/state/InMemoryStateStore.js';
import type { LookupRetriedEvent, RowDeferredEvent } from '../../src/domain/events/DomainEvents.js';
import type { LookupFn } from '../../src/domain/ports/Lookup.js';

const table = createTable([{ CAS: '50-00-0' }, { CAS: '64-17-5' }, { CAS: '7732-18-5' }]);

describe('Retry mechanism', () => {
  it('should retry transient failures and succeed', async () => {
    const attempts = new Map<string, number>();
    const lookup: LookupFn = (key) => {
      const count = (attempts.get(key) ?? 0) + 1;
      attempts.set(key, count);
      // 64-17-5 fails twice then succeeds
      if (key === '64-17-5' && count <= 2) return Promise.reject(new Error('socket hang up'));
      return Promise.resolve(found(`id-${key}`));
    };

    const retried: LookupRetriedEvent[] = [];
    const enricher = new Enricher({ keyColumn: 'CAS', column: 'id', lookup, maxRetries: 2, retryDelayMs: 0 });
    enricher.on('lookup:retried', (e) => retried.push(e));

    const result = await enricher.enrich(table);

    expect(result.status).toBe('COMPLETED');
    expect(attempts.get('64-17-5')).toBe(3);
    expect(result.state.outcomes[1]).toEqual({ key: '64-17-5', status: 'RESOLVED', value: 'id-64-17-5', attempts: 3 });
    expect(retried.map((e) => [e.key, e.attempt, e.maxRetries, e.error])).toEqual([
      ['64-17-5', 1, 2, 'socket hang up'],
      ['64-17-5', 2, 2, 'socket hang up'],
    ]);
  });

  it('should not retry not-found answers or permanent errors', async () => {
    const lookup = vi.fn<LookupFn>((key) =>
      Promise.resolve(key === '50-00-0' ? notFound() : permanentError('malformed key')),
    );

    const result = await new Enricher({ keyColumn: 'CAS', column: 'id', lookup, maxRetries: 3, retryDelayMs: 0 }).enrich(
      table,
    );

    expect(lookup).toHaveBeenCalledTimes(3);
    expect(result.summary).toMatchObject({ notFound: 1, errors: 2 });
  });

  it('should defer a key after exhausting all retries', async () => {
    const lookup = vi.fn<LookupFn>((key) =>
      Promise.resolve(key === '7732-18-5' ? transientError('HTTP 429') : found('x')),
    );
    const deferred: RowDeferredEvent[] = [];
    const enricher = new Enricher({ keyColumn: 'CAS', column: 'id', lookup, maxRetries: 2, retryDelayMs: 0 });
    enricher.on('row:deferred', (e) => deferred.push(e));

    const result = await enricher.enrich(table);

    expect(lookup).toHaveBeenCalledTimes(5);
    expect(result.summary).toMatchObject({ resolved: 2, pending: 1 });
    expect(deferred).toHaveLength(1);
    expect(deferred[0]).toMatchObject({ rowIndex: 2, key: '7732-18-5', attempts: 3, error: 'HTTP 429' });
  });

  it('should wait with exponential backoff between attempts', async () => {
    let calls = 0;
    const lookup: LookupFn = () => {
      calls++;
      return Promise.resolve(calls <= 2 ? transientError('busy') : found('x'));
    };

    const start = Date.now();
    await new Enricher({ keyColumn: 'CAS', column: 'id', lookup, maxRetries: 2, retryDelayMs: 20 }).enrich(
      createTable([{ CAS: '50-00-0' }]),
    );

    // 20ms after the first attempt, 40ms after the second
    expect(Date.now() - start).toBeGreaterThanOrEqual(55);
    expect(calls).toBe(3);
  });

  it('should treat a call outliving timeoutMs as transient and abort its signal', async () => {
    const signals: AbortSignal[] = [];
    const lookup: LookupFn = (key, context) => {
      if (key !== '64-17-5') return Promise.resolve(found('x'));
      signals.push(context.signal);
      return new Promise(() => undefined);
    };
    const deferred: RowDeferredEvent[] = [];
    const enricher = new Enricher({ keyColumn: 'CAS', column: 'id', lookup, maxRetries: 0, timeoutMs: 20 });
    enricher.on('row:deferred', (e) => deferred.push(e));

    const result = await enricher.enrich(table);

    expect(result.summary).toMatchObject({ resolved: 2, pending: 1 });
    expect(deferred[0]?.error).toBe('Lookup timed out after 20ms');
    expect(signals[0]?.aborted).toBe(true);
  });

  it('should keep delayMs between successive lookups', async () => {
    const startedAt: number[] = [];
    const lookup: LookupFn = () => {
      startedAt.push(Date.now());
      return Promise.resolve(found('x'));
    };

    await new Enricher({ keyColumn: 'CAS', column: 'id', lookup, delayMs: 30 }).enrich(table);

    expect(startedAt).toHaveLength(3);
    expect((startedAt[1] ?? 0) - (startedAt[0] ?? 0)).toBeGreaterThanOrEqual(25);
    expect((startedAt[2] ?? 0) - (startedAt[1] ?? 0)).toBeGreaterThanOrEqual(25);
  });

  describe('unreachable lookup', () => {
    it('should fail fast when the first lookup keeps failing', async () => {
      const lookup = vi.fn<LookupFn>(() => Promise.reject(new Error('ECONNREFUSED')));
      const stateStore = new InMemoryStateStore();
      const enricher = new Enricher({
        keyColumn: 'CAS',
        column: 'id',
        lookup,
        jobId: 'offline',
        stateStore,
        maxRetries: 2,
        retryDelayMs: 0,
      });
      const failed = vi.fn();
      enricher.on('job:failed', failed);

      const error: unknown = await enricher.enrich(table).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LookupUnreachableError);
      if (!(error instanceof LookupUnreachableError)) return;
      expect(error.message).toBe("Lookup unreachable: key '50-00-0' failed 3 time(s), last error: ECONNREFUSED");
      expect(error.code).toBe('LOOKUP_UNREACHABLE');
      expect(error.attempts).toBe(3);
      expect(lookup).toHaveBeenCalledTimes(3);
      expect(enricher.getStatus().status).toBe('FAILED');
      expect(failed).toHaveBeenCalledOnce();
      expect((await stateStore.getJobState('offline'))?.status).toBe('FAILED');
    });

    it('should defer every key when fail-fast is disabled', async () => {
      const lookup: LookupFn = () => Promise.resolve(transientError('HTTP 502'));

      const result = await new Enricher({
        keyColumn: 'CAS',
        column: 'id',
        lookup,
        maxRetries: 0,
        failFastOnUnreachable: false,
      }).enrich(table);

      expect(result.status).toBe('COMPLETED');
      expect(result.summary).toMatchObject({ pending: 3, lookups: 3 });
    });

    it('should not fail fast once a lookup has succeeded', async () => {
      const lookup: LookupFn = (key) =>
        Promise.resolve(key === '50-00-0' ? found('x') : transientError('HTTP 502'));

      const result = await new Enricher({ keyColumn: 'CAS', column: 'id', lookup, maxRetries: 0 }).enrich(table);

      expect(result.status).toBe('COMPLETED');
      expect(result.summary).toMatchObject({ resolved: 1, pending: 2 });
    });
  });
});
