import type { EnrichmentState } from './domain/model/EnrichmentState.js';
import type { EnrichmentTargetOptions } from './domain/model/EnrichmentTarget.js';
import { resolveTarget } from './domain/model/EnrichmentTarget.js';
import type { Table } from './domain/model/Table.js';
import type { KeyValidateFn, LookupFn, SkipKeyFn } from './domain/ports/Lookup.js';
import type { StateStore } from './domain/ports/StateStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { ListenerErrorHandler } from './application/EventBus.js';
import { EnrichmentContext } from './application/EnrichmentContext.js';
import type { EnrichmentResult } from './application/EnrichmentContext.js';
import { RunEnrichment } from './application/usecases/RunEnrichment.js';
import { ProcessChunk } from './application/usecases/ProcessChunk.js';
import type { ChunkOptions, ChunkResult } from './application/usecases/ProcessChunk.js';
import { AbortEnrichment } from './application/usecases/AbortEnrichment.js';
import { GetEnrichmentStatus } from './application/usecases/GetEnrichmentStatus.js';
import type { EnrichmentStatusResult } from './application/usecases/GetEnrichmentStatus.js';
import { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';

/** Configuration for an enrichment job. */
export interface EnricherConfig extends EnrichmentTargetOptions {
  /** The external lookup. */
  readonly lookup: LookupFn;
  /** Job identifier used by the state store. Reuse it to resume a job. Default: random UUID. */
  readonly jobId?: string;
  /** Rows per persisted snapshot. Default: `1` (persist after every row). */
  readonly batchSize?: number;
  /** Persistence adapter for progress. Default: `InMemoryStateStore`. */
  readonly stateStore?: StateStore;
  /**
   * Maximum number of retry attempts after a transient lookup failure.
   * Permanent errors and not-found answers are never retried.
   * Default: `2`.
   */
  readonly maxRetries?: number;
  /**
   * Base delay in milliseconds between retry attempts.
   * Uses exponential backoff: `retryDelayMs * 2^(attempt - 1)`.
   * Default: `1000`.
   */
  readonly retryDelayMs?: number;
  /** Per-call timeout in milliseconds. A timed out call is a transient error. Default: none. */
  readonly timeoutMs?: number;
  /** Minimum pause in milliseconds between lookup calls, to stay under rate limits. Default: `0`. */
  readonly delayMs?: number;
  /**
   * When `true`, a run whose first lookup still fails transiently after all
   * retries throws `LookupUnreachableError` instead of deferring every row.
   * Default: `true`.
   */
  readonly failFastOnUnreachable?: boolean;
  /** Checked before each lookup. Invalid keys are recorded as permanent errors. */
  readonly validateKey?: KeyValidateFn;
  /** Rows for which this returns `true` are left out (no lookup, empty cell). */
  readonly skipKey?: SkipKeyFn;
  /** Aborting this signal stops the run after the row in flight. */
  readonly signal?: AbortSignal;
  /** Receives errors thrown by event listeners. */
  readonly onListenerError?: ListenerErrorHandler;
}

/**
 * Facade that orchestrates a resumable enrichment: load known outcomes →
 * look up each pending row → persist after every batch.
 *
 * Delegates each operation to a dedicated use case in `application/usecases/`.
 * Holds the shared `EnrichmentContext` that all use cases operate on.
 *
 * @example
 * ```typescript
 * const enricher = new Enricher({
 *   keyColumn: 'CAS',
 *   column: 'HMDB_id',
 *   lookup: async (cas) => found(await searchHmdb(cas)),
 *   stateStore: new FileStateStore({ directory: '.chemkit' }),
 *   jobId: 'hmdb-ids',
 * });
 * enricher.on('row:resolved', (e) => progressBar.tick());
 * const { table } = await enricher.enrich(substances);
 * ```
 */
export class Enricher {
  private readonly ctx: EnrichmentContext;

  constructor(config: EnricherConfig) {
    this.ctx = new EnrichmentContext({
      jobId: config.jobId,
      target: resolveTarget(config),
      lookup: config.lookup,
      stateStore: config.stateStore ?? new InMemoryStateStore(),
      batchSize: config.batchSize ?? 1,
      maxRetries: config.maxRetries ?? 2,
      retryDelayMs: config.retryDelayMs ?? 1000,
      timeoutMs: config.timeoutMs ?? null,
      delayMs: config.delayMs ?? 0,
      failFastOnUnreachable: config.failFastOnUnreachable ?? true,
      validateKey: config.validateKey,
      skipKey: config.skipKey,
      signal: config.signal,
      onListenerError: config.onListenerError,
    });
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Unsubscribe a handler previously registered with `on()`. */
  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Enrich every row of `table`.
   *
   * Rows whose key already has a final answer (in `priorState`, in the state
   * store, or in the table's own result column) are not looked up again.
   *
   * @param priorState - `undefined` loads the state persisted under `jobId`; `null` ignores it.
   * @throws ColumnNotFoundError when the key column is missing.
   * @throws LookupUnreachableError when the first lookup of the run keeps failing.
   */
  async enrich(table: Table, priorState?: EnrichmentState | null): Promise<EnrichmentResult> {
    return new RunEnrichment(this.ctx).execute(table, priorState);
  }

  /**
   * Enrich until a lookup count or time limit is reached, then persist and
   * pause. Call again to continue; `done` is `true` once every row was visited.
   */
  async enrichChunk(table: Table, options?: ChunkOptions, priorState?: EnrichmentState | null): Promise<ChunkResult> {
    return new ProcessChunk(this.ctx).execute(table, options, priorState);
  }

  /** Stop after the row in flight. Terminal state for this enricher. */
  async abort(): Promise<void> {
    return new AbortEnrichment(this.ctx).execute();
  }

  getStatus(): EnrichmentStatusResult {
    return new GetEnrichmentStatus(this.ctx).execute();
  }

  /** Outcomes known so far, including those loaded from prior state. */
  getState(): EnrichmentState {
    return new GetEnrichmentStatus(this.ctx).getState();
  }

  getJobId(): string {
    return new GetEnrichmentStatus(this.ctx).getJobId();
  }
}

/** Options of the functional `enrich()` form. */
export type EnrichOptions = Omit<EnricherConfig, 'keyColumn' | 'lookup'>;

/**
 * Enrich `table` in one call: look up `keyColumn` of every row and write the
 * answers to `options.column`, skipping keys `priorState` already resolved.
 */
export async function enrich(
  table: Table,
  keyColumn: string,
  lookup: LookupFn,
  priorState: EnrichmentState | null | undefined,
  options: EnrichOptions,
): Promise<EnrichmentResult> {
  return new Enricher({ ...options, keyColumn, lookup }).enrich(table, priorState);
}
