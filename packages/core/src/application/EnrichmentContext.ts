import { randomUUID } from 'node:crypto';
import type { EnrichmentProgress, EnrichmentSummary, JobState } from '../domain/model/Job.js';
import type { JobStatus } from '../domain/model/JobStatus.js';
import { canTransition } from '../domain/model/JobStatus.js';
import type { EnrichmentState } from '../domain/model/EnrichmentState.js';
import type { EnrichmentTarget } from '../domain/model/EnrichmentTarget.js';
import type { RowOutcome } from '../domain/model/RowOutcome.js';
import { isTerminal } from '../domain/model/RowStatus.js';
import type { Table } from '../domain/model/Table.js';
import type { KeyValidateFn, LookupFn, SkipKeyFn } from '../domain/ports/Lookup.js';
import type { EnrichmentSnapshot, StateStore } from '../domain/ports/StateStore.js';
import type { RowSlot } from '../domain/services/RowKeys.js';
import { resolveRowSlot } from '../domain/services/RowKeys.js';
import { applyState } from '../domain/services/StateTable.js';
import type { ListenerErrorHandler } from './EventBus.js';
import { EventBus } from './EventBus.js';

/** Outcome of one `enrich()` call. */
export interface EnrichmentResult {
  readonly jobId: string;
  /** `COMPLETED`, `PAUSED` (chunk limit reached) or `ABORTED`. */
  readonly status: JobStatus;
  /** The input table plus the result (and status) column. */
  readonly table: Table;
  readonly state: EnrichmentState;
  readonly summary: EnrichmentSummary;
}

/** Settings shared by every run of one enricher. */
export interface EnrichmentSettings {
  readonly jobId?: string;
  readonly target: EnrichmentTarget;
  readonly lookup: LookupFn;
  readonly stateStore: StateStore;
  readonly batchSize: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly timeoutMs: number | null;
  readonly delayMs: number;
  readonly failFastOnUnreachable: boolean;
  readonly validateKey?: KeyValidateFn;
  readonly skipKey?: SkipKeyFn;
  readonly signal?: AbortSignal;
  readonly onListenerError?: ListenerErrorHandler;
}

/**
 * Mutable state holder shared across all use cases of one enricher.
 *
 * Internal: not exported from the public API. Use cases receive a reference
 * to this context and mutate it as rows are processed.
 */
export class EnrichmentContext {
  readonly eventBus: EventBus;
  readonly target: EnrichmentTarget;
  readonly lookup: LookupFn;
  readonly stateStore: StateStore;
  readonly batchSize: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly timeoutMs: number | null;
  readonly delayMs: number;
  readonly failFastOnUnreachable: boolean;
  readonly validateKey: KeyValidateFn | null;
  readonly skipKey: SkipKeyFn | null;
  readonly externalSignal: AbortSignal | null;

  readonly jobId: string;
  status: JobStatus = 'CREATED';
  startedAt?: number;
  completedAt?: number;

  /** Known outcomes by row key. Survives across chunks of the same enricher. */
  outcomes = new Map<string, RowOutcome>();
  /** Table of the current (or last) run and its row slots. */
  table: Table | null = null;
  slots: readonly RowSlot[] = [];

  /** Per-run counters. */
  reusedRows = 0;
  lookups = 0;
  firstLookupSettled = false;
  lastLookupAt: number | null = null;

  abortController: AbortController | null = null;

  /** Chunk processing limits (set by ProcessChunk use case). */
  chunkLimits: { readonly maxLookups?: number; readonly maxDurationMs?: number } | null = null;
  chunkStartTime: number | null = null;
  chunkLookupCount = 0;
  chunkExhausted = false;

  constructor(settings: EnrichmentSettings) {
    this.target = settings.target;
    this.lookup = settings.lookup;
    this.stateStore = settings.stateStore;
    this.batchSize = settings.batchSize;
    this.maxRetries = settings.maxRetries;
    this.retryDelayMs = settings.retryDelayMs;
    this.timeoutMs = settings.timeoutMs;
    this.delayMs = settings.delayMs;
    this.failFastOnUnreachable = settings.failFastOnUnreachable;
    this.validateKey = settings.validateKey ?? null;
    this.skipKey = settings.skipKey ?? null;
    this.externalSignal = settings.signal ?? null;
    this.eventBus = new EventBus(settings.onListenerError);
    this.jobId = settings.jobId ?? randomUUID();
  }

  transitionTo(newStatus: JobStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  /** Reset per-run counters and classify every row of `table`. */
  beginRun(table: Table): void {
    this.table = table;
    this.slots = table.rows.map((row, i) => resolveRowSlot(row, i, this.target, this.skipKey ?? undefined));
    this.reusedRows = 0;
    this.lookups = 0;
    this.firstLookupSettled = false;
  }

  isAborted(): boolean {
    return this.abortController?.signal.aborted ?? false;
  }

  /** Check whether the current chunk has exceeded its time or lookup limits. */
  isChunkExhausted(): boolean {
    if (!this.chunkLimits) return false;

    if (this.chunkLimits.maxLookups !== undefined && this.chunkLookupCount >= this.chunkLimits.maxLookups) {
      return true;
    }

    return (
      this.chunkLimits.maxDurationMs !== undefined &&
      this.chunkStartTime !== null &&
      Date.now() - this.chunkStartTime >= this.chunkLimits.maxDurationMs
    );
  }

  buildState(): EnrichmentState {
    return { column: this.target.column, outcomes: [...this.outcomes.values()] };
  }

  buildJobState(): JobState {
    return {
      id: this.jobId,
      keyColumn: this.target.keyColumn,
      column: this.target.column,
      status: this.status,
      totalRows: this.slots.length,
      startedAt: this.startedAt,
      completedAt: this.completedAt,
    };
  }

  buildSummary(): EnrichmentSummary {
    let resolved = 0;
    let notFound = 0;
    let errors = 0;
    let pending = 0;
    let skipped = 0;

    for (const slot of this.slots) {
      if (slot.kind === 'SKIP') {
        skipped++;
        continue;
      }
      if (slot.kind === 'INVALID') {
        errors++;
        continue;
      }
      switch (this.outcomes.get(slot.key)?.status ?? 'PENDING') {
        case 'RESOLVED':
          resolved++;
          break;
        case 'NOT_FOUND':
          notFound++;
          break;
        case 'ERROR':
          errors++;
          break;
        case 'PENDING':
          pending++;
          break;
      }
    }

    return {
      total: this.slots.length,
      resolved,
      notFound,
      errors,
      pending,
      skipped,
      reused: this.reusedRows,
      lookups: this.lookups,
      elapsedMs: this.startedAt ? Date.now() - this.startedAt : 0,
    };
  }

  buildProgress(): EnrichmentProgress {
    const summary = this.buildSummary();
    const completed = summary.resolved + summary.notFound + summary.errors;
    const relevant = summary.total - summary.skipped;

    return {
      totalRows: summary.total,
      completedRows: completed,
      pendingRows: summary.pending,
      skippedRows: summary.skipped,
      percentage: relevant > 0 ? Math.round((completed / relevant) * 100) : 100,
      lookups: summary.lookups,
      elapsedMs: summary.elapsedMs,
    };
  }

  buildSnapshot(table: Table): EnrichmentSnapshot {
    const state = this.buildState();
    return {
      job: this.buildJobState(),
      state,
      table: applyState(table, state, this.target, this.skipKey ?? undefined),
    };
  }

  buildResult(table: Table): EnrichmentResult {
    const snapshot = this.buildSnapshot(table);
    return {
      jobId: this.jobId,
      status: this.status,
      table: snapshot.table,
      state: snapshot.state,
      summary: this.buildSummary(),
    };
  }

  async saveSnapshot(table: Table): Promise<void> {
    await this.stateStore.saveSnapshot(this.buildSnapshot(table));
  }

  /** Record a terminal outcome. Terminal outcomes already known are never replaced. */
  recordOutcome(outcome: RowOutcome): void {
    const existing = this.outcomes.get(outcome.key);
    if (existing && isTerminal(existing.status)) return;
    this.outcomes.set(outcome.key, outcome);
  }
}
