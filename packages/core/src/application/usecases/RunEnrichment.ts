import type { EnrichmentState } from '../../domain/model/EnrichmentState.js';
import { mergeStates } from '../../domain/model/EnrichmentState.js';
import type { LookupResult, TransientErrorResult } from '../../domain/model/LookupResult.js';
import { transientError } from '../../domain/model/LookupResult.js';
import type { RowOutcome } from '../../domain/model/RowOutcome.js';
import {
  createPendingOutcome,
  markDeferred,
  markError,
  markNotFound,
  markResolved,
} from '../../domain/model/RowOutcome.js';
import { isTerminal } from '../../domain/model/RowStatus.js';
import type { Row, Table } from '../../domain/model/Table.js';
import { requireColumn } from '../../domain/model/Table.js';
import { getErrors, hasErrors } from '../../domain/model/ValidationResult.js';
import { LookupUnreachableError } from '../../domain/errors/LookupUnreachableError.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { stateFromTable } from '../../domain/services/StateTable.js';
import type { EnrichmentContext, EnrichmentResult } from '../EnrichmentContext.js';

interface LookupAttempt {
  readonly result: LookupResult;
  /** Lookup calls made. `0` when the job was aborted before the first one. */
  readonly attempts: number;
}

/** Use case: enrich every row of a table, resuming from known outcomes. */
export class RunEnrichment {
  constructor(private readonly ctx: EnrichmentContext) {}

  /**
   * @param priorState - State of a previous run. `undefined` loads it from the
   *   state store; `null` starts without one.
   * @throws ColumnNotFoundError when the key column is missing.
   * @throws LookupUnreachableError when the first lookup of the run keeps failing.
   */
  async execute(table: Table, priorState?: EnrichmentState | null): Promise<EnrichmentResult> {
    requireColumn(table, this.ctx.target.keyColumn);
    this.assertCanStart();

    this.ctx.transitionTo('PROCESSING');
    this.ctx.abortController = new AbortController();
    this.ctx.startedAt = this.ctx.startedAt ?? Date.now();
    this.ctx.completedAt = undefined;
    this.ctx.beginRun(table);
    const unlink = this.linkExternalSignal();

    try {
      await this.loadKnownOutcomes(table, priorState);

      // Yield to next microtask so handlers registered after enrich() on the same tick receive this event
      await Promise.resolve();

      this.ctx.eventBus.emit({
        type: 'job:started',
        jobId: this.ctx.jobId,
        totalRows: table.rows.length,
        pendingRows: this.ctx.buildSummary().pending,
        timestamp: Date.now(),
      });

      await this.processRows(table);
      this.finish();
    } catch (error) {
      await this.fail(table, error);
    } finally {
      unlink();
    }

    await this.ctx.saveSnapshot(table);
    return this.ctx.buildResult(table);
  }

  private assertCanStart(): void {
    if (this.ctx.status !== 'CREATED' && this.ctx.status !== 'PAUSED') {
      throw new Error(`Cannot start enrichment from status '${this.ctx.status}'`);
    }
  }

  private linkExternalSignal(): () => void {
    const external = this.ctx.externalSignal;
    const controller = this.ctx.abortController;
    if (!external || !controller) return () => undefined;

    if (external.aborted) {
      controller.abort(external.reason);
      return () => undefined;
    }

    const onAbort = (): void => {
      controller.abort(external.reason);
    };
    external.addEventListener('abort', onAbort, { once: true });
    return () => {
      external.removeEventListener('abort', onAbort);
    };
  }

  /**
   * Seed the context with terminal outcomes from, in order of precedence:
   * outcomes this enricher already holds, the prior state (given or loaded),
   * and result cells already present in the input table.
   */
  private async loadKnownOutcomes(table: Table, priorState?: EnrichmentState | null): Promise<void> {
    const { target } = this.ctx;
    const prior =
      priorState === undefined ? await this.ctx.stateStore.loadState(this.ctx.jobId, target) : priorState;
    const fromTable = stateFromTable(table, target);
    const known = prior ? mergeStates(prior, fromTable) : fromTable;

    for (const outcome of known.outcomes) {
      if (isTerminal(outcome.status)) this.ctx.recordOutcome(outcome);
    }
  }

  private finish(): void {
    if (this.ctx.isAborted()) {
      if (this.ctx.status === 'PROCESSING') {
        this.ctx.transitionTo('ABORTED');
        this.ctx.eventBus.emit({
          type: 'job:aborted',
          jobId: this.ctx.jobId,
          progress: this.ctx.buildProgress(),
          timestamp: Date.now(),
        });
      }
      return;
    }

    if (this.ctx.chunkExhausted) {
      this.ctx.transitionTo('PAUSED');
      this.ctx.eventBus.emit({
        type: 'job:paused',
        jobId: this.ctx.jobId,
        progress: this.ctx.buildProgress(),
        timestamp: Date.now(),
      });
      return;
    }

    this.ctx.transitionTo('COMPLETED');
    this.ctx.completedAt = Date.now();
    this.ctx.eventBus.emit({
      type: 'job:completed',
      jobId: this.ctx.jobId,
      summary: this.ctx.buildSummary(),
      timestamp: Date.now(),
    });
  }

  /** Mark the job failed, persist what is known, and rethrow. */
  private async fail(table: Table, error: unknown): Promise<never> {
    if (this.ctx.status === 'PROCESSING') {
      this.ctx.transitionTo('FAILED');
      this.ctx.eventBus.emit({
        type: 'job:failed',
        jobId: this.ctx.jobId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
    }

    try {
      await this.ctx.saveSnapshot(table);
    } catch (persistError) {
      throw new AggregateError([error, persistError], 'Enrichment failed and its state could not be persisted');
    }
    throw error;
  }

  private isStopping(): boolean {
    return this.ctx.isAborted() || this.ctx.chunkExhausted;
  }

  private async processRows(table: Table): Promise<void> {
    const splitter = new BatchSplitter(this.ctx.batchSize);

    for (const { items, batchIndex } of splitter.split(table.rows.keys())) {
      let visited = 0;
      for (const rowIndex of items) {
        if (this.isStopping()) break;
        await this.processRow(table, rowIndex);
        visited++;
      }

      if (visited > 0) {
        await this.ctx.saveSnapshot(table);
        this.ctx.eventBus.emit({
          type: 'batch:persisted',
          jobId: this.ctx.jobId,
          batchIndex,
          rowCount: visited,
          timestamp: Date.now(),
        });
        this.ctx.eventBus.emit({
          type: 'job:progress',
          jobId: this.ctx.jobId,
          progress: this.ctx.buildProgress(),
          timestamp: Date.now(),
        });
      }

      if (this.isStopping()) break;
    }
  }

  private async processRow(table: Table, rowIndex: number): Promise<void> {
    const slot = this.ctx.slots[rowIndex];
    const row = table.rows[rowIndex];
    if (!slot || !row) return;

    if (slot.kind !== 'KEY') {
      this.ctx.eventBus.emit({
        type: 'row:skipped',
        jobId: this.ctx.jobId,
        rowIndex,
        reason: slot.kind === 'SKIP' ? slot.reason : 'INVALID_KEY',
        timestamp: Date.now(),
      });
      return;
    }

    const known = this.ctx.outcomes.get(slot.key);
    if (known && isTerminal(known.status)) {
      this.ctx.reusedRows++;
      this.ctx.eventBus.emit({
        type: 'row:reused',
        jobId: this.ctx.jobId,
        rowIndex,
        key: slot.key,
        status: known.status,
        timestamp: Date.now(),
      });
      return;
    }

    if (this.ctx.isChunkExhausted()) {
      this.ctx.chunkExhausted = true;
      return;
    }

    const pending = createPendingOutcome(slot.key);

    if (this.ctx.validateKey) {
      const validation = this.ctx.validateKey(slot.lookupKey);
      if (!validation.isValid || hasErrors(validation.errors)) {
        const message = getErrors(validation.errors)
          .map((e) => e.message)
          .join('; ');
        this.resolve(rowIndex, markError(pending, message || 'Invalid key', 0));
        return;
      }
    }

    const { result, attempts } = await this.lookupWithRetry(slot.lookupKey, rowIndex, row);
    if (result.kind === 'TRANSIENT_ERROR' && this.ctx.isAborted()) return;

    this.ctx.lookups++;
    this.ctx.chunkLookupCount++;
    const isFirstLookup = !this.ctx.firstLookupSettled;
    this.ctx.firstLookupSettled = true;

    switch (result.kind) {
      case 'FOUND':
        this.resolve(
          rowIndex,
          result.value === '' ? markNotFound(pending, attempts) : markResolved(pending, result.value, attempts),
        );
        return;
      case 'NOT_FOUND':
        this.resolve(rowIndex, markNotFound(pending, attempts));
        return;
      case 'PERMANENT_ERROR':
        this.resolve(rowIndex, markError(pending, result.error, attempts));
        return;
      case 'TRANSIENT_ERROR':
        if (isFirstLookup && this.ctx.failFastOnUnreachable) {
          throw new LookupUnreachableError(slot.lookupKey, attempts, result.error);
        }
        this.ctx.outcomes.set(slot.key, markDeferred(pending, result.error, attempts));
        this.ctx.eventBus.emit({
          type: 'row:deferred',
          jobId: this.ctx.jobId,
          rowIndex,
          key: slot.key,
          attempts,
          error: result.error,
          timestamp: Date.now(),
        });
        return;
    }
  }

  private resolve(rowIndex: number, outcome: RowOutcome): void {
    this.ctx.recordOutcome(outcome);
    this.ctx.eventBus.emit({
      type: 'row:resolved',
      jobId: this.ctx.jobId,
      rowIndex,
      outcome,
      timestamp: Date.now(),
    });
  }

  private async lookupWithRetry(key: string, rowIndex: number, row: Row): Promise<LookupAttempt> {
    const maxAttempts = this.ctx.maxRetries + 1;
    let lastError: TransientErrorResult = transientError('Lookup was not attempted');

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (this.ctx.isAborted()) return { result: lastError, attempts: attempt - 1 };

      await this.throttle();
      const result = await this.callLookup(key, rowIndex, row, attempt);
      if (result.kind !== 'TRANSIENT_ERROR') return { result, attempts: attempt };

      lastError = result;
      if (attempt < maxAttempts && !this.ctx.isAborted()) {
        this.ctx.eventBus.emit({
          type: 'lookup:retried',
          jobId: this.ctx.jobId,
          rowIndex,
          key,
          attempt,
          maxRetries: this.ctx.maxRetries,
          error: result.error,
          timestamp: Date.now(),
        });

        const delay = this.ctx.retryDelayMs * Math.pow(2, attempt - 1);
        await this.sleep(delay);
      }
    }

    return { result: lastError, attempts: maxAttempts };
  }

  /**
   * Call the lookup once. Rejections become transient errors; so does a call
   * outliving `timeoutMs`, whose signal is then aborted.
   */
  private async callLookup(key: string, rowIndex: number, row: Row, attempt: number): Promise<LookupResult> {
    const controller = new AbortController();
    const jobSignal = this.ctx.abortController?.signal;
    const onJobAbort = (): void => {
      controller.abort(jobSignal?.reason);
    };
    if (jobSignal?.aborted) controller.abort(jobSignal.reason);
    else jobSignal?.addEventListener('abort', onJobAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;

    const call = Promise.resolve()
      .then(() =>
        this.ctx.lookup(key, { jobId: this.ctx.jobId, rowIndex, row, attempt, signal: controller.signal }),
      )
      .then(
        (result) => result,
        (error: unknown) => transientError(error instanceof Error ? error.message : String(error)),
      );

    try {
      const timeoutMs = this.ctx.timeoutMs;
      if (timeoutMs === null) return await call;

      const timeout = new Promise<LookupResult>((resolve) => {
        timer = setTimeout(() => {
          controller.abort();
          resolve(transientError(`Lookup timed out after ${String(timeoutMs)}ms`));
        }, timeoutMs);
      });
      return await Promise.race([call, timeout]);
    } finally {
      clearTimeout(timer);
      jobSignal?.removeEventListener('abort', onJobAbort);
      this.ctx.lastLookupAt = Date.now();
    }
  }

  /** Keep at least `delayMs` between the end of one lookup call and the start of the next. */
  private async throttle(): Promise<void> {
    if (this.ctx.delayMs <= 0 || this.ctx.lastLookupAt === null) return;
    const wait = this.ctx.delayMs - (Date.now() - this.ctx.lastLookupAt);
    if (wait > 0) await this.sleep(wait);
  }

  /** Resolves after `ms`, or as soon as the job is aborted. */
  private sleep(ms: number): Promise<void> {
    const signal = this.ctx.abortController?.signal;
    if (ms <= 0 || signal?.aborted) return Promise.resolve();

    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal?.addEventListener('abort', done, { once: true });
    });
  }
}
