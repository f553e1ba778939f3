import type { EnrichmentProgress, EnrichmentSummary } from '../model/Job.js';
import type { RowOutcome } from '../model/RowOutcome.js';
import type { RowStatus } from '../model/RowStatus.js';
import type { SkipReason } from '../services/RowKeys.js';

/** Emitted when a run starts. `pendingRows` counts rows that still need a lookup after loading prior state. */
export interface JobStartedEvent {
  readonly type: 'job:started';
  readonly jobId: string;
  readonly totalRows: number;
  readonly pendingRows: number;
  readonly timestamp: number;
}

/** Emitted when every row has been visited. Deferred rows may remain pending. */
export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly summary: EnrichmentSummary;
  readonly timestamp: number;
}

/** Emitted when a chunk limit stops the run. */
export interface JobPausedEvent {
  readonly type: 'job:paused';
  readonly jobId: string;
  readonly progress: EnrichmentProgress;
  readonly timestamp: number;
}

export interface JobAbortedEvent {
  readonly type: 'job:aborted';
  readonly jobId: string;
  readonly progress: EnrichmentProgress;
  readonly timestamp: number;
}

export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after each persisted batch. */
export interface JobProgressEvent {
  readonly type: 'job:progress';
  readonly jobId: string;
  readonly progress: EnrichmentProgress;
  readonly timestamp: number;
}

/** Emitted when a lookup gives a final answer (value, not found, or permanent error). */
export interface RowResolvedEvent {
  readonly type: 'row:resolved';
  readonly jobId: string;
  readonly rowIndex: number;
  readonly outcome: RowOutcome;
  readonly timestamp: number;
}

/** Emitted when a row is answered from known state without a lookup. */
export interface RowReusedEvent {
  readonly type: 'row:reused';
  readonly jobId: string;
  readonly rowIndex: number;
  readonly key: string;
  readonly status: RowStatus;
  readonly timestamp: number;
}

/** Emitted when a row stays pending after exhausting its retries. */
export interface RowDeferredEvent {
  readonly type: 'row:deferred';
  readonly jobId: string;
  readonly rowIndex: number;
  readonly key: string;
  readonly attempts: number;
  readonly error: string;
  readonly timestamp: number;
}

export interface RowSkippedEvent {
  readonly type: 'row:skipped';
  readonly jobId: string;
  readonly rowIndex: number;
  readonly reason: SkipReason | 'INVALID_KEY';
  readonly timestamp: number;
}

/** Emitted when a transient failure is about to be retried. */
export interface LookupRetriedEvent {
  readonly type: 'lookup:retried';
  readonly jobId: string;
  readonly rowIndex: number;
  readonly key: string;
  /** Retry number (1-based). */
  readonly attempt: number;
  readonly maxRetries: number;
  /** Error from the previous attempt. */
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after a snapshot has been written to the state store. */
export interface BatchPersistedEvent {
  readonly type: 'batch:persisted';
  readonly jobId: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobStartedEvent
  | JobCompletedEvent
  | JobPausedEvent
  | JobAbortedEvent
  | JobFailedEvent
  | JobProgressEvent
  | RowResolvedEvent
  | RowReusedEvent
  | RowDeferredEvent
  | RowSkippedEvent
  | LookupRetriedEvent
  | BatchPersistedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
