// Main entry point
export { Enricher, enrich } from './Enricher.js';
export type { EnricherConfig, EnrichOptions } from './Enricher.js';

// Domain model
export type { Row, Table } from './domain/model/Table.js';
export { createTable, emptyTable, hasColumn, requireColumn, withColumn, selectRows, isEmptyRow } from './domain/model/Table.js';
export type { JobState, EnrichmentProgress, EnrichmentSummary } from './domain/model/Job.js';
export type {
  ValidationResult,
  ValidationError,
  ValidationErrorCode,
  ErrorSeverity,
} from './domain/model/ValidationResult.js';
export { hasErrors, getErrors, validResult, invalidResult } from './domain/model/ValidationResult.js';
export { JobStatus, isJobStatus } from './domain/model/JobStatus.js';
export { RowStatus, isTerminal, isRowStatus } from './domain/model/RowStatus.js';
export type {
  CellValue,
  LookupResult,
  FoundResult,
  NotFoundResult,
  TransientErrorResult,
  PermanentErrorResult,
} from './domain/model/LookupResult.js';
export { found, notFound, transientError, permanentError, isCellValue } from './domain/model/LookupResult.js';
export type { RowOutcome } from './domain/model/RowOutcome.js';
export {
  createPendingOutcome,
  markResolved,
  markNotFound,
  markError,
  markDeferred,
  isRowOutcome,
} from './domain/model/RowOutcome.js';
export type { EnrichmentState } from './domain/model/EnrichmentState.js';
export {
  createEnrichmentState,
  indexOutcomes,
  mergeStates,
  terminalOutcomes,
  countByStatus,
} from './domain/model/EnrichmentState.js';
export type { CellMarkers, KeyMode, EnrichmentTargetOptions, EnrichmentTarget } from './domain/model/EnrichmentTarget.js';
export { DEFAULT_MARKERS, resolveTarget } from './domain/model/EnrichmentTarget.js';

// Errors
export { ColumnNotFoundError } from './domain/errors/ColumnNotFoundError.js';
export { LookupUnreachableError } from './domain/errors/LookupUnreachableError.js';

// Use case result types
export type { EnrichmentResult } from './application/EnrichmentContext.js';
export type { EnrichmentStatusResult } from './application/usecases/GetEnrichmentStatus.js';
export type { ChunkOptions, ChunkResult } from './application/usecases/ProcessChunk.js';

// Domain services
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export type { SkipReason, RowSlot } from './domain/services/RowKeys.js';
export { resolveRowSlot } from './domain/services/RowKeys.js';
export {
  SKIPPED_STATUS,
  outcomeToCell,
  cellToOutcome,
  isMarkerCell,
  skipMarkedKeys,
  stateFromTable,
  applyState,
} from './domain/services/StateTable.js';
export type { LabelMatchPolicy, LabelMatcher } from './domain/services/LabelMatcher.js';
export { normalizeLabel, createLabelMatcher, withLabelPolicy } from './domain/services/LabelMatcher.js';

// Application internals (for extension packages)
export { EventBus } from './application/EventBus.js';
export type { ListenerErrorHandler } from './application/EventBus.js';

// Ports (for custom implementations)
export type { StateStore, EnrichmentSnapshot } from './domain/ports/StateStore.js';
export type { LookupFn, LookupContext, KeyValidateFn, SkipKeyFn } from './domain/ports/Lookup.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  JobStartedEvent,
  JobCompletedEvent,
  JobPausedEvent,
  JobAbortedEvent,
  JobFailedEvent,
  JobProgressEvent,
  RowResolvedEvent,
  RowReusedEvent,
  RowDeferredEvent,
  RowSkippedEvent,
  LookupRetriedEvent,
  BatchPersistedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in state stores)
export { InMemoryStateStore } from './infrastructure/state/InMemoryStateStore.js';
export { FileStateStore } from './infrastructure/state/FileStateStore.js';
export type { FileStateStoreOptions } from './infrastructure/state/FileStateStore.js';
export { writeFileAtomic, isNotFoundError } from './infrastructure/fs/writeFileAtomic.js';
