import type { JobState } from '../model/Job.js';
import type { EnrichmentState } from '../model/EnrichmentState.js';
import type { EnrichmentTarget } from '../model/EnrichmentTarget.js';
import type { Table } from '../model/Table.js';

/** Everything persisted after a batch: job state, enrichment state and the enriched table. */
export interface EnrichmentSnapshot {
  readonly job: JobState;
  readonly state: EnrichmentState;
  /** Input table with the result (and status) columns filled from `state`. */
  readonly table: Table;
}

/**
 * Port for persisting enrichment progress.
 *
 * Implement this interface to store progress in a database, file system, or
 * any other storage backend. The default `InMemoryStateStore` is
 * non-persistent. `saveSnapshot()` is called once per batch, never
 * concurrently for the same job; a store must replace the previous snapshot
 * without ever exposing a partially written one.
 */
export interface StateStore {
  /** Persist the latest snapshot of a job, replacing the previous one. */
  saveSnapshot(snapshot: EnrichmentSnapshot): Promise<void>;
  /**
   * Load the enrichment state of a previous run, or `null` when the job has
   * never been persisted. The target tells table-based stores how to decode
   * their rows.
   */
  loadState(jobId: string, target: EnrichmentTarget): Promise<EnrichmentState | null>;
}
