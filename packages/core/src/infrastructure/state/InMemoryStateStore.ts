import type { EnrichmentSnapshot, StateStore } from '../../domain/ports/StateStore.js';
import type { EnrichmentState } from '../../domain/model/EnrichmentState.js';
import type { JobState } from '../../domain/model/Job.js';

/** Non-persistent in-memory state store. Used as the default when no custom StateStore is provided. */
export class InMemoryStateStore implements StateStore {
  private snapshots = new Map<string, EnrichmentSnapshot>();

  saveSnapshot(snapshot: EnrichmentSnapshot): Promise<void> {
    this.snapshots.set(snapshot.job.id, snapshot);
    return Promise.resolve();
  }

  loadState(jobId: string): Promise<EnrichmentState | null> {
    return Promise.resolve(this.snapshots.get(jobId)?.state ?? null);
  }

  getJobState(jobId: string): Promise<JobState | null> {
    return Promise.resolve(this.snapshots.get(jobId)?.job ?? null);
  }

  /** Latest snapshot of a job, including the enriched table. */
  getSnapshot(jobId: string): EnrichmentSnapshot | null {
    return this.snapshots.get(jobId) ?? null;
  }
}
