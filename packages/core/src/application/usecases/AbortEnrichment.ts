import type { EnrichmentContext } from '../EnrichmentContext.js';

/**
 * Use case: cancel the job permanently. Terminal state: it cannot be resumed
 * by this enricher. A new enricher with the same `jobId` and state store
 * resumes from the last persisted snapshot.
 */
export class AbortEnrichment {
  constructor(private readonly ctx: EnrichmentContext) {}

  async execute(): Promise<void> {
    if (this.ctx.status !== 'PROCESSING' && this.ctx.status !== 'PAUSED') {
      throw new Error(`Cannot abort enrichment from status '${this.ctx.status}'`);
    }

    const wasRunning = this.ctx.status === 'PROCESSING';
    this.ctx.transitionTo('ABORTED');
    this.ctx.abortController?.abort();

    this.ctx.eventBus.emit({
      type: 'job:aborted',
      jobId: this.ctx.jobId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });

    // A running job persists its final snapshot itself when the loop stops.
    if (!wasRunning && this.ctx.table) {
      await this.ctx.saveSnapshot(this.ctx.table);
    }
  }
}
