import type { EnrichmentProgress } from '../../domain/model/Job.js';
import type { JobStatus } from '../../domain/model/JobStatus.js';
import type { EnrichmentState } from '../../domain/model/EnrichmentState.js';
import type { EnrichmentContext } from '../EnrichmentContext.js';

export interface EnrichmentStatusResult {
  readonly status: JobStatus;
  readonly progress: EnrichmentProgress;
}

/** Use case: query the current status, progress and state of an enrichment job. */
export class GetEnrichmentStatus {
  constructor(private readonly ctx: EnrichmentContext) {}

  execute(): EnrichmentStatusResult {
    return {
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
    };
  }

  getState(): EnrichmentState {
    return this.ctx.buildState();
  }

  getJobId(): string {
    return this.ctx.jobId;
  }
}
