import type { EnrichmentState } from '../../domain/model/EnrichmentState.js';
import type { Table } from '../../domain/model/Table.js';
import type { EnrichmentContext, EnrichmentResult } from '../EnrichmentContext.js';
import { RunEnrichment } from './RunEnrichment.js';

/** Options controlling how many lookups or how long a chunk runs. */
export interface ChunkOptions {
  /** Stop before the lookup that would exceed this many lookups in this chunk. */
  readonly maxLookups?: number;
  /** Stop once this many milliseconds have elapsed in this chunk. */
  readonly maxDurationMs?: number;
}

/** Result returned by `enrichChunk()`. */
export interface ChunkResult extends EnrichmentResult {
  /** `true` when every row has been visited (job complete). */
  readonly done: boolean;
}

/**
 * Use case: enrich until a limit is reached, persist, then pause and return
 * control. Calling it again on the same enricher (or on a new one with the
 * same `jobId` and state store) continues where it stopped.
 */
export class ProcessChunk {
  constructor(private readonly ctx: EnrichmentContext) {}

  async execute(table: Table, options?: ChunkOptions, priorState?: EnrichmentState | null): Promise<ChunkResult> {
    this.ctx.chunkLimits = options ?? null;
    this.ctx.chunkStartTime = Date.now();
    this.ctx.chunkLookupCount = 0;
    this.ctx.chunkExhausted = false;

    try {
      const result = await new RunEnrichment(this.ctx).execute(table, priorState);
      return { ...result, done: result.status === 'COMPLETED' };
    } finally {
      this.ctx.chunkLimits = null;
      this.ctx.chunkStartTime = null;
      this.ctx.chunkExhausted = false;
    }
  }
}
