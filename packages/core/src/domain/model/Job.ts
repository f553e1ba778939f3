import type { JobStatus } from './JobStatus.js';

/** Serialisable state of an enrichment job (for persistence via StateStore). */
export interface JobState {
  readonly id: string;
  readonly keyColumn: string;
  readonly column: string;
  readonly status: JobStatus;
  readonly totalRows: number;
  readonly startedAt?: number;
  readonly completedAt?: number;
}

/** Real-time progress counters for an in-flight job. */
export interface EnrichmentProgress {
  readonly totalRows: number;
  /** Rows whose key is in a terminal state (resolved, not found or error). */
  readonly completedRows: number;
  /** Rows still waiting for a lookup, including deferred ones. */
  readonly pendingRows: number;
  readonly skippedRows: number;
  /** Completion percentage (0–100) over rows that need a lookup. */
  readonly percentage: number;
  readonly lookups: number;
  readonly elapsedMs: number;
}

/** Final summary emitted with `job:completed` and returned with every result. */
export interface EnrichmentSummary {
  readonly total: number;
  readonly resolved: number;
  readonly notFound: number;
  readonly errors: number;
  readonly pending: number;
  readonly skipped: number;
  /** Rows answered from prior state or an earlier row with the same key, without a lookup. */
  readonly reused: number;
  /** Keys looked up in this run (retries not counted). */
  readonly lookups: number;
  readonly elapsedMs: number;
}
