import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { EnrichmentSnapshot, StateStore } from '../../domain/ports/StateStore.js';
import type { EnrichmentState } from '../../domain/model/EnrichmentState.js';
import type { JobState } from '../../domain/model/Job.js';
import { isJobStatus } from '../../domain/model/JobStatus.js';
import { isRowOutcome } from '../../domain/model/RowOutcome.js';
import { isNotFoundError, writeFileAtomic } from '../fs/writeFileAtomic.js';

export interface FileStateStoreOptions {
  /** Directory where job state files are stored. Default: `'.chemkit'`. */
  readonly directory?: string;
}

interface StoredJob {
  readonly job: JobState;
  readonly state: EnrichmentState;
}

/**
 * File-based state store that persists each job as `{jobId}.json`
 * (job state plus outcomes by key).
 *
 * Every snapshot replaces the file atomically, so an interrupted process
 * leaves the last complete snapshot behind. The enriched table itself is not
 * stored: it is rebuilt from the input table and the outcomes.
 *
 * Node.js only.
 */
export class FileStateStore implements StateStore {
  private readonly directory: string;

  constructor(options?: FileStateStoreOptions) {
    this.directory = options?.directory ?? '.chemkit';
  }

  async saveSnapshot(snapshot: EnrichmentSnapshot): Promise<void> {
    const stored: StoredJob = { job: snapshot.job, state: snapshot.state };
    await writeFileAtomic(this.jobFilePath(snapshot.job.id), JSON.stringify(stored, null, 2));
  }

  async loadState(jobId: string): Promise<EnrichmentState | null> {
    return (await this.read(jobId))?.state ?? null;
  }

  async getJobState(jobId: string): Promise<JobState | null> {
    return (await this.read(jobId))?.job ?? null;
  }

  private async read(jobId: string): Promise<StoredJob | null> {
    const filePath = this.jobFilePath(jobId);
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new Error(`Corrupt state file: ${filePath}`, { cause: error });
    }
    if (!isStoredJob(parsed)) {
      throw new Error(`Corrupt state file: ${filePath}`);
    }
    return parsed;
  }

  private jobFilePath(jobId: string): string {
    return join(this.directory, `${jobId}.json`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredJob(value: unknown): value is StoredJob {
  if (!isRecord(value) || !isRecord(value.job) || !isRecord(value.state)) return false;
  const { job, state } = value;
  return (
    typeof job.id === 'string' &&
    typeof job.keyColumn === 'string' &&
    typeof job.column === 'string' &&
    isJobStatus(job.status) &&
    typeof job.totalRows === 'number' &&
    typeof state.column === 'string' &&
    Array.isArray(state.outcomes) &&
    state.outcomes.every(isRowOutcome)
  );
}
