import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { EnrichmentSnapshot, EnrichmentState, EnrichmentTarget, StateStore, Table } from '@chemkit/core';
import { isNotFoundError, stateFromTable, writeFileAtomic } from '@chemkit/core';
import { CsvParser } from '../parsers/CsvParser.js';
import { CsvWriter } from '../parsers/CsvWriter.js';

export interface CsvTableStateStoreOptions {
  /** Directory holding one `{jobId}.csv` per job. Default: `'.chemkit'`. Ignored when `filePath` is set. */
  readonly directory?: string;
  /** Single output file used for every job, e.g. the enriched spreadsheet itself. */
  readonly filePath?: string;
  /** Default: `','`. */
  readonly delimiter?: string;
}

/**
 * State store whose persisted form is the enriched table itself, written as
 * CSV. Resuming decodes the result column of that file, so the output of an
 * interrupted run is also the input of the next one.
 *
 * Cells are read back as strings: a resolved number is resumed as its text.
 */
export class CsvTableStateStore implements StateStore {
  private readonly directory: string;
  private readonly filePath: string | null;
  private readonly parser: CsvParser;
  private readonly writer: CsvWriter;

  constructor(options?: CsvTableStateStoreOptions) {
    this.directory = options?.directory ?? '.chemkit';
    this.filePath = options?.filePath ?? null;
    this.parser = new CsvParser({ delimiter: options?.delimiter ?? ',', skipEmptyRows: false });
    this.writer = new CsvWriter({ delimiter: options?.delimiter ?? ',' });
  }

  async saveSnapshot(snapshot: EnrichmentSnapshot): Promise<void> {
    await writeFileAtomic(this.pathFor(snapshot.job.id), this.writer.write(snapshot.table));
  }

  /** @throws ColumnNotFoundError when the stored table lacks the key column. */
  async loadState(jobId: string, target: EnrichmentTarget): Promise<EnrichmentState | null> {
    const table = await this.loadTable(jobId);
    return table ? stateFromTable(table, target) : null;
  }

  /** The last persisted table of a job, or `null` when none was written. */
  async loadTable(jobId: string): Promise<Table | null> {
    let content: string;
    try {
      content = await readFile(this.pathFor(jobId), 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
    return this.parser.parseTable(content);
  }

  private pathFor(jobId: string): string {
    return this.filePath ?? join(this.directory, `${jobId}.csv`);
  }
}
