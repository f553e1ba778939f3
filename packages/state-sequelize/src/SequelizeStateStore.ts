import type { Sequelize } from 'sequelize';
import type { EnrichmentSnapshot, EnrichmentState, JobState, StateStore } from '@chemkit/core';
import { defineJobModel } from './models/JobModel.js';
import type { JobModel } from './models/JobModel.js';
import { defineOutcomeModel } from './models/OutcomeModel.js';
import type { OutcomeCreationRow, OutcomeModel, OutcomeRow } from './models/OutcomeModel.js';
import * as JobMapper from './mappers/JobMapper.js';
import * as OutcomeMapper from './mappers/OutcomeMapper.js';

export interface SequelizeStateStoreOptions {
  /** Prefix for both table names. Default: `'chemkit_'`. */
  readonly tablePrefix?: string;
}

const UPDATABLE_OUTCOME_FIELDS: (keyof OutcomeRow)[] = ['position', 'status', 'value', 'error', 'attempts'];

/** Stored form of one outcome row, for change detection. */
function signature(row: OutcomeCreationRow): string {
  return JSON.stringify([row.position, row.status, row.value, row.error, row.attempts]);
}

/**
 * Sequelize-based StateStore adapter for `@chemkit/core`.
 *
 * Persists the job row and one row per known key to a relational database
 * using Sequelize v6. Supports any dialect supported by Sequelize (PostgreSQL,
 * MySQL, MariaDB, SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create tables.
 *
 * The store remembers which outcome rows it has written or loaded for each
 * job. A snapshot then writes only new or changed outcomes and deletes keys
 * that left the state. The first snapshot of a job it knows nothing about
 * replaces all of that job's rows. The tables must have no other writer for
 * a job while this store persists it.
 *
 * The enriched table itself is not stored: a resumed run rebuilds it from
 * its input table and the stored outcomes.
 */
export class SequelizeStateStore implements StateStore {
  private readonly sequelize: Sequelize;
  private readonly Job: JobModel;
  private readonly Outcome: OutcomeModel;
  /** Signature of every stored outcome row, by job id and row key. */
  private readonly written = new Map<string, Map<string, string>>();

  constructor(sequelize: Sequelize, options?: SequelizeStateStoreOptions) {
    const tablePrefix = options?.tablePrefix ?? 'chemkit_';
    this.sequelize = sequelize;
    this.Job = defineJobModel(this.sequelize, tablePrefix);
    this.Outcome = defineOutcomeModel(this.sequelize, tablePrefix);
  }

  async initialize(): Promise<void> {
    await this.Job.sync();
    await this.Outcome.sync();
  }

  /** Write the job row and the outcomes that changed since the last snapshot, in one transaction. */
  async saveSnapshot(snapshot: EnrichmentSnapshot): Promise<void> {
    const jobId = snapshot.job.id;
    const rows = snapshot.state.outcomes.map((outcome, position) => OutcomeMapper.toRow(jobId, outcome, position));
    const next = new Map(rows.map((row) => [row.rowKey, signature(row)]));
    const previous = this.written.get(jobId);

    const changed = previous ? rows.filter((row) => previous.get(row.rowKey) !== next.get(row.rowKey)) : rows;
    const removed = previous ? [...previous.keys()].filter((key) => !next.has(key)) : [];

    this.written.delete(jobId);
    await this.sequelize.transaction(async (transaction) => {
      await this.Job.upsert(JobMapper.toRow(snapshot.job), { transaction });
      if (!previous) {
        await this.Outcome.destroy({ where: { jobId }, transaction });
      } else if (removed.length > 0) {
        await this.Outcome.destroy({ where: { jobId, rowKey: removed }, transaction });
      }
      if (changed.length > 0) {
        await this.Outcome.bulkCreate(changed, { transaction, updateOnDuplicate: UPDATABLE_OUTCOME_FIELDS });
      }
    });
    this.written.set(jobId, next);
  }

  async loadState(jobId: string): Promise<EnrichmentState | null> {
    const job = await this.getJobState(jobId);
    if (!job) return null;

    const rows = await this.Outcome.findAll({
      where: { jobId },
      order: [['position', 'ASC']],
    });
    const plain = rows.map((row) => row.get({ plain: true }));
    this.written.set(jobId, new Map(plain.map((row) => [row.rowKey, signature(row)])));

    return {
      column: job.column,
      outcomes: plain.map((row) => OutcomeMapper.toDomain(row)),
    };
  }

  async getJobState(jobId: string): Promise<JobState | null> {
    const row = await this.Job.findByPk(jobId);
    if (!row) return null;
    return JobMapper.toDomain(row.get({ plain: true }));
  }

  /** Remove a job and its outcomes. Unknown ids are ignored. */
  async deleteJob(jobId: string): Promise<void> {
    this.written.delete(jobId);
    await this.sequelize.transaction(async (transaction) => {
      await this.Outcome.destroy({ where: { jobId }, transaction });
      await this.Job.destroy({ where: { id: jobId }, transaction });
    });
  }
}
