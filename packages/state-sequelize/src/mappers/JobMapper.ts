import type { JobState } from '@chemkit/core';
import { isJobStatus } from '@chemkit/core';
import type { JobRow } from '../models/JobModel.js';

export function toRow(state: JobState): JobRow {
  return {
    id: state.id,
    keyColumn: state.keyColumn,
    column: state.column,
    status: state.status,
    totalRows: state.totalRows,
    startedAt: state.startedAt ?? null,
    completedAt: state.completedAt ?? null,
  };
}

export function toDomain(row: JobRow): JobState {
  const { status } = row;
  if (!isJobStatus(status)) {
    throw new Error(`Unknown job status '${status}' for job '${row.id}'`);
  }

  // BIGINT columns come back as strings on some dialects.
  return {
    id: row.id,
    keyColumn: row.keyColumn,
    column: row.column,
    status,
    totalRows: Number(row.totalRows),
    ...(row.startedAt !== null ? { startedAt: Number(row.startedAt) } : {}),
    ...(row.completedAt !== null ? { completedAt: Number(row.completedAt) } : {}),
  };
}
