import type { RowOutcome } from '@chemkit/core';
import { isCellValue, isRowStatus } from '@chemkit/core';
import type { OutcomeCreationRow, OutcomeRow } from '../models/OutcomeModel.js';
import { parseJson } from '../utils/parseJson.js';

export function toRow(jobId: string, outcome: RowOutcome, position: number): OutcomeCreationRow {
  return {
    jobId,
    rowKey: outcome.key,
    position,
    status: outcome.status,
    value: outcome.value !== undefined ? JSON.stringify(outcome.value) : null,
    error: outcome.error ?? null,
    attempts: outcome.attempts,
  };
}

export function toDomain(row: OutcomeRow): RowOutcome {
  const { status } = row;
  if (!isRowStatus(status)) {
    throw new Error(`Unknown row status '${status}' for key '${row.rowKey}' of job '${row.jobId}'`);
  }

  let value: RowOutcome['value'];
  if (row.value !== null) {
    const parsed = parseJson(row.value);
    if (!isCellValue(parsed)) {
      throw new Error(`Stored value for key '${row.rowKey}' of job '${row.jobId}' is not a cell value`);
    }
    value = parsed;
  }

  return {
    key: row.rowKey,
    status,
    attempts: Number(row.attempts),
    ...(value !== undefined ? { value } : {}),
    ...(row.error !== null ? { error: row.error } : {}),
  };
}
