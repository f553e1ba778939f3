import type { CellMarkers, EnrichmentTarget } from '../model/EnrichmentTarget.js';
import { DEFAULT_MARKERS } from '../model/EnrichmentTarget.js';
import type { EnrichmentState } from '../model/EnrichmentState.js';
import { indexOutcomes } from '../model/EnrichmentState.js';
import type { CellValue } from '../model/LookupResult.js';
import { isCellValue } from '../model/LookupResult.js';
import type { RowOutcome } from '../model/RowOutcome.js';
import type { Table } from '../model/Table.js';
import { hasColumn, requireColumn, withColumn } from '../model/Table.js';
import type { SkipKeyFn } from '../ports/Lookup.js';
import { resolveRowSlot } from './RowKeys.js';

/*
 * Table form of an EnrichmentState. A run's output table and the state it
 * resumes from are the same artifact:
 *
 *   RESOLVED      → the value
 *   NOT_FOUND     → markers.notFound
 *   ERROR         → markers.errorPrefix + error
 *   PENDING/none  → null
 */

/** Status column content for rows that take no part in the enrichment. */
export const SKIPPED_STATUS = 'SKIPPED';

export function outcomeToCell(outcome: RowOutcome | undefined, markers: CellMarkers): CellValue | null {
  if (!outcome) return null;
  switch (outcome.status) {
    case 'RESOLVED':
      return outcome.value ?? null;
    case 'NOT_FOUND':
      return markers.notFound;
    case 'ERROR':
      return `${markers.errorPrefix}${outcome.error ?? 'unknown error'}`;
    case 'PENDING':
      return null;
  }
}

/** Decode a result cell. Returns `null` for cells that mean "not looked up yet". */
export function cellToOutcome(key: string, cell: unknown, markers: CellMarkers): RowOutcome | null {
  if (cell === undefined || cell === null || cell === '') return null;
  if (cell === markers.notFound) return { key, status: 'NOT_FOUND', attempts: 0 };
  if (typeof cell === 'string' && cell.startsWith(markers.errorPrefix)) {
    return { key, status: 'ERROR', error: cell.slice(markers.errorPrefix.length), attempts: 0 };
  }
  if (isCellValue(cell)) return { key, status: 'RESOLVED', value: cell, attempts: 0 };
  return null;
}

/** `true` when a cell holds a not-found or error marker rather than a value. */
export function isMarkerCell(cell: unknown, markers: CellMarkers = DEFAULT_MARKERS): boolean {
  return cell === markers.notFound || (typeof cell === 'string' && cell.startsWith(markers.errorPrefix));
}

/**
 * Build a `skipKey` for chained enrichments: rows whose key is itself a
 * not-found or error marker of an upstream enrichment are left out.
 */
export function skipMarkedKeys(markers: Partial<CellMarkers> = {}): SkipKeyFn {
  const resolved: CellMarkers = { ...DEFAULT_MARKERS, ...markers };
  return (key) => isMarkerCell(key, resolved);
}

/**
 * Decode the enrichment state stored in a table.
 *
 * A table without the result column has not been enriched yet and decodes to
 * an empty state.
 *
 * @throws ColumnNotFoundError when the key column is missing.
 */
export function stateFromTable(table: Table, target: EnrichmentTarget): EnrichmentState {
  requireColumn(table, target.keyColumn);
  if (!hasColumn(table, target.column)) return { column: target.column, outcomes: [] };

  const outcomes = new Map<string, RowOutcome>();
  table.rows.forEach((row, rowIndex) => {
    const slot = resolveRowSlot(row, rowIndex, target);
    if (slot.kind !== 'KEY' || outcomes.has(slot.key)) return;

    const outcome = cellToOutcome(slot.key, row[target.column], target.markers);
    if (outcome) outcomes.set(slot.key, outcome);
  });

  return { column: target.column, outcomes: [...outcomes.values()] };
}

/**
 * Write a state into a table: the result column, and the status column when
 * the target has one. Rows are never removed or reordered and the key column
 * is left untouched.
 */
export function applyState(table: Table, state: EnrichmentState, target: EnrichmentTarget, skipKey?: SkipKeyFn): Table {
  requireColumn(table, target.keyColumn);
  const byKey = indexOutcomes(state);
  const values: (CellValue | null)[] = [];
  const statuses: string[] = [];

  table.rows.forEach((row, rowIndex) => {
    const slot = resolveRowSlot(row, rowIndex, target, skipKey);
    switch (slot.kind) {
      case 'KEY': {
        const outcome = byKey.get(slot.key);
        values.push(outcomeToCell(outcome, target.markers));
        statuses.push(outcome?.status ?? 'PENDING');
        break;
      }
      case 'SKIP':
        values.push(null);
        statuses.push(SKIPPED_STATUS);
        break;
      case 'INVALID':
        values.push(`${target.markers.errorPrefix}${slot.error}`);
        statuses.push('ERROR');
        break;
    }
  });

  const enriched = withColumn(table, target.column, values);
  return target.statusColumn === null ? enriched : withColumn(enriched, target.statusColumn, statuses);
}
