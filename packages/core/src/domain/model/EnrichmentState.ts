import type { RowOutcome } from './RowOutcome.js';
import type { RowStatus } from './RowStatus.js';
import { isTerminal } from './RowStatus.js';

/**
 * Everything an enrichment run knows about its keys.
 *
 * Loaded from prior output at the start of a run, extended as rows resolve,
 * persisted after every batch. Outcomes are ordered by first appearance of
 * their key in the table.
 */
export interface EnrichmentState {
  /** Name of the column this state fills. */
  readonly column: string;
  readonly outcomes: readonly RowOutcome[];
}

export function createEnrichmentState(column: string, outcomes: readonly RowOutcome[] = []): EnrichmentState {
  return { column, outcomes: [...outcomes] };
}

export function indexOutcomes(state: EnrichmentState): Map<string, RowOutcome> {
  return new Map(state.outcomes.map((o) => [o.key, o]));
}

/**
 * Merge two states for the same column.
 *
 * Terminal outcomes win over pending ones. When both sides are terminal the
 * base outcome is kept: a final answer is never replaced. Pending outcomes
 * stay pending and are retried by the next run.
 */
export function mergeStates(base: EnrichmentState, incoming: EnrichmentState): EnrichmentState {
  if (base.column !== incoming.column) {
    throw new Error(`Cannot merge states of different columns: '${base.column}' and '${incoming.column}'`);
  }

  const merged = indexOutcomes(base);
  for (const outcome of incoming.outcomes) {
    const existing = merged.get(outcome.key);
    if (!existing || (!isTerminal(existing.status) && isTerminal(outcome.status))) {
      merged.set(outcome.key, outcome);
    }
  }
  return { column: base.column, outcomes: [...merged.values()] };
}

/** Drop pending outcomes, keeping only final answers. */
export function terminalOutcomes(state: EnrichmentState): readonly RowOutcome[] {
  return state.outcomes.filter((o) => isTerminal(o.status));
}

export function countByStatus(state: EnrichmentState): Record<RowStatus, number> {
  const counts: Record<RowStatus, number> = { PENDING: 0, RESOLVED: 0, NOT_FOUND: 0, ERROR: 0 };
  for (const outcome of state.outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}
