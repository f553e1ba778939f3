import type { EnrichmentTarget } from '../model/EnrichmentTarget.js';
import type { Row } from '../model/Table.js';
import type { SkipKeyFn } from '../ports/Lookup.js';

/** Why a row takes no part in an enrichment. */
export type SkipReason = 'EMPTY_KEY' | 'SKIPPED_KEY';

/** How a row relates to the enrichment state. */
export type RowSlot =
  /** `key` indexes the state; `lookupKey` is what the lookup receives. */
  | { readonly kind: 'KEY'; readonly key: string; readonly lookupKey: string }
  | { readonly kind: 'SKIP'; readonly reason: SkipReason }
  /** The key cell cannot be used as a key at all. */
  | { readonly kind: 'INVALID'; readonly error: string };

export function resolveRowSlot(row: Row, rowIndex: number, target: EnrichmentTarget, skipKey?: SkipKeyFn): RowSlot {
  const cell = row[target.keyColumn];
  if (cell === undefined || cell === null) return { kind: 'SKIP', reason: 'EMPTY_KEY' };

  let lookupKey: string;
  if (typeof cell === 'string') {
    lookupKey = target.normalizeKey(cell);
  } else if ((typeof cell === 'number' && Number.isFinite(cell)) || typeof cell === 'bigint') {
    lookupKey = String(cell);
  } else {
    return { kind: 'INVALID', error: `Key must be a string or a number, got ${describeType(cell)}` };
  }

  if (lookupKey === '') return { kind: 'SKIP', reason: 'EMPTY_KEY' };
  if (skipKey?.(lookupKey, row)) return { kind: 'SKIP', reason: 'SKIPPED_KEY' };

  return { kind: 'KEY', key: target.keyBy === 'index' ? String(rowIndex) : lookupKey, lookupKey };
}

function describeType(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return String(value);
  return typeof value;
}
