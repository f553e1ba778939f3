import type { LookupResult } from '../model/LookupResult.js';
import { found, notFound, permanentError } from '../model/LookupResult.js';
import type { LookupFn } from '../ports/Lookup.js';

/**
 * How free-text labels returned by a lookup (e.g. an HMDB "Status") are
 * matched against the labels a study recognises.
 */
export interface LabelMatchPolicy {
  /**
   * - `'exact'`: the normalized label equals a known label.
   * - `'prefix'`: the normalized label starts with a known label.
   * - `'contains'`: the normalized label contains a known label.
   *
   * Default: `'exact'`.
   */
  readonly mode?: 'exact' | 'prefix' | 'contains';
  /** Default: `false`. */
  readonly caseSensitive?: boolean;
  /**
   * Tie-break when several known labels match.
   * `'first'` takes the earliest in the label list, `'longest'` the most
   * specific, `'reject'` answers with a permanent error. Default: `'reject'`.
   */
  readonly onAmbiguous?: 'first' | 'longest' | 'reject';
}

/** Maps a raw label to the canonical known label. */
export type LabelMatcher = (raw: string) => LookupResult;

/** Trim, collapse inner whitespace, and case-fold unless `caseSensitive`. */
export function normalizeLabel(label: string, caseSensitive = false): string {
  const collapsed = label.trim().replace(/\s+/g, ' ');
  return caseSensitive ? collapsed : collapsed.toLowerCase();
}

export function createLabelMatcher(labels: readonly string[], policy: LabelMatchPolicy = {}): LabelMatcher {
  const mode = policy.mode ?? 'exact';
  const caseSensitive = policy.caseSensitive ?? false;
  const onAmbiguous = policy.onAmbiguous ?? 'reject';
  const known = labels.map((label) => ({ label, normalized: normalizeLabel(label, caseSensitive) }));

  return (raw) => {
    const normalized = normalizeLabel(raw, caseSensitive);
    if (normalized === '') return notFound();

    const matches = known.filter((k) => {
      switch (mode) {
        case 'exact':
          return normalized === k.normalized;
        case 'prefix':
          return normalized.startsWith(k.normalized);
        case 'contains':
          return normalized.includes(k.normalized);
      }
    });

    const [first] = matches;
    if (!first) return notFound();
    if (matches.length === 1) return found(first.label);

    switch (onAmbiguous) {
      case 'first':
        return found(first.label);
      case 'longest': {
        const longest = matches.reduce((best, m) => (m.normalized.length > best.normalized.length ? m : best));
        return found(longest.label);
      }
      case 'reject':
        return permanentError(`Ambiguous label '${raw}' matches: ${matches.map((m) => m.label).join(', ')}`);
    }
  };
}

/** Wrap a lookup returning raw string labels so its values pass through `matcher`. */
export function withLabelPolicy(lookup: LookupFn, matcher: LabelMatcher): LookupFn {
  return async (key, context) => {
    const result = await lookup(key, context);
    if (result.kind === 'FOUND' && typeof result.value === 'string') {
      return matcher(result.value);
    }
    return result;
  };
}
