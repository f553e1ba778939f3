/** Text written into the result column for outcomes that carry no value. */
export interface CellMarkers {
  /** Cell content for a key the lookup service does not know. Default: `'NOT_FOUND'`. */
  readonly notFound: string;
  /** Prefix of the cell content for a permanent error. Default: `'Error: '`. */
  readonly errorPrefix: string;
}

export const DEFAULT_MARKERS: CellMarkers = {
  notFound: 'NOT_FOUND',
  errorPrefix: 'Error: ',
};

/**
 * How rows are keyed in the enrichment state.
 *
 * - `'value'`: by the normalized key cell. Rows sharing a key share one lookup.
 * - `'index'`: by row position. Only safe when the table is never reordered.
 */
export type KeyMode = 'value' | 'index';

export interface EnrichmentTargetOptions {
  /** Column holding the lookup key. */
  readonly keyColumn: string;
  /** Column receiving the lookup result. */
  readonly column: string;
  /** Column receiving the row status. Default: `` `${column}_status` ``. `null` disables it. */
  readonly statusColumn?: string | null;
  /** Default: `'value'`. */
  readonly keyBy?: KeyMode;
  /** Markers for not-found and error cells. Merged over `DEFAULT_MARKERS`. */
  readonly markers?: Partial<CellMarkers>;
  /** Applied to string key cells before lookup. Default: trims whitespace. */
  readonly normalizeKey?: (raw: string) => string;
}

/** Fully resolved description of which columns an enrichment reads and writes. */
export interface EnrichmentTarget {
  readonly keyColumn: string;
  readonly column: string;
  readonly statusColumn: string | null;
  readonly keyBy: KeyMode;
  readonly markers: CellMarkers;
  readonly normalizeKey: (raw: string) => string;
}

export function resolveTarget(options: EnrichmentTargetOptions): EnrichmentTarget {
  if (options.keyColumn === options.column) {
    throw new Error(`Result column '${options.column}' must differ from the key column`);
  }

  const statusColumn = options.statusColumn === undefined ? `${options.column}_status` : options.statusColumn;
  if (statusColumn === options.keyColumn || statusColumn === options.column) {
    throw new Error(`Status column '${statusColumn}' must differ from the key and result columns`);
  }

  return {
    keyColumn: options.keyColumn,
    column: options.column,
    statusColumn,
    keyBy: options.keyBy ?? 'value',
    markers: { ...DEFAULT_MARKERS, ...options.markers },
    normalizeKey: options.normalizeKey ?? ((raw) => raw.trim()),
  };
}
