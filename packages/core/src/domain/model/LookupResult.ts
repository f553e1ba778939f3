/** A value a lookup may resolve to. Must be storable in a table cell. */
export type CellValue = string | number | boolean;

export interface FoundResult {
  readonly kind: 'FOUND';
  readonly value: CellValue;
}

/** The lookup service answered: there is no match for this key. Final. */
export interface NotFoundResult {
  readonly kind: 'NOT_FOUND';
}

/** Network hiccup, timeout, rate limit. The key is eligible for another attempt. */
export interface TransientErrorResult {
  readonly kind: 'TRANSIENT_ERROR';
  readonly error: string;
}

/** The key itself cannot be looked up (e.g. malformed). Final. */
export interface PermanentErrorResult {
  readonly kind: 'PERMANENT_ERROR';
  readonly error: string;
}

export type LookupResult = FoundResult | NotFoundResult | TransientErrorResult | PermanentErrorResult;

export function found(value: CellValue): FoundResult {
  return { kind: 'FOUND', value };
}

export function notFound(): NotFoundResult {
  return { kind: 'NOT_FOUND' };
}

export function transientError(error: string): TransientErrorResult {
  return { kind: 'TRANSIENT_ERROR', error };
}

export function permanentError(error: string): PermanentErrorResult {
  return { kind: 'PERMANENT_ERROR', error };
}

export function isCellValue(value: unknown): value is CellValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
