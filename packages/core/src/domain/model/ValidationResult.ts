/** Error codes produced by identifier and key validation. */
export type ValidationErrorCode = 'REQUIRED' | 'TYPE_MISMATCH' | 'INVALID_FORMAT' | 'INVALID_CHECKSUM' | 'CUSTOM_VALIDATION';

/** Severity level of a validation error. Warnings are non-blocking. */
export type ErrorSeverity = 'error' | 'warning';

/** A single validation error for a specific field. */
export interface ValidationError {
  /** Name of the column (or key) that failed validation. */
  readonly field: string;
  /** Human-readable error message. */
  readonly message: string;
  /** Machine-readable error code. */
  readonly code: ValidationErrorCode;
  /** The value that caused the validation failure. */
  readonly value?: unknown;
  /** Severity level. Defaults to `'error'` when omitted. */
  readonly severity?: ErrorSeverity;
  /** Actionable hint for the user to fix the error. */
  readonly suggestion?: string;
}

/** Result of validating a single value. */
export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly ValidationError[];
}

export function validResult(): ValidationResult {
  return { isValid: true, errors: [] };
}

export function invalidResult(errors: readonly ValidationError[]): ValidationResult {
  return { isValid: false, errors };
}

/** Return `true` if the list contains at least one hard error (severity `'error'` or unset). */
export function hasErrors(errors: readonly ValidationError[]): boolean {
  return errors.some((e) => e.severity === undefined || e.severity === 'error');
}

/** Filter to only hard errors (severity `'error'` or unset). */
export function getErrors(errors: readonly ValidationError[]): readonly ValidationError[] {
  return errors.filter((e) => e.severity === undefined || e.severity === 'error');
}
