// Main entry points
export { findInvalid, casKeyValidator, casKeys } from './CasValidator.js';
export type { CasKeyValidatorOptions, CasKeySettings } from './CasValidator.js';

// Domain model
export type { CasNumber } from './domain/model/CasNumber.js';
export type {
  CasValidationResult,
  CasValidationFailure,
  CasParseResult,
  ValidCas,
  InvalidCasFormat,
  InvalidCasChecksum,
} from './domain/model/CasValidationResult.js';
export type { InvalidIdentifierReport, InvalidIdentifierFinding } from './domain/model/InvalidIdentifierReport.js';

// Domain services
export {
  parseIdentifier,
  computeCheckDigit,
  validateIdentifier,
  isValidIdentifier,
  normalizeIdentifier,
  formatIdentifier,
  correctCheckDigit,
  toValidationError,
  toValidationResult,
} from './domain/services/CasChecksum.js';

// Use cases
export { FindInvalidIdentifiers } from './application/usecases/FindInvalidIdentifiers.js';
export type { FindInvalidOptions } from './application/usecases/FindInvalidIdentifiers.js';

// Re-export commonly used types from @chemkit/core for convenience
export type { Table, Row, ValidationResult, ValidationError, KeyValidateFn } from '@chemkit/core';
export { ColumnNotFoundError } from '@chemkit/core';
