import type { ValidationError, ValidationResult } from '@chemkit/core';
import { invalidResult, validResult } from '@chemkit/core';
import type { CasNumber } from '../model/CasNumber.js';
import type { CasParseResult, CasValidationFailure, CasValidationResult } from '../model/CasValidationResult.js';

const CAS_PATTERN = /^(\d{2,7})-(\d{2})-(\d)$/;

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Parse `NNNNNNN-NN-N`: a first group of 2 to 7 digits, a second group of
 * exactly 2 and a single check digit. Whitespace is not trimmed.
 */
export function parseIdentifier(input: unknown): CasParseResult {
  if (typeof input !== 'string') {
    return { ok: false, status: 'INVALID_FORMAT', message: `Expected a string, got ${describe(input)}` };
  }

  const match = CAS_PATTERN.exec(input);
  if (!match) {
    return {
      ok: false,
      status: 'INVALID_FORMAT',
      message: `'${input}' does not match the CAS pattern NNNNNNN-NN-N`,
    };
  }

  const [, first = '', second = '', check = ''] = match;
  return {
    ok: true,
    cas: {
      text: input,
      digits: [...first, ...second].map(Number),
      checkDigit: Number(check),
    },
  };
}

/**
 * Check digit of a digit sequence: weights 1, 2, 3… from the rightmost digit
 * leftward, sum modulo 10.
 *
 * @throws RangeError when an element is not an integer from 0 to 9.
 */
export function computeCheckDigit(digits: readonly number[]): number {
  let sum = 0;
  digits.forEach((digit, i) => {
    if (!Number.isInteger(digit) || digit < 0 || digit > 9) {
      throw new RangeError(`Digit at position ${String(i)} must be an integer from 0 to 9, got ${String(digit)}`);
    }
    sum += digit * (digits.length - i);
  });
  return sum % 10;
}

export function validateIdentifier(input: unknown): CasValidationResult {
  const parsed = parseIdentifier(input);
  if (!parsed.ok) return { status: parsed.status, message: parsed.message };

  const { cas } = parsed;
  const expected = computeCheckDigit(cas.digits);
  if (expected === cas.checkDigit) return { status: 'VALID', cas };

  return {
    status: 'INVALID_CHECKSUM',
    cas,
    expected,
    actual: cas.checkDigit,
    message: `Check digit of '${cas.text}' is ${String(cas.checkDigit)}, expected ${String(expected)}`,
  };
}

export function isValidIdentifier(input: unknown): boolean {
  return validateIdentifier(input).status === 'VALID';
}

/**
 * Trim whitespace and strip surrounding single quotes, which spreadsheets
 * add to keep CAS numbers from being read as dates (`'50-00-0`).
 */
export function normalizeIdentifier(input: string): string {
  return input.trim().replace(/^'+/, '').replace(/'+$/, '').trim();
}

/** Write `digits` in CAS grouping, followed by `checkDigit`. */
export function formatIdentifier(digits: readonly number[], checkDigit: number): string {
  const text = digits.join('');
  return `${text.slice(0, -2)}-${text.slice(-2)}-${String(checkDigit)}`;
}

/** The same number with its check digit corrected. */
export function correctCheckDigit(cas: CasNumber): string {
  return formatIdentifier(cas.digits, computeCheckDigit(cas.digits));
}

/** Express a failed validation as a `ValidationError` for `field`. */
export function toValidationError(failure: CasValidationFailure, field: string, value: unknown): ValidationError {
  switch (failure.status) {
    case 'INVALID_FORMAT':
      return { field, message: failure.message, code: 'INVALID_FORMAT', value };
    case 'INVALID_CHECKSUM':
      return {
        field,
        message: failure.message,
        code: 'INVALID_CHECKSUM',
        value,
        suggestion: `Check the source; with a corrected check digit it would read ${correctCheckDigit(failure.cas)}`,
      };
  }
}

export function toValidationResult(result: CasValidationResult, field: string, value: unknown): ValidationResult {
  return result.status === 'VALID' ? validResult() : invalidResult([toValidationError(result, field, value)]);
}
