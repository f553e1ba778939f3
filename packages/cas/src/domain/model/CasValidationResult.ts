import type { CasNumber } from './CasNumber.js';

export interface ValidCas {
  readonly status: 'VALID';
  readonly cas: CasNumber;
}

/** The input is not a string of the form `NNNNNNN-NN-N`. */
export interface InvalidCasFormat {
  readonly status: 'INVALID_FORMAT';
  readonly message: string;
}

/** Well formed, but the check digit does not match the other digits. */
export interface InvalidCasChecksum {
  readonly status: 'INVALID_CHECKSUM';
  readonly cas: CasNumber;
  /** Check digit computed from `cas.digits`. */
  readonly expected: number;
  /** Check digit found in the input. */
  readonly actual: number;
  readonly message: string;
}

export type CasValidationFailure = InvalidCasFormat | InvalidCasChecksum;

export type CasValidationResult = ValidCas | CasValidationFailure;

/** Result of `parseIdentifier()`. */
export type CasParseResult = { readonly ok: true; readonly cas: CasNumber } | ({ readonly ok: false } & InvalidCasFormat);
