/**
 * A parsed CAS Registry Number.
 *
 * `digits` are the digits of the first two groups, most significant first;
 * `checkDigit` is the single digit of the last group.
 */
export interface CasNumber {
  /** The identifier as written, e.g. `'7732-18-5'`. */
  readonly text: string;
  readonly digits: readonly number[];
  readonly checkDigit: number;
}
