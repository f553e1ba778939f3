/**
 * Thrown when the first lookup of a run still fails transiently after all
 * retries, meaning the lookup service is most likely down for the whole run.
 */
export class LookupUnreachableError extends Error {
  readonly code = 'LOOKUP_UNREACHABLE';

  constructor(
    readonly key: string,
    readonly attempts: number,
    readonly lastError: string,
  ) {
    super(`Lookup unreachable: key '${key}' failed ${String(attempts)} time(s), last error: ${lastError}`);
    this.name = 'LookupUnreachableError';
  }
}
