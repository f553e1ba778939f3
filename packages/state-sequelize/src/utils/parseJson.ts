/**
 * Parse a value that may be a JSON string or already decoded by the driver.
 *
 * Some dialects hand TEXT and JSON columns back decoded, others as strings.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value === 'string') {
    return JSON.parse(value) as unknown;
  }
  return value;
}
