/**
 * Drop unset request fields: undefined, null and the empty string.
 * Zero, false and empty arrays are real values and are kept.
 */
export function compact(fields: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined || value === null || value === '') continue;
    result[key] = value;
  }
  return result;
}
