/**
 * Convert a Set or Map to something JSON can hold, and drop functions
 */
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) {
    return Object.fromEntries(value);
  }
  if (value instanceof Set) {
    return [...value];
  }
  if (typeof value === 'function') {
    return undefined;
  }
  return value;
}

/**
 * Format a report, analysis result or export document as JSON.
 * Dates are written as ISO strings.
 */
export function formatJsonReport(report: object): string {
  return JSON.stringify(report, replacer, 2);
}
