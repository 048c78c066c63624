/**
 * Stringify a value for comparison and reporting
 */
export function stringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  return JSON.stringify(value);
}

/**
 * Message of a thrown value, whatever was thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Format a 0..1 weight as a percentage with one decimal, e.g. 0.3 -> "30.0%"
 */
export function formatWeight(weight: number): string {
  return `${(weight * 100).toFixed(1)}%`;
}
