/**
 * Shared utility functions
 */

/**
 * Safely parse an integer, returning null if the value is invalid or NaN.
 */
export function parseIntSafe(
  value: string | undefined | null,
  radix = 10
): number | null {
  if (!value) return null;
  const parsed = parseInt(value, radix);
  return isNaN(parsed) ? null : parsed;
}

/**
 * Split a comma separated header value into trimmed, non-empty parts.
 */
export function splitHeaderList(value: string | undefined | null): string[] {
  if (!value) return [];
  return value.split(",").map((part) => part.trim()).filter(Boolean);
}
