/**
 * Rate-limit response header names and strict integer parsing.
 */

export const LIMIT_HEADER = 'x-mc-rate-limit';
export const REMAINING_HEADER = 'x-mc-rate-limit-remaining';
export const RESET_HEADER = 'x-mc-rate-limit-reset';

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a header value as a base-10 integer.
 * Returns null for absent, empty, fractional or otherwise non-integer values.
 */
export function parseIntegerHeader(value: string | null | undefined): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}
