import { ParseError } from '../types/errors';

/**
 * Parse a lookback window into days
 *
 * Supported formats:
 * - "7d" -> 7 days
 * - "2w" -> 14 days
 * - "1w3d" -> 10 days
 * - "30" -> 30 days (bare number)
 *
 * @throws ParseError if format is invalid
 */
export function parseWindow(window: string): number {
  if (!window || typeof window !== 'string') {
    throw new ParseError('Window cannot be empty');
  }

  const trimmed = window.trim();
  if (trimmed.length === 0) {
    throw new ParseError('Window cannot be empty');
  }

  if (/^\d+$/.test(trimmed)) {
    const days = parseInt(trimmed, 10);
    if (days === 0) {
      throw new ParseError('Window cannot be zero', window);
    }
    return days;
  }

  const match = trimmed.match(/^(?:(\d+)w)?(?:(\d+)d)?$/);
  if (!match || (!match[1] && !match[2])) {
    throw new ParseError('Invalid window format', window);
  }

  const weeks = match[1] ? parseInt(match[1], 10) : 0;
  const days = match[2] ? parseInt(match[2], 10) : 0;
  const totalDays = weeks * 7 + days;

  if (totalDays === 0) {
    throw new ParseError('Window cannot be zero', window);
  }

  return totalDays;
}

/**
 * Format days back into a window string, e.g. "2w", "1w3d", "5d"
 */
export function formatWindow(days: number): string {
  if (!Number.isInteger(days) || days <= 0) {
    throw new ParseError('Window must be a positive whole number of days', String(days));
  }

  const weeks = Math.floor(days / 7);
  const rest = days % 7;

  if (weeks > 0 && rest > 0) {
    return `${weeks}w${rest}d`;
  } else if (weeks > 0) {
    return `${weeks}w`;
  }
  return `${rest}d`;
}
