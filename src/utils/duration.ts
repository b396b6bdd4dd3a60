import { SessionType } from '../types/session';
import { ResolvedConfig } from '../types/config';
import { logger } from './logger';

/**
 * Longest planned duration accepted from a caller (one day)
 */
export const MAX_PLANNED_MINUTES = 24 * 60;

/**
 * Validate a planned duration before it reaches a live display.
 * Non-finite, non-positive or longer-than-a-day values fall back to the type's default;
 * a timestamp passed where minutes were expected lands here.
 */
export function sanitizePlannedMinutes(
  type: SessionType,
  minutes: number,
  config: Pick<ResolvedConfig, 'defaultWorkMinutes' | 'defaultBreakMinutes'>
): number {
  if (Number.isFinite(minutes) && minutes > 0 && minutes <= MAX_PLANNED_MINUTES) {
    return minutes;
  }

  const fallback = type === 'work' ? config.defaultWorkMinutes : config.defaultBreakMinutes;
  logger.warning(`Planned ${type} duration ${minutes} is out of range, using ${fallback} minutes`);
  return fallback;
}

/**
 * Format minutes as hours and minutes, e.g. "1h 5m"
 */
export function formatMinutes(minutes: number): string {
  const rounded = Math.round(minutes);
  const hours = Math.floor(rounded / 60);
  const mins = rounded % 60;

  if (hours === 0) {
    return `${mins}m`;
  }

  if (mins === 0) {
    return `${hours}h`;
  }

  return `${hours}h ${mins}m`;
}
