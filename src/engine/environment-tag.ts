import { EnvironmentTag, Season, TimePeriod } from '../types/session';
import { getWeekdayIndex } from '../utils/date';

const SEASON_BY_MONTH: Record<number, Season> = {
  1: 'winter',
  2: 'winter',
  3: 'spring',
  4: 'spring',
  5: 'spring',
  6: 'summer',
  7: 'summer',
  8: 'summer',
  9: 'autumn',
  10: 'autumn',
  11: 'autumn',
  12: 'winter',
};

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

/**
 * morning 5-12, afternoon 12-17, evening 17-22, night otherwise
 */
export function timePeriodForHour(hour: number): TimePeriod {
  if (hour >= 5 && hour < 12) {
    return 'morning';
  }
  if (hour >= 12 && hour < 17) {
    return 'afternoon';
  }
  if (hour >= 17 && hour < 22) {
    return 'evening';
  }
  return 'night';
}

export function seasonForMonth(month: number): Season {
  return SEASON_BY_MONTH[month] ?? 'winter';
}

/**
 * Calendar context for a session start, frozen so it cannot change after assignment
 */
export function buildEnvironmentTag(date: Date): Readonly<EnvironmentTag> {
  const hour = date.getHours();
  const weekday = getWeekdayIndex(date);
  const month = date.getMonth() + 1;

  return Object.freeze({
    hour,
    weekday,
    month,
    season: seasonForMonth(month),
    timePeriod: timePeriodForHour(hour),
    isWeekend: weekday >= 5,
  });
}

export function formatHour(hour: number): string {
  return `${String(hour).padStart(2, '0')}:00`;
}
