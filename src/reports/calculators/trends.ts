import { SessionRecord } from '../../types/session';
import { getDateKey } from '../../utils/date';
import { clamp, linearSlope, mean, percentChange, round1 } from '../../utils/stats';

export type TrendDirection = 'improving' | 'declining' | 'stable';

export type TrendStrength = 'weak' | 'moderate' | 'strong';

export type TrendMetric = 'focus' | 'efficiency' | 'completion';

export const TREND_METRICS: readonly TrendMetric[] = ['focus', 'efficiency', 'completion'];

export interface DailyAverage {
  date: string;
  sessions: number;
  focus: number;
  efficiency: number;
  /** Percent of the day's sessions completed */
  completion: number;
}

export interface MetricTrend {
  direction: TrendDirection;
  strength: TrendStrength;
  /** Change of the moving average per day with data */
  slope: number;
  movingAverage: number[];
  /** Linear extrapolation seven days past the last point */
  prediction: number;
  /** First versus last moving-average value, in percent */
  improvementRate: number | null;
}

export interface Milestone {
  metric: TrendMetric;
  date: string;
  value: number;
}

/**
 * Averages per calendar day, oldest first
 */
export function calculateDailyAverages(sessions: readonly SessionRecord[]): DailyAverage[] {
  const days = new Map<string, SessionRecord[]>();
  for (const session of sessions) {
    const key = getDateKey(session.startTime);
    const day = days.get(key) ?? [];
    day.push(session);
    days.set(key, day);
  }

  return [...days.entries()]
    .sort((a, b) => a[0].localeCompare(b[0]))
    .map(([date, day]) => ({
      date,
      sessions: day.length,
      focus: round1(mean(day.map((session) => session.focusScore))),
      efficiency: round1(mean(day.map((session) => session.efficiencyScore))),
      completion: round1((day.filter((session) => session.completed).length / day.length) * 100),
    }));
}

/**
 * Trailing moving average; the first points average what is available
 */
export function movingAverage(values: readonly number[], window: number): number[] {
  const size = Math.max(1, Math.floor(window));
  return values.map((_, index) => round1(mean(values.slice(Math.max(0, index - size + 1), index + 1))));
}

export function trendDirection(slope: number): TrendDirection {
  if (slope > 0.5) {
    return 'improving';
  }
  if (slope < -0.5) {
    return 'declining';
  }
  return 'stable';
}

export function trendStrength(slope: number): TrendStrength {
  const magnitude = Math.abs(slope);
  if (magnitude < 0.5) {
    return 'weak';
  }
  if (magnitude < 2) {
    return 'moderate';
  }
  return 'strong';
}

export function analyzeMetricTrend(values: readonly number[], windowDays: number): MetricTrend {
  const averaged = movingAverage(values, windowDays);
  const slope = linearSlope(averaged);
  const last = averaged[averaged.length - 1] ?? 0;
  const first = averaged[0] ?? 0;

  return {
    direction: trendDirection(slope),
    strength: trendStrength(slope),
    slope: Math.round(slope * 100) / 100,
    movingAverage: averaged,
    prediction: round1(clamp(last + slope * 7, 0, 100)),
    improvementRate: percentChange(last, first),
  };
}

/**
 * Majority vote across metrics; no majority means stable
 */
export function overallDirection(directions: readonly TrendDirection[]): TrendDirection {
  const improving = directions.filter((direction) => direction === 'improving').length;
  const declining = directions.filter((direction) => direction === 'declining').length;
  const majority = directions.length / 2;

  if (improving > majority) {
    return 'improving';
  }
  if (declining > majority) {
    return 'declining';
  }
  return 'stable';
}

/**
 * Best day for each metric; the earliest day wins a tie
 */
export function findMilestones(days: readonly DailyAverage[]): Milestone[] {
  const milestones: Milestone[] = [];

  for (const metric of TREND_METRICS) {
    let best: DailyAverage | null = null;
    for (const day of days) {
      if (!best || day[metric] > best[metric]) {
        best = day;
      }
    }
    if (best) {
      milestones.push({ metric, date: best.date, value: best[metric] });
    }
  }

  return milestones;
}
