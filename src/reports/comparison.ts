import { subDays } from 'date-fns';
import { DateRange, SessionRecord } from '../types/session';
import { AnalysisResult, insufficientData, ok } from '../types/analysis';
import { ValidationError } from '../types/errors';
import { SessionEventStore } from '../engine/session-store';
import { Clock, systemClock } from '../utils/clock';
import { TtlCache } from '../utils/cache';
import { assertValidRange, lastNDays } from '../utils/date';
import { logger } from '../utils/logger';
import { percentChange, round1 } from '../utils/stats';
import {
  calculateSessionMetrics,
  LOWER_IS_BETTER,
  MetricKey,
  SessionMetrics,
  workSessions,
} from './calculators/metrics';
import { calculateEffectSize, EffectSize } from './calculators/effect-size';
import {
  analyzeMetricTrend,
  calculateDailyAverages,
  DailyAverage,
  findMilestones,
  Milestone,
  MetricTrend,
  overallDirection,
  TREND_METRICS,
  TrendDirection,
  TrendMetric,
} from './calculators/trends';

export type Granularity = 'daily' | 'weekly' | 'monthly';

export const GRANULARITIES: readonly Granularity[] = ['daily', 'weekly', 'monthly'];

export const GRANULARITY_SHIFT_DAYS: Record<Granularity, number> = {
  daily: 1,
  weekly: 7,
  monthly: 30,
};

const GRANULARITY_LABEL: Record<Granularity, string> = {
  daily: 'day',
  weekly: 'week',
  monthly: 'month',
};

export type MetricChanges = Record<MetricKey, number | null>;

export interface PeriodMetrics {
  range: DateRange;
  metrics: SessionMetrics;
}

export interface PeriodComparisonEntry extends PeriodMetrics {
  /** Percent change from this period to the anchor period */
  changes: MetricChanges;
  verdict: TrendDirection;
}

export interface PeriodComparison {
  granularity: Granularity;
  current: PeriodMetrics;
  previous: PeriodComparisonEntry[];
  verdict: TrendDirection;
  insights: string[];
}

export type BetterGroup = 'weekdays' | 'weekends' | 'similar';

export interface WeekdayWeekendComparison {
  range: DateRange;
  weekdays: SessionMetrics;
  weekends: SessionMetrics;
  /** Weekday relative to weekend, in percent */
  differences: Pick<MetricChanges, 'averageFocusScore' | 'averageEfficiencyScore' | 'completionRate'>;
  better: BetterGroup;
  effectSize: EffectSize;
  recommendation: string;
}

export interface TimePeriodDefinition {
  name: string;
  /** Inclusive */
  startHour: number;
  /** Exclusive */
  endHour: number;
}

export type Confidence = 'high' | 'medium' | 'low';

export interface TimePeriodBucket extends TimePeriodDefinition {
  metrics: SessionMetrics;
  compositeScore: number;
  confidence: Confidence;
}

export interface TimePeriodComparison {
  range: DateRange;
  periods: TimePeriodBucket[];
  best: string | null;
  recommendation: string;
}

export interface ProgressTrends {
  range: DateRange;
  windowDays: number;
  days: DailyAverage[];
  metrics: Record<TrendMetric, MetricTrend>;
  overall: TrendDirection;
  milestones: Milestone[];
}

export const DEFAULT_TIME_PERIODS: readonly TimePeriodDefinition[] = [
  { name: 'morning', startHour: 5, endHour: 12 },
  { name: 'afternoon', startHour: 12, endHour: 17 },
  { name: 'evening', startHour: 17, endHour: 22 },
];

type CachedComparison =
  | { kind: 'periods'; value: PeriodComparison }
  | { kind: 'weekdays'; value: AnalysisResult<WeekdayWeekendComparison> }
  | { kind: 'time_periods'; value: TimePeriodComparison }
  | { kind: 'trends'; value: AnalysisResult<ProgressTrends> };

const CACHE_TTL_MS = 60 * 60 * 1000;
const CACHE_MAX_ENTRIES = 20;
const CHANGE_THRESHOLD = 5;
const FOCUS_INSIGHT_THRESHOLD = 10;
const COMPLETION_INSIGHT_THRESHOLD = 15;
const SIMILAR_THRESHOLD = 5;
const MIN_TREND_DAYS = 3;

const COMPARED_METRICS: readonly MetricKey[] = [
  'averageFocusScore',
  'averageEfficiencyScore',
  'completionRate',
  'averageDurationMinutes',
  'interruptionsPerSession',
];

function rangeKey(range: DateRange): string {
  return `${range.start.toISOString()}_${range.end.toISOString()}`;
}

function shiftRange(range: DateRange, days: number): DateRange {
  return { start: subDays(range.start, days), end: subDays(range.end, days) };
}

export function calculateChanges(current: SessionMetrics, previous: SessionMetrics): MetricChanges {
  return {
    averageFocusScore: percentChange(current.averageFocusScore, previous.averageFocusScore),
    averageEfficiencyScore: percentChange(current.averageEfficiencyScore, previous.averageEfficiencyScore),
    completionRate: percentChange(current.completionRate, previous.completionRate),
    averageDurationMinutes: percentChange(current.averageDurationMinutes, previous.averageDurationMinutes),
    totalInterruptions: percentChange(current.totalInterruptions, previous.totalInterruptions),
    interruptionsPerSession: percentChange(current.interruptionsPerSession, previous.interruptionsPerSession),
  };
}

/**
 * Improving or declining when most compared metrics moved more than 5% the same way.
 * Fewer interruptions count as an improvement.
 */
export function changeVerdict(changes: MetricChanges): TrendDirection {
  let improved = 0;
  let declined = 0;
  let considered = 0;

  for (const key of COMPARED_METRICS) {
    const change = changes[key];
    if (change === null) {
      continue;
    }
    considered += 1;
    const signed = LOWER_IS_BETTER.has(key) ? -change : change;
    if (signed > CHANGE_THRESHOLD) {
      improved += 1;
    } else if (signed < -CHANGE_THRESHOLD) {
      declined += 1;
    }
  }

  if (considered === 0) {
    return 'stable';
  }
  if (improved > considered / 2) {
    return 'improving';
  }
  if (declined > considered / 2) {
    return 'declining';
  }
  return 'stable';
}

function confidenceFor(samples: number): Confidence {
  if (samples >= 5) {
    return 'high';
  }
  if (samples >= 2) {
    return 'medium';
  }
  return 'low';
}

/**
 * 0.4 focus + 0.4 efficiency + 0.2 completion
 */
export function timePeriodScore(metrics: SessionMetrics): number {
  return round1(metrics.averageFocusScore * 0.4 + metrics.averageEfficiencyScore * 0.4 + metrics.completionRate * 0.2);
}

function weekdayRecommendation(better: BetterGroup): string {
  switch (better) {
    case 'weekdays':
      return 'You do your best work on weekdays. Keep weekends for lighter tasks.';
    case 'weekends':
      return 'Weekends are your most productive days. Protect some weekday time with the same conditions.';
    case 'similar':
      return 'Your performance is consistent across the week.';
  }
}

/**
 * Read-only comparisons over finalized work sessions, cached by parameters
 */
export class ComparisonAnalytics {
  private readonly log = logger.scoped('comparison');
  private readonly cache: TtlCache<CachedComparison>;

  constructor(
    private readonly store: SessionEventStore,
    private readonly clock: Clock = systemClock
  ) {
    this.cache = new TtlCache<CachedComparison>(CACHE_TTL_MS, CACHE_MAX_ENTRIES, clock);
  }

  /**
   * Metrics of [start, end) against `count` earlier windows shifted by a day, week or 30 days
   */
  comparePeriods(granularity: Granularity, start: Date, end: Date, count: number = 3): PeriodComparison {
    const range = { start, end };
    assertValidRange(range);
    if (!Number.isInteger(count) || count < 1) {
      throw new ValidationError(`Period count must be a positive integer, got ${count}`, 'count');
    }

    const key = `periods:${granularity}:${rangeKey(range)}:${count}`;
    const cached = this.cache.get(key);
    if (cached?.kind === 'periods') {
      return cached.value;
    }

    const current: PeriodMetrics = { range, metrics: this.metricsFor(range) };
    const shift = GRANULARITY_SHIFT_DAYS[granularity];
    const previous: PeriodComparisonEntry[] = [];

    for (let i = 1; i <= count; i++) {
      const earlier = shiftRange(range, shift * i);
      const metrics = this.metricsFor(earlier);
      const changes = calculateChanges(current.metrics, metrics);
      previous.push({ range: earlier, metrics, changes, verdict: changeVerdict(changes) });
    }

    const latest = previous[0];
    const value: PeriodComparison = {
      granularity,
      current,
      previous,
      verdict: latest ? latest.verdict : 'stable',
      insights: latest ? this.periodInsights(latest.changes, GRANULARITY_LABEL[granularity]) : [],
    };

    return this.cache.set(key, { kind: 'periods', value }).value;
  }

  /**
   * Weekday (Mon-Fri) against weekend sessions.
   * Needs sessions in both groups; the effect size needs five per group.
   */
  compareWeekdaysVsWeekends(range: DateRange = this.defaultRange()): AnalysisResult<WeekdayWeekendComparison> {
    assertValidRange(range);
    const key = `weekdays:${rangeKey(range)}`;
    const cached = this.cache.get(key);
    if (cached?.kind === 'weekdays') {
      return cached.value;
    }

    const sessions = this.sessionsIn(range);
    const weekdaySessions = sessions.filter((session) => !session.environment.isWeekend);
    const weekendSessions = sessions.filter((session) => session.environment.isWeekend);

    let value: AnalysisResult<WeekdayWeekendComparison>;
    if (weekdaySessions.length === 0 || weekendSessions.length === 0) {
      value = insufficientData(1, Math.min(weekdaySessions.length, weekendSessions.length), 'weekday/weekend comparison per group');
    } else {
      const weekdays = calculateSessionMetrics(weekdaySessions);
      const weekends = calculateSessionMetrics(weekendSessions);
      const efficiencyDifference = percentChange(weekdays.averageEfficiencyScore, weekends.averageEfficiencyScore);

      let better: BetterGroup = 'similar';
      if (efficiencyDifference === null || efficiencyDifference > SIMILAR_THRESHOLD) {
        better = 'weekdays';
      } else if (efficiencyDifference < -SIMILAR_THRESHOLD) {
        better = 'weekends';
      }

      value = ok({
        range,
        weekdays,
        weekends,
        differences: {
          averageFocusScore: percentChange(weekdays.averageFocusScore, weekends.averageFocusScore),
          averageEfficiencyScore: efficiencyDifference,
          completionRate: percentChange(weekdays.completionRate, weekends.completionRate),
        },
        better,
        effectSize: calculateEffectSize(
          weekdaySessions.map((session) => session.efficiencyScore),
          weekendSessions.map((session) => session.efficiencyScore)
        ),
        recommendation: weekdayRecommendation(better),
      });
    }

    return this.cache.set(key, { kind: 'weekdays', value }).value;
  }

  /**
   * Metrics per hour range of the session start. The best bucket has the
   * highest composite score among buckets with sessions.
   */
  compareTimePeriods(
    periods: readonly TimePeriodDefinition[] = DEFAULT_TIME_PERIODS,
    range: DateRange = this.defaultRange()
  ): TimePeriodComparison {
    assertValidRange(range);
    for (const period of periods) {
      if (period.startHour < 0 || period.endHour > 24 || period.startHour >= period.endHour) {
        throw new ValidationError(`Invalid hours for time period "${period.name}"`, 'periods');
      }
    }

    const signature = periods.map((period) => `${period.name}=${period.startHour}-${period.endHour}`).join(',');
    const key = `time_periods:${signature}:${rangeKey(range)}`;
    const cached = this.cache.get(key);
    if (cached?.kind === 'time_periods') {
      return cached.value;
    }

    const sessions = this.sessionsIn(range);
    const buckets: TimePeriodBucket[] = periods.map((period) => {
      const inPeriod = sessions.filter(
        (session) => session.environment.hour >= period.startHour && session.environment.hour < period.endHour
      );
      const metrics = calculateSessionMetrics(inPeriod);
      return {
        ...period,
        metrics,
        compositeScore: timePeriodScore(metrics),
        confidence: confidenceFor(metrics.count),
      };
    });

    let best: TimePeriodBucket | null = null;
    for (const bucket of buckets) {
      if (bucket.metrics.count > 0 && (!best || bucket.compositeScore > best.compositeScore)) {
        best = bucket;
      }
    }

    const value: TimePeriodComparison = {
      range,
      periods: buckets,
      best: best ? best.name : null,
      recommendation: best
        ? `Your ${best.name} sessions score highest (${best.compositeScore}, ${best.confidence} confidence). Put important work there.`
        : 'No sessions in this range yet.',
    };

    return this.cache.set(key, { kind: 'time_periods', value }).value;
  }

  /**
   * Daily averages smoothed with a trailing moving average.
   * Needs at least three days with sessions.
   */
  analyzeProgressTrends(windowDays: number = 7, range: DateRange = this.defaultRange()): AnalysisResult<ProgressTrends> {
    assertValidRange(range);
    if (!Number.isInteger(windowDays) || windowDays < 1) {
      throw new ValidationError(`Window must be a positive number of days, got ${windowDays}`, 'windowDays');
    }

    const key = `trends:${windowDays}:${rangeKey(range)}`;
    const cached = this.cache.get(key);
    if (cached?.kind === 'trends') {
      return cached.value;
    }

    const days = calculateDailyAverages(this.sessionsIn(range));
    let value: AnalysisResult<ProgressTrends>;

    if (days.length < MIN_TREND_DAYS) {
      value = insufficientData(MIN_TREND_DAYS, days.length, 'trend analysis (days with sessions)');
    } else {
      const metrics: Record<TrendMetric, MetricTrend> = {
        focus: analyzeMetricTrend(days.map((day) => day.focus), windowDays),
        efficiency: analyzeMetricTrend(days.map((day) => day.efficiency), windowDays),
        completion: analyzeMetricTrend(days.map((day) => day.completion), windowDays),
      };

      value = ok({
        range,
        windowDays,
        days,
        metrics,
        overall: overallDirection(TREND_METRICS.map((metric) => metrics[metric].direction)),
        milestones: findMilestones(days),
      });
    }

    return this.cache.set(key, { kind: 'trends', value }).value;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private periodInsights(changes: MetricChanges, period: string): string[] {
    const insights: string[] = [];
    const focus = changes.averageFocusScore;
    const completion = changes.completionRate;

    if (focus !== null && focus >= FOCUS_INSIGHT_THRESHOLD) {
      insights.push(`Focus improved by ${focus}% compared with the previous ${period}.`);
    } else if (focus !== null && focus <= -FOCUS_INSIGHT_THRESHOLD) {
      insights.push(`Focus dropped by ${Math.abs(focus)}% compared with the previous ${period}.`);
    }

    if (completion !== null && completion >= COMPLETION_INSIGHT_THRESHOLD) {
      insights.push(`You completed ${completion}% more of your sessions than the previous ${period}.`);
    } else if (completion !== null && completion <= -COMPLETION_INSIGHT_THRESHOLD) {
      insights.push(`Completion fell by ${Math.abs(completion)}% against the previous ${period}.`);
    }

    return insights;
  }

  private metricsFor(range: DateRange): SessionMetrics {
    return calculateSessionMetrics(this.sessionsIn(range));
  }

  private sessionsIn(range: DateRange): SessionRecord[] {
    const sessions = workSessions(this.store.getSessionsInRange(range));
    this.log.debug(`${sessions.length} work session(s) in range`);
    return sessions;
  }

  private defaultRange(): DateRange {
    return lastNDays(30, this.clock());
  }
}
