import { differenceInCalendarDays, subDays } from 'date-fns';
import { DateRange, EnvironmentTag, Season, SessionRecord, SessionType, TimePeriod } from '../types/session';
import { EngineConfig, ResolvedConfig } from '../types/config';
import { AnalysisResult, insufficientData, ok } from '../types/analysis';
import { SnapshotStore } from '../db/database';
import { loadSnapshot, persistSnapshot, reviveDate, Serialized } from '../db/snapshot';
import { resolveConfig } from '../utils/config';
import { Clock, systemClock } from '../utils/clock';
import { appendCapped, appendToBucket } from '../utils/bounded';
import { TypedEmitter } from '../utils/events';
import { logger } from '../utils/logger';
import { mean, round1 } from '../utils/stats';
import { SessionEventStore } from './session-store';
import { formatHour, WEEKDAY_NAMES } from './environment-tag';

export interface EnvironmentRecord {
  sessionId: string;
  timestamp: Date;
  type: SessionType;
  environment: EnvironmentTag;
  efficiencyScore: number;
  focusScore: number;
  /** Mean of efficiency and focus */
  performance: number;
}

export type BucketDimension = 'hour' | 'weekday' | 'month';

export type PerformanceBuckets = Record<BucketDimension, Record<string, number[]>>;

export interface OptimalTime {
  dimension: 'hour' | 'weekday';
  value: number;
  label: string;
  averagePerformance: number;
  samples: number;
}

export interface OptimalTimes {
  hour: OptimalTime | null;
  weekday: OptimalTime | null;
}

export interface GroupPerformance<K> {
  key: K;
  averagePerformance: number;
  samples: number;
}

export interface EnvironmentInsights {
  lookbackDays: number;
  sessions: number;
  timePeriods: GroupPerformance<TimePeriod>[];
  bestTimePeriod: GroupPerformance<TimePeriod> | null;
  weekdayAverage: number | null;
  weekendAverage: number | null;
  recommendations: string[];
}

export interface HeatmapCell {
  weekday: number;
  hour: number;
  averagePerformance: number;
  samples: number;
}

export interface EnvironmentCorrelatorEvents {
  optimalTimeDetected: OptimalTime;
}

export interface EnvironmentCorrelatorOptions {
  snapshots?: SnapshotStore | null;
  config?: EngineConfig;
  clock?: Clock;
}

interface EnvironmentDocument {
  records: Serialized<EnvironmentRecord>[];
  buckets: PerformanceBuckets;
  lastUpdated: string;
}

const SNAPSHOT = 'environment';
const HEATMAP_RECORDS = 200;
const MIN_INSIGHT_SESSIONS = 3;
const WEEKEND_DIFFERENCE_NOTE = 10;

const OPTIMAL_HOUR = { minSamples: 3, minAverage: 70 };
const OPTIMAL_WEEKDAY = { minSamples: 2, minAverage: 65 };

const TIME_PERIOD_ORDER: TimePeriod[] = ['morning', 'afternoon', 'evening', 'night'];
const SEASON_ORDER: Season[] = ['winter', 'spring', 'summer', 'autumn'];

function emptyBuckets(): PerformanceBuckets {
  return { hour: {}, weekday: {}, month: {} };
}

function groupBy<K extends string | number>(
  records: readonly EnvironmentRecord[],
  keyOf: (record: EnvironmentRecord) => K,
  order: readonly K[]
): GroupPerformance<K>[] {
  const groups = new Map<K, number[]>();
  for (const record of records) {
    const key = keyOf(record);
    const values = groups.get(key) ?? [];
    values.push(record.performance);
    groups.set(key, values);
  }

  return order
    .filter((key) => groups.has(key))
    .map((key) => {
      const values = groups.get(key) ?? [];
      return { key, averagePerformance: round1(mean(values)), samples: values.length };
    });
}

/**
 * Best qualifying bucket: enough samples and a high enough mean
 */
function topQualifier(
  buckets: Record<string, number[]>,
  rule: { minSamples: number; minAverage: number }
): { value: number; average: number; samples: number } | null {
  let best: { value: number; average: number; samples: number } | null = null;

  for (const [key, values] of Object.entries(buckets)) {
    if (values.length < rule.minSamples) {
      continue;
    }
    const average = mean(values);
    if (average <= rule.minAverage) {
      continue;
    }
    if (!best || average > best.average) {
      best = { value: Number(key), average, samples: values.length };
    }
  }

  return best;
}

/**
 * Correlates session performance with calendar context
 */
export class EnvironmentCorrelator extends TypedEmitter<EnvironmentCorrelatorEvents> {
  private readonly config: ResolvedConfig;
  private readonly clock: Clock;
  private readonly snapshots: SnapshotStore | null;

  private records: EnvironmentRecord[] = [];
  private buckets: PerformanceBuckets = emptyBuckets();
  private lastOptimal: { hour: number | null; weekday: number | null } = { hour: null, weekday: null };
  private readonly unsubscribe: () => void;

  constructor(store: SessionEventStore, options: EnvironmentCorrelatorOptions = {}) {
    super(logger.scoped('environment'));
    this.config = resolveConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.snapshots = options.snapshots ?? null;
    this.load();

    this.unsubscribe = store.on('sessionFinalized', (record) => {
      this.recordSession(record);
    });
  }

  /**
   * Add a finalized work session to the records and bucket maps.
   * Break sessions are ignored.
   */
  recordSession(record: SessionRecord): EnvironmentRecord | null {
    if (record.type !== 'work') {
      return null;
    }

    const entry: EnvironmentRecord = {
      sessionId: record.sessionId,
      timestamp: record.startTime,
      type: record.type,
      environment: { ...record.environment },
      efficiencyScore: record.efficiencyScore,
      focusScore: record.focusScore,
      performance: round1((record.efficiencyScore + record.focusScore) / 2),
    };

    appendCapped(this.records, entry, this.config.environmentRecordCap);
    const cap = this.config.bucketCap;
    appendToBucket(this.buckets.hour, String(entry.environment.hour), entry.performance, cap);
    appendToBucket(this.buckets.weekday, String(entry.environment.weekday), entry.performance, cap);
    appendToBucket(this.buckets.month, String(entry.environment.month), entry.performance, cap);

    this.persist();
    this.announceOptimalTimes();
    return entry;
  }

  /**
   * Hours need at least 3 samples averaging above 70,
   * weekdays at least 2 averaging above 65
   */
  detectOptimalTime(): OptimalTimes {
    const hour = topQualifier(this.buckets.hour, OPTIMAL_HOUR);
    const weekday = topQualifier(this.buckets.weekday, OPTIMAL_WEEKDAY);

    return {
      hour: hour && {
        dimension: 'hour',
        value: hour.value,
        label: formatHour(hour.value),
        averagePerformance: round1(hour.average),
        samples: hour.samples,
      },
      weekday: weekday && {
        dimension: 'weekday',
        value: weekday.value,
        label: WEEKDAY_NAMES[weekday.value] ?? String(weekday.value),
        averagePerformance: round1(weekday.average),
        samples: weekday.samples,
      },
    };
  }

  getInsights(lookbackDays: number = 30): AnalysisResult<EnvironmentInsights> {
    const cutoff = subDays(this.clock(), lookbackDays).getTime();
    return this.summarize(
      this.records.filter((record) => record.timestamp.getTime() >= cutoff),
      lookbackDays
    );
  }

  /**
   * Insights over the records whose session started within [start, end)
   */
  getInsightsForRange(range: DateRange): AnalysisResult<EnvironmentInsights> {
    return this.summarize(this.recordsIn(range), Math.max(1, differenceInCalendarDays(range.end, range.start)));
  }

  private summarize(recent: readonly EnvironmentRecord[], lookbackDays: number): AnalysisResult<EnvironmentInsights> {
    if (recent.length < MIN_INSIGHT_SESSIONS) {
      return insufficientData(MIN_INSIGHT_SESSIONS, recent.length, 'environment insights');
    }

    const timePeriods = groupBy(recent, (record) => record.environment.timePeriod, TIME_PERIOD_ORDER);
    const bestTimePeriod = timePeriods.reduce<GroupPerformance<TimePeriod> | null>(
      (best, group) => (!best || group.averagePerformance > best.averagePerformance ? group : best),
      null
    );

    const weekday = recent.filter((record) => !record.environment.isWeekend).map((record) => record.performance);
    const weekend = recent.filter((record) => record.environment.isWeekend).map((record) => record.performance);
    const weekdayAverage = weekday.length > 0 ? round1(mean(weekday)) : null;
    const weekendAverage = weekend.length > 0 ? round1(mean(weekend)) : null;

    const recommendations: string[] = [];
    if (bestTimePeriod) {
      recommendations.push(
        `Your best results come in the ${bestTimePeriod.key} (average ${bestTimePeriod.averagePerformance}). Schedule demanding work then.`
      );
    }
    if (weekdayAverage !== null && weekendAverage !== null) {
      const difference = round1(Math.abs(weekdayAverage - weekendAverage));
      if (difference > WEEKEND_DIFFERENCE_NOTE) {
        const better = weekdayAverage > weekendAverage ? 'weekdays' : 'weekends';
        recommendations.push(`You perform ${difference} points better on ${better}.`);
      } else {
        recommendations.push('Weekday and weekend performance are similar.');
      }
    }

    return ok({
      lookbackDays,
      sessions: recent.length,
      timePeriods,
      bestTimePeriod,
      weekdayAverage,
      weekendAverage,
      recommendations,
    });
  }

  /**
   * Mean performance per (weekday, hour) over the most recent records, optionally within a range.
   * Cells with a single sample are left out.
   */
  getHeatmap(range?: DateRange): HeatmapCell[] {
    const cells = new Map<string, { weekday: number; hour: number; values: number[] }>();
    for (const record of this.recordsIn(range).slice(-HEATMAP_RECORDS)) {
      const { weekday, hour } = record.environment;
      const key = `${weekday}:${hour}`;
      const cell = cells.get(key) ?? { weekday, hour, values: [] };
      cell.values.push(record.performance);
      cells.set(key, cell);
    }

    return [...cells.values()]
      .filter((cell) => cell.values.length >= 2)
      .map((cell) => ({
        weekday: cell.weekday,
        hour: cell.hour,
        averagePerformance: round1(mean(cell.values)),
        samples: cell.values.length,
      }))
      .sort((a, b) => a.weekday - b.weekday || a.hour - b.hour);
  }

  getSeasonalPerformance(range?: DateRange): GroupPerformance<Season>[] {
    return groupBy(this.recordsIn(range), (record) => record.environment.season, SEASON_ORDER);
  }

  getRecords(): EnvironmentRecord[] {
    return [...this.records];
  }

  getBuckets(dimension: BucketDimension): Record<string, number[]> {
    const copy: Record<string, number[]> = {};
    for (const [key, values] of Object.entries(this.buckets[dimension])) {
      copy[key] = [...values];
    }
    return copy;
  }

  detach(): void {
    this.unsubscribe();
  }

  private recordsIn(range?: DateRange): EnvironmentRecord[] {
    if (!range) {
      return this.records;
    }
    const start = range.start.getTime();
    const end = range.end.getTime();
    return this.records.filter((record) => {
      const time = record.timestamp.getTime();
      return time >= start && time < end;
    });
  }

  private announceOptimalTimes(): void {
    const optimal = this.detectOptimalTime();

    for (const found of [optimal.hour, optimal.weekday]) {
      if (!found || this.lastOptimal[found.dimension] === found.value) {
        continue;
      }
      this.lastOptimal[found.dimension] = found.value;
      this.log.debug(`Optimal ${found.dimension}: ${found.label} (${found.averagePerformance})`);
      this.emit('optimalTimeDetected', found);
    }
  }

  private load(): void {
    const document = loadSnapshot<EnvironmentDocument>(this.snapshots, SNAPSHOT, this.log);
    if (!document || !Array.isArray(document.records)) {
      return;
    }

    this.records = document.records
      .map((raw): EnvironmentRecord | null => {
        const timestamp = reviveDate(raw.timestamp);
        return timestamp ? { ...raw, timestamp, environment: { ...raw.environment } } : null;
      })
      .filter((record): record is EnvironmentRecord => record !== null)
      .slice(-this.config.environmentRecordCap);

    const buckets = document.buckets ?? emptyBuckets();
    this.buckets = {
      hour: buckets.hour ?? {},
      weekday: buckets.weekday ?? {},
      month: buckets.month ?? {},
    };

    const optimal = this.detectOptimalTime();
    this.lastOptimal = { hour: optimal.hour?.value ?? null, weekday: optimal.weekday?.value ?? null };
  }

  private persist(): void {
    persistSnapshot(
      this.snapshots,
      SNAPSHOT,
      { records: this.records, buckets: this.buckets, lastUpdated: this.clock().toISOString() },
      this.log
    );
  }
}
