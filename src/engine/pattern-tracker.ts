import { subDays } from 'date-fns';
import { SessionRecord } from '../types/session';
import { EngineConfig, ResolvedConfig } from '../types/config';
import { AnalysisResult, insufficientData, ok } from '../types/analysis';
import { SnapshotStore } from '../db/database';
import { loadSnapshot, persistSnapshot } from '../db/snapshot';
import { resolveConfig } from '../utils/config';
import { Clock, systemClock } from '../utils/clock';
import { getDateKey } from '../utils/date';
import { appendCapped } from '../utils/bounded';
import { TypedEmitter } from '../utils/events';
import { logger } from '../utils/logger';
import { clamp, mean, round1 } from '../utils/stats';
import { SessionEventStore } from './session-store';
import { formatHour } from './environment-tag';
import { TrendDirection } from '../reports/calculators/trends';

export type SessionPattern =
  | {
      kind: 'optimal_hour';
      hour: number;
      averageEfficiency: number;
      sessions: number;
      message: string;
    }
  | {
      kind: 'efficiency_trend';
      direction: 'improving' | 'declining';
      recentAverage: number;
      previousAverage: number;
      message: string;
    }
  | {
      kind: 'interruption_frequency';
      averagePerSession: number;
      shareAboveThreshold: number;
      message: string;
    };

export interface ProductivityTrendPoint {
  /** yyyy-MM-dd */
  date: string;
  score: number;
  sessionsCount: number;
}

export interface TrendClassification {
  efficiency: TrendDirection;
  focus: TrendDirection;
  recentSessions: number;
  previousSessions: number;
}

export interface PatternTrackerEvents {
  patternDetected: SessionPattern;
  trendUpdated: ProductivityTrendPoint;
}

export interface PatternTrackerOptions {
  snapshots?: SnapshotStore | null;
  config?: EngineConfig;
  clock?: Clock;
}

interface TrendDocument {
  points: ProductivityTrendPoint[];
  lastUpdated: string;
}

const SNAPSHOT = 'productivity_trend';
const MIN_SESSIONS_FOR_PATTERNS = 5;
const MIN_SESSIONS_FOR_TREND = 3;
const RECENT_SESSIONS = 5;
const TREND_DIFFERENCE = 10;
const OPTIMAL_HOUR = { minSessions: 3, minEfficiency: 75 };
const INTERRUPTION_THRESHOLD = 3;

/**
 * Day-level productivity: completion rate (30 points), efficiency (40%) and focus (30%)
 */
export function calculateCompositeProductivity(sessions: readonly SessionRecord[]): number {
  if (sessions.length === 0) {
    return 0;
  }

  const completionRate = sessions.filter((session) => session.completed).length / sessions.length;
  const efficiency = mean(sessions.map((session) => session.efficiencyScore));
  const focus = mean(sessions.map((session) => session.focusScore));

  return round1(clamp(completionRate * 30 + efficiency * 0.4 + focus * 0.3, 0, 100));
}

/**
 * Compare the mean of the last five values against the mean of the rest
 */
function recentVersusRest(values: readonly number[]): { direction: TrendDirection; recent: number; previous: number } | null {
  if (values.length <= RECENT_SESSIONS) {
    return null;
  }

  const recent = mean(values.slice(-RECENT_SESSIONS));
  const previous = mean(values.slice(0, -RECENT_SESSIONS));
  const difference = recent - previous;

  let direction: TrendDirection = 'stable';
  if (difference > TREND_DIFFERENCE) {
    direction = 'improving';
  } else if (difference < -TREND_DIFFERENCE) {
    direction = 'declining';
  }

  return { direction, recent: round1(recent), previous: round1(previous) };
}

/**
 * Mines recurring patterns from recent work sessions and keeps the
 * day-level productivity trend.
 */
export class SessionPatternTracker extends TypedEmitter<PatternTrackerEvents> {
  private readonly config: ResolvedConfig;
  private readonly clock: Clock;
  private readonly snapshots: SnapshotStore | null;

  private history: SessionRecord[] = [];
  private readonly byDate = new Map<string, SessionRecord[]>();
  private trend: ProductivityTrendPoint[] = [];
  private readonly unsubscribe: () => void;

  constructor(store: SessionEventStore, options: PatternTrackerOptions = {}) {
    super(logger.scoped('patterns'));
    this.config = resolveConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.snapshots = options.snapshots ?? null;

    for (const record of store.getHistory()) {
      this.addToHistory(record);
    }
    this.load();

    this.unsubscribe = store.on('sessionFinalized', (record) => {
      this.recordSession(record);
    });
  }

  /**
   * Take in a finalized session, then mine patterns and refresh today's trend point
   */
  recordSession(record: SessionRecord): void {
    this.addToHistory(record);
    if (this.history.length < MIN_SESSIONS_FOR_PATTERNS) {
      return;
    }

    const window = this.windowSessions();
    for (const pattern of this.minePatterns(window)) {
      this.log.debug(pattern.message);
      this.emit('patternDetected', pattern);
    }

    if (window.length >= MIN_SESSIONS_FOR_TREND) {
      this.updateTrend(window);
    }
  }

  /**
   * Patterns over the trailing window of work sessions.
   * Needs five sessions of history.
   */
  getPatterns(): AnalysisResult<SessionPattern[]> {
    if (this.history.length < MIN_SESSIONS_FOR_PATTERNS) {
      return insufficientData(MIN_SESSIONS_FOR_PATTERNS, this.history.length, 'session pattern mining');
    }
    return ok(this.minePatterns(this.windowSessions()));
  }

  /**
   * Direction of efficiency and focus: last five work sessions against the earlier ones
   */
  getTrendClassification(): AnalysisResult<TrendClassification> {
    const work = this.history.filter((session) => session.type === 'work');
    if (work.length < MIN_SESSIONS_FOR_PATTERNS) {
      return insufficientData(MIN_SESSIONS_FOR_PATTERNS, work.length, 'trend classification');
    }

    const efficiency = recentVersusRest(work.map((session) => session.efficiencyScore));
    const focus = recentVersusRest(work.map((session) => session.focusScore));
    const recentSessions = Math.min(RECENT_SESSIONS, work.length);

    return ok({
      efficiency: efficiency?.direction ?? 'stable',
      focus: focus?.direction ?? 'stable',
      recentSessions,
      previousSessions: work.length - recentSessions,
    });
  }

  getProductivityTrend(): ProductivityTrendPoint[] {
    return this.trend.map((point) => ({ ...point }));
  }

  getSessionsForDate(dateKey: string): SessionRecord[] {
    return [...(this.byDate.get(dateKey) ?? [])];
  }

  detach(): void {
    this.unsubscribe();
  }

  private addToHistory(record: SessionRecord): void {
    const evicted = appendCapped(this.history, record, this.config.maxSessionHistory);
    for (const old of evicted) {
      this.removeFromIndex(old);
    }

    const key = getDateKey(record.startTime);
    const day = this.byDate.get(key) ?? [];
    day.push(record);
    this.byDate.set(key, day);
  }

  private removeFromIndex(record: SessionRecord): void {
    const key = getDateKey(record.startTime);
    const remaining = (this.byDate.get(key) ?? []).filter((session) => session !== record);
    if (remaining.length > 0) {
      this.byDate.set(key, remaining);
    } else {
      this.byDate.delete(key);
    }
  }

  private windowSessions(): SessionRecord[] {
    const cutoff = subDays(this.clock(), this.config.patternWindowDays).getTime();
    return this.history.filter(
      (session) => session.type === 'work' && session.startTime.getTime() >= cutoff
    );
  }

  private minePatterns(window: readonly SessionRecord[]): SessionPattern[] {
    const patterns: SessionPattern[] = [];

    const byHour = new Map<number, number[]>();
    for (const session of window) {
      const values = byHour.get(session.environment.hour) ?? [];
      values.push(session.efficiencyScore);
      byHour.set(session.environment.hour, values);
    }
    for (const [hour, values] of [...byHour.entries()].sort((a, b) => a[0] - b[0])) {
      const average = mean(values);
      if (values.length >= OPTIMAL_HOUR.minSessions && average > OPTIMAL_HOUR.minEfficiency) {
        patterns.push({
          kind: 'optimal_hour',
          hour,
          averageEfficiency: round1(average),
          sessions: values.length,
          message: `Sessions starting around ${formatHour(hour)} average ${round1(average)} efficiency`,
        });
      }
    }

    const efficiency = recentVersusRest(window.map((session) => session.efficiencyScore));
    if (efficiency && efficiency.direction !== 'stable') {
      patterns.push({
        kind: 'efficiency_trend',
        direction: efficiency.direction,
        recentAverage: efficiency.recent,
        previousAverage: efficiency.previous,
        message: `Efficiency is ${efficiency.direction}: ${efficiency.previous} -> ${efficiency.recent}`,
      });
    }

    if (window.length > 0) {
      const counts = window.map((session) => session.interruptions.length);
      const average = mean(counts);
      const share = counts.filter((count) => count > INTERRUPTION_THRESHOLD).length / counts.length;
      if (average > INTERRUPTION_THRESHOLD && share > 0.5) {
        patterns.push({
          kind: 'interruption_frequency',
          averagePerSession: round1(average),
          shareAboveThreshold: round1(share * 100),
          message: `${round1(share * 100)}% of recent sessions had more than ${INTERRUPTION_THRESHOLD} interruptions`,
        });
      }
    }

    return patterns;
  }

  /**
   * One point per day: a later recomputation replaces today's point
   */
  private updateTrend(window: readonly SessionRecord[]): void {
    const point: ProductivityTrendPoint = {
      date: getDateKey(this.clock()),
      score: calculateCompositeProductivity(window),
      sessionsCount: window.length,
    };

    const last = this.trend[this.trend.length - 1];
    if (last && last.date === point.date) {
      this.trend[this.trend.length - 1] = point;
    } else {
      appendCapped(this.trend, point, this.config.trendPointCap);
    }

    persistSnapshot(
      this.snapshots,
      SNAPSHOT,
      { points: this.trend, lastUpdated: this.clock().toISOString() },
      this.log
    );
    this.emit('trendUpdated', { ...point });
  }

  private load(): void {
    const document = loadSnapshot<TrendDocument>(this.snapshots, SNAPSHOT, this.log);
    if (!document || !Array.isArray(document.points)) {
      return;
    }
    this.trend = document.points
      .filter((point) => typeof point.date === 'string' && typeof point.score === 'number')
      .slice(-this.config.trendPointCap);
  }
}
