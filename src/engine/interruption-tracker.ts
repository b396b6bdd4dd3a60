import { DateRange, InterruptionEvent, SessionRecord, Severity } from '../types/session';
import { EngineConfig, ResolvedConfig } from '../types/config';
import { AnalysisResult, insufficientData, ok } from '../types/analysis';
import { SnapshotStore } from '../db/database';
import { loadSnapshot, persistSnapshot, reviveDate, Serialized } from '../db/snapshot';
import { resolveConfig } from '../utils/config';
import { Clock, secondsBetween, systemClock } from '../utils/clock';
import { appendCapped } from '../utils/bounded';
import { TypedEmitter } from '../utils/events';
import { logger } from '../utils/logger';
import { mean, round1 } from '../utils/stats';
import { SessionEventStore } from './session-store';
import { externalSeverity, externalType } from './severity';
import { formatHour } from './environment-tag';

export type TrackerState = 'idle' | 'active' | 'paused';

/**
 * Per-session interruption counts kept for cross-session mining
 */
export interface InterruptionSummary {
  sessionId: string;
  startTime: Date;
  hour: number;
  total: number;
  byType: Record<string, number>;
  totalDurationSeconds: number;
}

export type InterruptionPattern =
  | {
      kind: 'frequency';
      averagePerSession: number;
      sessionsConsidered: number;
      message: string;
    }
  | {
      kind: 'dominant_type';
      type: string;
      occurrences: number;
      sessions: number;
      message: string;
      recommendation: string;
    }
  | {
      kind: 'time_of_day';
      hour: number;
      averagePerSession: number;
      sessions: number;
      message: string;
    };

export interface InterruptionStatistics {
  sessions: number;
  total: number;
  averagePerSession: number;
  averageDurationSeconds: number;
  sessionsWithInterruptions: number;
  byType: Record<string, number>;
  bySeverity: Record<Severity, number>;
}

export interface InterruptionTrackerEvents {
  interruptionDetected: InterruptionEvent;
  patternDetected: InterruptionPattern;
  stateChanged: { previous: TrackerState; current: TrackerState };
}

export interface InterruptionTrackerOptions {
  snapshots?: SnapshotStore | null;
  config?: EngineConfig;
  clock?: Clock;
}

interface InterruptionHistoryDocument {
  history: Serialized<InterruptionSummary>[];
  lastUpdated: string;
}

const SNAPSHOT = 'interruption_history';
const MIN_SESSIONS_FOR_PATTERNS = 3;
const FREQUENCY_WINDOW = 5;
const FREQUENCY_ALERT_THRESHOLD = 5;
const TIME_OF_DAY_ALERT_THRESHOLD = 4;

const TYPE_RECOMMENDATIONS: Record<string, string> = {
  manual_pause: 'You pause often. Plan a short break before starting so the session can run uninterrupted.',
  inactivity: 'Long idle stretches are common. Try shorter sessions or a clearer first task.',
  'external:phone_call': 'Calls break your sessions most. Set your phone to do-not-disturb while the timer runs.',
  'external:urgent_message': 'Urgent messages interrupt you most. Agree on response windows with your team.',
  'external:notification': 'Notifications interrupt you most. Mute them during focus sessions.',
};

function recommendationFor(type: string): string {
  return TYPE_RECOMMENDATIONS[type]
    ?? `"${type}" interruptions dominate. Find a way to batch or defer them until a break.`;
}

function emptySeverityCounts(): Record<Severity, number> {
  return { low: 0, medium: 0, high: 0 };
}

/**
 * Detects and classifies interruptions for the active session,
 * and mines interruption patterns across sessions.
 */
export class InterruptionTracker extends TypedEmitter<InterruptionTrackerEvents> {
  private readonly config: ResolvedConfig;
  private readonly clock: Clock;
  private readonly snapshots: SnapshotStore | null;

  private state: TrackerState = 'idle';
  private pauseStartedAt: Date | null = null;
  private lastActivityAt: Date | null = null;
  private watchdog: NodeJS.Timeout | null = null;
  private history: InterruptionSummary[] = [];
  private readonly unsubscribers: Array<() => void>;

  constructor(
    private readonly store: SessionEventStore,
    options: InterruptionTrackerOptions = {}
  ) {
    super(logger.scoped('interruptions'));
    this.config = resolveConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.snapshots = options.snapshots ?? null;
    this.load();

    this.unsubscribers = [
      store.on('sessionStarted', () => this.onSessionStarted()),
      store.on('interaction', () => {
        this.recordUserActivity();
      }),
      store.on('interruptionRecorded', ({ interruption }) => this.emit('interruptionDetected', interruption)),
      store.on('sessionEnding', () => this.onSessionEnding()),
      store.on('sessionFinalized', (record) => this.onSessionFinalized(record)),
    ];
  }

  getState(): TrackerState {
    return this.state;
  }

  /**
   * active -> paused. Returns false if no session is running.
   */
  recordPauseStart(): boolean {
    if (this.state !== 'active') {
      return false;
    }

    this.pauseStartedAt = this.clock();
    this.setState('paused');
    return true;
  }

  /**
   * paused -> active. Pauses of at least minPauseSeconds are committed; shorter ones are dropped.
   */
  recordPauseEnd(): InterruptionEvent | null {
    if (this.state !== 'paused' || !this.pauseStartedAt) {
      return null;
    }

    const startedAt = this.pauseStartedAt;
    const now = this.clock();
    const duration = secondsBetween(startedAt, now);

    this.pauseStartedAt = null;
    this.lastActivityAt = now;
    this.setState('active');

    if (duration < this.config.minPauseSeconds) {
      this.log.debug(`Dropping ${duration.toFixed(1)}s pause, below threshold`);
      return null;
    }

    return this.store.recordInterruption('manual_pause', duration, { startedAt });
  }

  /**
   * Any user activity marks the session active and closes an open pause
   */
  recordUserActivity(): InterruptionEvent | null {
    if (this.state === 'idle') {
      return null;
    }

    if (this.state === 'paused') {
      return this.recordPauseEnd();
    }

    this.lastActivityAt = this.clock();
    return null;
  }

  /**
   * Commit an interruption reported by another part of the application.
   * phone_call and urgent_message are high severity, anything else medium.
   */
  recordExternalInterruption(kind: string, description?: string, durationSeconds: number = 0): InterruptionEvent | null {
    return this.store.recordInterruption(externalType(kind), durationSeconds, {
      severity: externalSeverity(kind),
      description,
    });
  }

  /**
   * Watchdog check: commit an inactivity interruption once per idle gap
   */
  checkInactivity(): InterruptionEvent | null {
    if (this.state !== 'active' || !this.lastActivityAt) {
      return null;
    }

    const now = this.clock();
    const gap = secondsBetween(this.lastActivityAt, now);
    if (gap < this.config.inactivityThresholdSeconds) {
      return null;
    }

    const startedAt = this.lastActivityAt;
    this.lastActivityAt = now;
    this.log.debug(`Inactive for ${Math.round(gap)}s`);
    return this.store.recordInterruption('inactivity', gap, { startedAt });
  }

  /**
   * Cross-session interruption patterns.
   * Needs at least three sessions of history.
   */
  minePatterns(): AnalysisResult<InterruptionPattern[]> {
    if (this.history.length < MIN_SESSIONS_FOR_PATTERNS) {
      return insufficientData(MIN_SESSIONS_FOR_PATTERNS, this.history.length, 'interruption pattern mining');
    }

    const patterns: InterruptionPattern[] = [];

    const recent = this.history.slice(-FREQUENCY_WINDOW);
    const recentAverage = mean(recent.map((entry) => entry.total));
    if (recentAverage > FREQUENCY_ALERT_THRESHOLD) {
      patterns.push({
        kind: 'frequency',
        averagePerSession: round1(recentAverage),
        sessionsConsidered: recent.length,
        message: `High interruption rate: ${round1(recentAverage)} per session over the last ${recent.length} sessions`,
      });
    }

    const typeTotals: Record<string, number> = {};
    for (const entry of this.history) {
      for (const [type, count] of Object.entries(entry.byType)) {
        typeTotals[type] = (typeTotals[type] ?? 0) + count;
      }
    }
    const dominant = Object.entries(typeTotals)
      .filter(([, count]) => count >= this.history.length * 2)
      .sort((a, b) => b[1] - a[1])[0];
    if (dominant) {
      const [type, occurrences] = dominant;
      patterns.push({
        kind: 'dominant_type',
        type,
        occurrences,
        sessions: this.history.length,
        message: `"${type}" accounts for ${occurrences} interruptions across ${this.history.length} sessions`,
        recommendation: recommendationFor(type),
      });
    }

    const byHour = new Map<number, number[]>();
    for (const entry of this.history) {
      const totals = byHour.get(entry.hour) ?? [];
      totals.push(entry.total);
      byHour.set(entry.hour, totals);
    }
    for (const [hour, totals] of [...byHour.entries()].sort((a, b) => a[0] - b[0])) {
      const average = mean(totals);
      if (totals.length >= 2 && average > TIME_OF_DAY_ALERT_THRESHOLD) {
        patterns.push({
          kind: 'time_of_day',
          hour,
          averagePerSession: round1(average),
          sessions: totals.length,
          message: `Sessions starting around ${formatHour(hour)} average ${round1(average)} interruptions`,
        });
      }
    }

    return ok(patterns);
  }

  /**
   * Interruption totals over finalized sessions, optionally limited to a range
   */
  getStatistics(range?: DateRange): InterruptionStatistics {
    const sessions = range ? this.store.getSessionsInRange(range) : this.store.getHistory();
    const byType: Record<string, number> = {};
    const bySeverity = emptySeverityCounts();
    const durations: number[] = [];
    let sessionsWithInterruptions = 0;

    for (const session of sessions) {
      if (session.interruptions.length > 0) {
        sessionsWithInterruptions += 1;
      }
      for (const interruption of session.interruptions) {
        byType[interruption.type] = (byType[interruption.type] ?? 0) + 1;
        bySeverity[interruption.severity] += 1;
        durations.push(interruption.durationSeconds);
      }
    }

    return {
      sessions: sessions.length,
      total: durations.length,
      averagePerSession: sessions.length > 0 ? round1(durations.length / sessions.length) : 0,
      averageDurationSeconds: round1(mean(durations)),
      sessionsWithInterruptions,
      byType,
      bySeverity,
    };
  }

  getHistory(): InterruptionSummary[] {
    return this.history.map((entry) => ({ ...entry, byType: { ...entry.byType } }));
  }

  dispose(): void {
    this.stopWatchdog();
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
  }

  private onSessionStarted(): void {
    this.pauseStartedAt = null;
    this.lastActivityAt = this.clock();
    this.setState('active');
    this.startWatchdog();
  }

  private onSessionEnding(): void {
    if (this.state === 'paused') {
      this.recordPauseEnd();
    }
    this.stopWatchdog();
  }

  private onSessionFinalized(record: SessionRecord): void {
    this.setState('idle');
    this.lastActivityAt = null;

    const byType: Record<string, number> = {};
    for (const interruption of record.interruptions) {
      byType[interruption.type] = (byType[interruption.type] ?? 0) + 1;
    }

    appendCapped(
      this.history,
      {
        sessionId: record.sessionId,
        startTime: record.startTime,
        hour: record.environment.hour,
        total: record.interruptions.length,
        byType,
        totalDurationSeconds: record.interruptions.reduce((total, event) => total + event.durationSeconds, 0),
      },
      this.config.interruptionHistoryCap
    );
    this.persist();

    const result = this.minePatterns();
    if (result.status === 'ok') {
      for (const pattern of result.data) {
        this.log.debug(pattern.message);
        this.emit('patternDetected', pattern);
      }
    }
  }

  private setState(next: TrackerState): void {
    if (next === this.state) {
      return;
    }
    const previous = this.state;
    this.state = next;
    this.emit('stateChanged', { previous, current: next });
  }

  private startWatchdog(): void {
    this.stopWatchdog();
    this.watchdog = setInterval(() => {
      this.checkInactivity();
    }, this.config.watchdogIntervalSeconds * 1000);
    this.watchdog.unref();
  }

  private stopWatchdog(): void {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
  }

  private load(): void {
    const document = loadSnapshot<InterruptionHistoryDocument>(this.snapshots, SNAPSHOT, this.log);
    if (!document || !Array.isArray(document.history)) {
      return;
    }

    this.history = document.history
      .map((entry): InterruptionSummary | null => {
        const startTime = reviveDate(entry.startTime);
        return startTime ? { ...entry, startTime, byType: { ...entry.byType } } : null;
      })
      .filter((entry): entry is InterruptionSummary => entry !== null)
      .slice(-this.config.interruptionHistoryCap);
  }

  private persist(): void {
    persistSnapshot(
      this.snapshots,
      SNAPSHOT,
      { history: this.history, lastUpdated: this.clock().toISOString() },
      this.log
    );
  }
}
