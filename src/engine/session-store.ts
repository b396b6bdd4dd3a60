import { format, subDays } from 'date-fns';
import {
  ActiveSession,
  DateRange,
  FocusSample,
  InteractionDetails,
  InteractionEvent,
  InterruptionEvent,
  InterruptionType,
  PeriodStats,
  SessionRecord,
  SessionType,
  Severity,
} from '../types/session';
import { EngineConfig, ResolvedConfig } from '../types/config';
import { NotFoundError } from '../types/errors';
import { SnapshotStore } from '../db/database';
import { loadSnapshot, persistSnapshot, reviveDate, Serialized } from '../db/snapshot';
import { resolveConfig } from '../utils/config';
import { Clock, secondsBetween, systemClock } from '../utils/clock';
import { getDateKey, getWeekKey, isWithinRange } from '../utils/date';
import { sanitizePlannedMinutes } from '../utils/duration';
import { appendCapped } from '../utils/bounded';
import { TypedEmitter } from '../utils/events';
import { logger } from '../utils/logger';
import { round1, nonNegative } from '../utils/stats';
import { calculateTickScore, meanSampleScore } from './focus-score';
import { buildEnvironmentTag } from './environment-tag';
import { classifySeverity } from './severity';

export interface SessionStoreEvents {
  sessionStarted: Readonly<ActiveSession>;
  sample: { session: Readonly<ActiveSession>; sample: FocusSample };
  interaction: { session: Readonly<ActiveSession>; interaction: InteractionEvent };
  interruptionRecorded: { session: Readonly<ActiveSession>; interruption: InterruptionEvent };
  /** Fired before scores are computed, while the session can still be written to */
  sessionEnding: Readonly<ActiveSession>;
  sessionFinalized: SessionRecord;
}

export interface SessionStoreOptions {
  snapshots?: SnapshotStore | null;
  config?: EngineConfig;
  clock?: Clock;
}

export interface StatsSummary {
  today: PeriodStats & { productivityScore: number };
  week: PeriodStats;
  total: { sessions: number; workMinutes: number; longestStreak: number };
}

export interface HistoryExport {
  exportDate: string;
  sessions: SessionRecord[];
  dailyStats: Record<string, PeriodStats>;
  weeklyStats: Record<string, PeriodStats>;
  summary: StatsSummary;
}

interface SessionHistoryDocument {
  sessions: Serialized<SessionRecord>[];
  dailyStats: Record<string, PeriodStats>;
  weeklyStats: Record<string, PeriodStats>;
  lastUpdated: string;
}

const SNAPSHOT = 'session_history';

/**
 * Plan adherence: share of the planned duration actually run,
 * reduced 10% per interruption down to half.
 */
export function calculateEfficiencyScore(
  actualDurationSeconds: number,
  plannedDurationMinutes: number,
  interruptionCount: number
): number {
  const plannedSeconds = plannedDurationMinutes * 60;
  const durationRatio = plannedSeconds > 0 ? Math.min(1, nonNegative(actualDurationSeconds) / plannedSeconds) : 0;
  const interruptionFactor = Math.max(0.5, 1 - 0.1 * nonNegative(interruptionCount));
  return round1(durationRatio * interruptionFactor * 100);
}

function emptyStats(key: string): PeriodStats {
  return { key, workSessions: 0, breakSessions: 0, workMinutes: 0, breakMinutes: 0, completedSessions: 0 };
}

function addToPeriod(bucket: Record<string, PeriodStats>, key: string, record: SessionRecord): void {
  const stats = bucket[key] ?? emptyStats(key);
  const minutes = record.actualDurationSeconds / 60;

  if (record.type === 'work') {
    stats.workSessions += 1;
    stats.workMinutes = round1(stats.workMinutes + minutes);
  } else {
    stats.breakSessions += 1;
    stats.breakMinutes = round1(stats.breakMinutes + minutes);
  }
  if (record.completed) {
    stats.completedSessions += 1;
  }

  bucket[key] = stats;
}

function freezeRecord(record: SessionRecord): SessionRecord {
  return Object.freeze({
    ...record,
    interactions: Object.freeze(record.interactions.map((event) => Object.freeze({ ...event }))),
    interruptions: Object.freeze(record.interruptions.map((event) => Object.freeze({ ...event }))),
    focusSamples: Object.freeze(record.focusSamples.map((sample) => Object.freeze({ ...sample }))),
    environment: Object.freeze({ ...record.environment }),
  });
}

function reviveSession(raw: Serialized<SessionRecord>): SessionRecord | null {
  const startTime = reviveDate(raw.startTime);
  const endTime = reviveDate(raw.endTime);
  if (!startTime || !endTime) {
    return null;
  }

  return freezeRecord({
    sessionId: raw.sessionId,
    type: raw.type,
    plannedDurationMinutes: raw.plannedDurationMinutes,
    startTime,
    endTime,
    actualDurationSeconds: raw.actualDurationSeconds,
    completed: raw.completed,
    focusScore: raw.focusScore,
    efficiencyScore: raw.efficiencyScore,
    interactions: (raw.interactions ?? []).map((event) => ({
      ...event,
      timestamp: reviveDate(event.timestamp) ?? startTime,
    })),
    interruptions: (raw.interruptions ?? []).map((event) => ({
      ...event,
      timestamp: reviveDate(event.timestamp) ?? startTime,
    })),
    focusSamples: (raw.focusSamples ?? []).map((sample) => ({
      ...sample,
      timestamp: reviveDate(sample.timestamp) ?? startTime,
    })),
    environment: raw.environment ?? buildEnvironmentTag(startTime),
  });
}

/**
 * Records session lifecycle events and periodic focus samples,
 * and owns the finalized session history.
 */
export class SessionEventStore extends TypedEmitter<SessionStoreEvents> {
  private readonly config: ResolvedConfig;
  private readonly clock: Clock;
  private readonly snapshots: SnapshotStore | null;

  private active: ActiveSession | null = null;
  private sampler: NodeJS.Timeout | null = null;
  private history: SessionRecord[] = [];
  private dailyStats: Record<string, PeriodStats> = {};
  private weeklyStats: Record<string, PeriodStats> = {};
  private sequence = 0;

  constructor(options: SessionStoreOptions = {}) {
    super(logger.scoped('sessions'));
    this.config = resolveConfig(options.config);
    this.clock = options.clock ?? systemClock;
    this.snapshots = options.snapshots ?? null;
    this.load();
  }

  /**
   * Begin a session. A session already in progress is ended as not completed.
   */
  startSession(type: SessionType, plannedDurationMinutes: number): Readonly<ActiveSession> {
    if (this.active) {
      this.log.warning(`Session ${this.active.sessionId} still active, ending it as incomplete`);
      this.endSession(false);
    }

    const startTime = this.clock();
    this.sequence += 1;

    const session: ActiveSession = {
      sessionId: `${type}-${format(startTime, 'yyyyMMdd-HHmmss')}-${this.sequence}`,
      type,
      plannedDurationMinutes: sanitizePlannedMinutes(type, plannedDurationMinutes, this.config),
      startTime,
      interactions: [],
      interruptions: [],
      focusSamples: [],
      environment: buildEnvironmentTag(startTime),
    };

    this.active = session;
    this.startSampler();

    this.log.debug(`Started ${type} session ${session.sessionId} (${session.plannedDurationMinutes}m planned)`);
    this.emit('sessionStarted', session);
    return session;
  }

  /**
   * Append an interaction to the active session; null when idle
   */
  recordInteraction(type: string, details?: InteractionDetails): InteractionEvent | null {
    const session = this.active;
    if (!session) {
      this.log.debug(`Ignoring ${type} interaction, no active session`);
      return null;
    }

    const timestamp = this.clock();
    const interaction: InteractionEvent = {
      timestamp,
      type,
      details,
      sessionTimeSeconds: Math.round(secondsBetween(session.startTime, timestamp)),
    };

    session.interactions.push(interaction);
    this.emit('interaction', { session, interaction });
    return interaction;
  }

  /**
   * Append an interruption to the active session; null when idle.
   * Severity follows the duration unless one is given.
   */
  recordInterruption(
    type: InterruptionType,
    durationSeconds: number,
    options: { severity?: Severity; description?: string; startedAt?: Date } = {}
  ): InterruptionEvent | null {
    const session = this.active;
    if (!session) {
      this.log.debug(`Ignoring ${type} interruption, no active session`);
      return null;
    }

    const sanitized = nonNegative(durationSeconds);
    if (sanitized !== durationSeconds) {
      this.log.warning(`Interruption duration ${durationSeconds} is invalid, recording 0 seconds`);
    }
    const duration = Math.round(sanitized);

    const timestamp = options.startedAt ?? this.clock();
    const interruption: InterruptionEvent = {
      type,
      timestamp,
      sessionTimeSeconds: Math.round(secondsBetween(session.startTime, timestamp)),
      durationSeconds: duration,
      severity: options.severity ?? classifySeverity(duration),
    };
    if (options.description) {
      interruption.description = options.description;
    }

    session.interruptions.push(interruption);
    this.emit('interruptionRecorded', { session, interruption });
    return interruption;
  }

  /**
   * Finalize the active session and append it to history.
   * Returns null when no session is active, so repeated calls are harmless.
   */
  endSession(completed: boolean): SessionRecord | null {
    const session = this.active;
    if (!session) {
      this.log.debug('endSession called with no active session');
      return null;
    }

    this.emit('sessionEnding', session);
    this.stopSampler();
    this.active = null;

    const endTime = this.clock();
    const actualDurationSeconds = Math.round(secondsBetween(session.startTime, endTime));

    if (session.focusSamples.length === 0) {
      session.focusSamples.push({
        timestamp: endTime,
        score: calculateTickScore({
          elapsedMinutes: actualDurationSeconds / 60,
          interruptionCount: session.interruptions.length,
          interactionCount: session.interactions.length,
        }),
      });
    }

    const record = freezeRecord({
      ...session,
      endTime,
      actualDurationSeconds,
      completed,
      focusScore: meanSampleScore(session.focusSamples.map((sample) => sample.score)),
      efficiencyScore: calculateEfficiencyScore(
        actualDurationSeconds,
        session.plannedDurationMinutes,
        session.interruptions.length
      ),
    });

    const evicted = appendCapped(this.history, record, this.config.maxSessionHistory);
    if (evicted.length > 0) {
      this.log.debug(`Evicted ${evicted.length} oldest session(s) from history`);
    }
    this.updateAggregates(record);
    this.persist();

    this.log.debug(
      `Finalized ${record.sessionId}: focus ${record.focusScore}, efficiency ${record.efficiencyScore}`
    );
    this.emit('sessionFinalized', record);
    return record;
  }

  /**
   * Stop timers and drop an in-progress session without recording it
   */
  dispose(): void {
    this.stopSampler();
    if (this.active) {
      this.log.debug(`Discarding in-progress session ${this.active.sessionId}`);
      this.active = null;
    }
  }

  getActiveSession(): Readonly<ActiveSession> | null {
    if (!this.active) {
      return null;
    }
    return {
      ...this.active,
      interactions: [...this.active.interactions],
      interruptions: [...this.active.interruptions],
      focusSamples: [...this.active.focusSamples],
    };
  }

  /**
   * Finalized sessions, oldest first
   */
  getHistory(): SessionRecord[] {
    return [...this.history];
  }

  getSession(sessionId: string): SessionRecord {
    const record = this.history.find((session) => session.sessionId === sessionId);
    if (!record) {
      throw new NotFoundError('session', sessionId);
    }
    return record;
  }

  getSessionsInRange(range: DateRange): SessionRecord[] {
    return this.history.filter((session) => isWithinRange(session.startTime, range));
  }

  getSessionsByDate(dateKey: string): SessionRecord[] {
    return this.history.filter((session) => getDateKey(session.startTime) === dateKey);
  }

  getTodayStats(): PeriodStats {
    const key = getDateKey(this.clock());
    return { ...(this.dailyStats[key] ?? emptyStats(key)) };
  }

  getWeekStats(): PeriodStats {
    const key = getWeekKey(this.clock());
    return { ...(this.weeklyStats[key] ?? emptyStats(key)) };
  }

  /**
   * Day productivity: completed share of work sessions (60%) and progress
   * towards eight completed sessions (40%)
   */
  calculateProductivityScore(dateKey: string): number {
    const work = this.getSessionsByDate(dateKey).filter((session) => session.type === 'work');
    const completed = work.filter((session) => session.completed);
    if (completed.length === 0) {
      return 0;
    }

    const completionRate = completed.length / work.length;
    const sessionScore = Math.min(1, completed.length / 8);
    return round1((completionRate * 0.6 + sessionScore * 0.4) * 100);
  }

  /**
   * Longest run of completed work sessions on consecutive days.
   * An incomplete work session breaks the run.
   */
  getLongestStreak(): number {
    const work = this.history
      .filter((session) => session.type === 'work')
      .sort((a, b) => a.startTime.getTime() - b.startTime.getTime());

    let current = 0;
    let longest = 0;
    let lastDate: Date | null = null;

    for (const session of work) {
      if (!session.completed) {
        current = 0;
        continue;
      }

      const day = new Date(session.startTime.getFullYear(), session.startTime.getMonth(), session.startTime.getDate());
      if (lastDate === null || day.getTime() === lastDate.getTime()) {
        current += 1;
      } else if (getDateKey(subDays(day, 1)) === getDateKey(lastDate)) {
        current += 1;
      } else {
        current = 1;
      }

      longest = Math.max(longest, current);
      lastDate = day;
    }

    return longest;
  }

  getStatsSummary(): StatsSummary {
    const today = this.getTodayStats();
    const workMinutes = this.history
      .filter((session) => session.type === 'work')
      .reduce((total, session) => total + session.actualDurationSeconds / 60, 0);

    return {
      today: { ...today, productivityScore: this.calculateProductivityScore(today.key) },
      week: this.getWeekStats(),
      total: {
        sessions: this.history.length,
        workMinutes: round1(workMinutes),
        longestStreak: this.getLongestStreak(),
      },
    };
  }

  /**
   * Drop sessions that started more than `daysToKeep` days ago.
   * Returns the number removed.
   */
  cleanupOldData(daysToKeep: number = this.config.retentionDays): number {
    const cutoff = subDays(this.clock(), daysToKeep).getTime();
    const before = this.history.length;
    this.history = this.history.filter((session) => session.startTime.getTime() >= cutoff);

    const removed = before - this.history.length;
    if (removed > 0) {
      this.log.info(`Removed ${removed} session(s) older than ${daysToKeep} days`);
      this.persist();
    }
    return removed;
  }

  exportData(): HistoryExport {
    return {
      exportDate: this.clock().toISOString(),
      sessions: this.getHistory(),
      dailyStats: { ...this.dailyStats },
      weeklyStats: { ...this.weeklyStats },
      summary: this.getStatsSummary(),
    };
  }

  private startSampler(): void {
    this.stopSampler();
    this.sampler = setInterval(() => this.takeSample(), this.config.sampleIntervalSeconds * 1000);
    this.sampler.unref();
  }

  private stopSampler(): void {
    if (this.sampler) {
      clearInterval(this.sampler);
      this.sampler = null;
    }
  }

  private takeSample(): void {
    const session = this.active;
    if (!session) {
      return;
    }

    try {
      const now = this.clock();
      const sample: FocusSample = {
        timestamp: now,
        score: calculateTickScore({
          elapsedMinutes: secondsBetween(session.startTime, now) / 60,
          interruptionCount: session.interruptions.length,
          interactionCount: session.interactions.length,
        }),
      };
      session.focusSamples.push(sample);
      this.emit('sample', { session, sample });
    } catch (error) {
      this.log.error(`Focus sample failed: ${error}`);
    }
  }

  private updateAggregates(record: SessionRecord): void {
    addToPeriod(this.dailyStats, getDateKey(record.startTime), record);
    addToPeriod(this.weeklyStats, getWeekKey(record.startTime), record);
  }

  private load(): void {
    const document = loadSnapshot<SessionHistoryDocument>(this.snapshots, SNAPSHOT, this.log);
    if (!document || !Array.isArray(document.sessions)) {
      return;
    }

    const revived: SessionRecord[] = [];
    for (const raw of document.sessions) {
      const record = reviveSession(raw);
      if (record) {
        revived.push(record);
      } else {
        this.log.warning(`Skipping unreadable session ${raw.sessionId}`);
      }
    }

    this.history = revived.slice(-this.config.maxSessionHistory);
    this.dailyStats = document.dailyStats ?? {};
    this.weeklyStats = document.weeklyStats ?? {};
    this.sequence = this.history.length;
    this.log.debug(`Loaded ${this.history.length} session(s) from snapshot`);
  }

  private persist(): void {
    persistSnapshot(
      this.snapshots,
      SNAPSHOT,
      {
        sessions: this.history,
        dailyStats: this.dailyStats,
        weeklyStats: this.weeklyStats,
        lastUpdated: this.clock().toISOString(),
      },
      this.log
    );
  }
}
