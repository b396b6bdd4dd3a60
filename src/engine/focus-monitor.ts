import { ActiveSession, FocusLevel } from '../types/session';
import { Clock, systemClock } from '../utils/clock';
import { TypedEmitter } from '../utils/events';
import { logger } from '../utils/logger';
import { SessionEventStore } from './session-store';
import { generateFocusRecommendations, LiveFocusScore, scoreActiveSession } from './focus-score';

export interface FocusUpdate extends LiveFocusScore {
  sessionId: string;
  timestamp: Date;
}

export interface FocusLevelChange {
  sessionId: string;
  timestamp: Date;
  previous: FocusLevel | null;
  current: FocusLevel;
  score: number;
}

export interface FocusMonitorEvents {
  /** Every recomputation, continuous */
  score: FocusUpdate;
  /** Only when the focus category changes */
  levelChange: FocusLevelChange;
}

/**
 * Publishes the live multi-factor score of the active session.
 * The raw score and the category transitions go out on separate channels.
 */
export class FocusMonitor extends TypedEmitter<FocusMonitorEvents> {
  private currentLevel: FocusLevel | null = null;
  private latest: FocusUpdate | null = null;
  private readonly unsubscribers: Array<() => void>;

  constructor(
    private readonly store: SessionEventStore,
    private readonly clock: Clock = systemClock
  ) {
    super(logger.scoped('focus'));

    this.unsubscribers = [
      store.on('sessionStarted', () => this.reset()),
      store.on('sample', ({ session }) => {
        this.update(session);
      }),
      store.on('sessionFinalized', () => this.reset()),
    ];
  }

  /**
   * Recompute the score of the active session, or null when idle
   */
  refresh(): FocusUpdate | null {
    const session = this.store.getActiveSession();
    return session ? this.update(session) : null;
  }

  getLatest(): FocusUpdate | null {
    return this.latest;
  }

  getCurrentLevel(): FocusLevel | null {
    return this.currentLevel;
  }

  /**
   * Advice for the session in progress
   */
  getRecommendations(): string[] {
    const session = this.store.getActiveSession();
    if (!session) {
      return [];
    }

    const update = this.latest ?? this.update(session);
    return generateFocusRecommendations({
      score: update.score,
      interruptionCount: session.interruptions.length,
      interactionCount: session.interactions.length,
      elapsedMinutes: (update.timestamp.getTime() - session.startTime.getTime()) / 60000,
    });
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers) {
      unsubscribe();
    }
  }

  private update(session: Readonly<ActiveSession>): FocusUpdate {
    const timestamp = this.clock();
    const update: FocusUpdate = {
      ...scoreActiveSession(session, timestamp),
      sessionId: session.sessionId,
      timestamp,
    };

    this.latest = update;
    this.emit('score', update);

    if (update.level !== this.currentLevel) {
      const change: FocusLevelChange = {
        sessionId: session.sessionId,
        timestamp,
        previous: this.currentLevel,
        current: update.level,
        score: update.score,
      };
      this.currentLevel = update.level;
      this.log.debug(`Focus level ${change.previous ?? 'none'} -> ${change.current} (${update.score})`);
      this.emit('levelChange', change);
    }

    return update;
  }

  private reset(): void {
    this.currentLevel = null;
    this.latest = null;
  }
}
