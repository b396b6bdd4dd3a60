/**
 * Session kind
 */
export type SessionType = 'work' | 'break';

/**
 * Interruption severity, derived from duration unless preset
 */
export type Severity = 'low' | 'medium' | 'high';

/**
 * Interruption kinds: pauses, inactivity gaps, and externally reported events
 */
export type InterruptionType = 'manual_pause' | 'inactivity' | `external:${string}`;

export type Season = 'winter' | 'spring' | 'summer' | 'autumn';

export type TimePeriod = 'morning' | 'afternoon' | 'evening' | 'night';

export type FocusLevel = 'high' | 'medium' | 'low';

/**
 * Known interaction payloads, plus an open extension variant
 */
export type InteractionDetails =
  | { kind: 'timer_control'; action: 'pause' | 'resume' | 'skip' | 'reset' }
  | { kind: 'task_update'; taskId: string; completed?: boolean }
  | { kind: 'input'; device: 'keyboard' | 'mouse' | 'touch' }
  | { kind: 'extension'; data: Record<string, unknown> };

export interface InteractionEvent {
  timestamp: Date;
  type: string;
  details?: InteractionDetails;
  /** Seconds since the session started */
  sessionTimeSeconds: number;
}

export interface InterruptionEvent {
  type: InterruptionType;
  /** When the interruption began */
  timestamp: Date;
  sessionTimeSeconds: number;
  durationSeconds: number;
  severity: Severity;
  description?: string;
}

export interface FocusSample {
  timestamp: Date;
  score: number;
}

/**
 * Calendar context stamped on a session when it starts
 */
export interface EnvironmentTag {
  hour: number;
  /** Monday = 0 ... Sunday = 6 */
  weekday: number;
  /** 1-12 */
  month: number;
  season: Season;
  timePeriod: TimePeriod;
  isWeekend: boolean;
}

/**
 * A session in progress. Mutated only by the event store.
 */
export interface ActiveSession {
  sessionId: string;
  type: SessionType;
  plannedDurationMinutes: number;
  startTime: Date;
  interactions: InteractionEvent[];
  interruptions: InterruptionEvent[];
  focusSamples: FocusSample[];
  environment: Readonly<EnvironmentTag>;
}

/**
 * A finalized session. Immutable once produced by endSession.
 */
export interface SessionRecord {
  readonly sessionId: string;
  readonly type: SessionType;
  readonly plannedDurationMinutes: number;
  readonly startTime: Date;
  readonly endTime: Date;
  readonly actualDurationSeconds: number;
  readonly completed: boolean;
  readonly focusScore: number;
  readonly efficiencyScore: number;
  readonly interactions: readonly InteractionEvent[];
  readonly interruptions: readonly InterruptionEvent[];
  readonly focusSamples: readonly FocusSample[];
  readonly environment: Readonly<EnvironmentTag>;
}

/**
 * Inclusive start, exclusive end
 */
export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Per-day or per-week aggregate counters
 */
export interface PeriodStats {
  key: string;
  workSessions: number;
  breakSessions: number;
  workMinutes: number;
  breakMinutes: number;
  completedSessions: number;
}
