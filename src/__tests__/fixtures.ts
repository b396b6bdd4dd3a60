import { SnapshotName, SnapshotStore } from '../db/database';
import { buildEnvironmentTag } from '../engine/environment-tag';
import { SessionEventStore } from '../engine/session-store';
import { InterruptionEvent, SessionRecord, SessionType } from '../types/session';
import { EngineConfig } from '../types/config';
import { ScopedLogger } from '../utils/logger';

/**
 * Snapshot store kept in a Map, serialised like the SQLite one
 */
export class MemorySnapshots implements SnapshotStore {
  readonly documents = new Map<SnapshotName, string>();

  readSnapshot<T>(name: SnapshotName): T | null {
    const raw = this.documents.get(name);
    return raw === undefined ? null : JSON.parse(raw);
  }

  writeSnapshot(name: SnapshotName, document: unknown): void {
    this.documents.set(name, JSON.stringify(document));
  }
}

export interface SessionSpec {
  start: Date;
  type?: SessionType;
  minutes?: number;
  plannedMinutes?: number;
  completed?: boolean;
  focusScore?: number;
  efficiencyScore?: number;
  interruptions?: InterruptionEvent[];
}

let sequence = 0;

/**
 * Finalized session with chosen scores
 */
export function makeSession(spec: SessionSpec): SessionRecord {
  sequence += 1;
  const type = spec.type ?? 'work';
  const minutes = spec.minutes ?? 25;
  const endTime = new Date(spec.start.getTime() + minutes * 60_000);
  const focusScore = spec.focusScore ?? 70;

  return {
    sessionId: `${type}-fixture-${sequence}`,
    type,
    plannedDurationMinutes: spec.plannedMinutes ?? 25,
    startTime: spec.start,
    endTime,
    actualDurationSeconds: minutes * 60,
    completed: spec.completed ?? true,
    focusScore,
    efficiencyScore: spec.efficiencyScore ?? 80,
    interactions: [],
    interruptions: spec.interruptions ?? [],
    focusSamples: [{ timestamp: endTime, score: focusScore }],
    environment: buildEnvironmentTag(spec.start),
  };
}

export function makeInterruption(start: Date, durationSeconds: number = 20): InterruptionEvent {
  return {
    type: 'manual_pause',
    timestamp: start,
    sessionTimeSeconds: 60,
    durationSeconds,
    severity: durationSeconds < 30 ? 'low' : durationSeconds < 120 ? 'medium' : 'high',
  };
}

/**
 * Write sessions into a snapshot store as a saved history
 */
export function seedHistory(snapshots: SnapshotStore, sessions: readonly SessionRecord[]): void {
  snapshots.writeSnapshot('session_history', {
    sessions,
    dailyStats: {},
    weeklyStats: {},
    lastUpdated: new Date(0).toISOString(),
  });
}

/**
 * Event store loaded with the given history
 */
export function seededStore(
  sessions: readonly SessionRecord[],
  options: { config?: EngineConfig; clock?: () => Date } = {}
): { store: SessionEventStore; snapshots: MemorySnapshots } {
  const snapshots = new MemorySnapshots();
  seedHistory(snapshots, sessions);
  return { store: new SessionEventStore({ snapshots, ...options }), snapshots };
}

export function fakeLogger(): jest.Mocked<ScopedLogger> {
  return { error: jest.fn(), warning: jest.fn(), info: jest.fn(), debug: jest.fn() };
}

/**
 * Local-time date helper: day of January 2024 (Jan 15 is a Monday) at an hour
 */
export function jan(day: number, hour: number = 9, minute: number = 0): Date {
  return new Date(2024, 0, day, hour, minute, 0);
}
