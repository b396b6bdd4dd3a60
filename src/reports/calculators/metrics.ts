import { SessionRecord } from '../../types/session';
import { mean, round1 } from '../../utils/stats';

/**
 * Metric set shared by comparisons and reports
 */
export interface SessionMetrics {
  count: number;
  averageFocusScore: number;
  averageEfficiencyScore: number;
  /** Percent of sessions marked completed */
  completionRate: number;
  averageDurationMinutes: number;
  totalInterruptions: number;
  interruptionsPerSession: number;
}

export type MetricKey = Exclude<keyof SessionMetrics, 'count'>;

/**
 * Metrics where a decrease is an improvement
 */
export const LOWER_IS_BETTER: ReadonlySet<MetricKey> = new Set<MetricKey>([
  'totalInterruptions',
  'interruptionsPerSession',
]);

export function workSessions(sessions: readonly SessionRecord[]): SessionRecord[] {
  return sessions.filter((session) => session.type === 'work');
}

export function calculateSessionMetrics(sessions: readonly SessionRecord[]): SessionMetrics {
  const count = sessions.length;
  const totalInterruptions = sessions.reduce((total, session) => total + session.interruptions.length, 0);

  return {
    count,
    averageFocusScore: round1(mean(sessions.map((session) => session.focusScore))),
    averageEfficiencyScore: round1(mean(sessions.map((session) => session.efficiencyScore))),
    completionRate: count > 0 ? round1((sessions.filter((session) => session.completed).length / count) * 100) : 0,
    averageDurationMinutes: round1(mean(sessions.map((session) => session.actualDurationSeconds / 60))),
    totalInterruptions,
    interruptionsPerSession: count > 0 ? round1(totalInterruptions / count) : 0,
  };
}
