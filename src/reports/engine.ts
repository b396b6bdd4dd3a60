import { DateRange, FocusLevel, InterruptionType, SessionRecord, TimePeriod } from '../types/session';
import { ValidationError } from '../types/errors';
import { SessionEventStore } from '../engine/session-store';
import { InterruptionTracker } from '../engine/interruption-tracker';
import { EnvironmentCorrelator } from '../engine/environment-correlator';
import { SessionPatternTracker } from '../engine/pattern-tracker';
import { focusLevel } from '../engine/focus-score';
import { Clock, systemClock } from '../utils/clock';
import { TtlCache } from '../utils/cache';
import { assertValidRange, isWithinRange, lastNDays } from '../utils/date';
import { logger } from '../utils/logger';
import { mean, round1 } from '../utils/stats';
import { calculateSessionMetrics, workSessions } from './calculators/metrics';
import { ComparisonAnalytics } from './comparison';
import {
  ComprehensiveReport,
  EnvironmentAnalysis,
  FocusAnalysis,
  InterruptionAnalysis,
  InterruptionOccurrence,
  SessionDetails,
  SessionSummary,
  TrendAnalysis,
} from './types';

export interface ReportsEngineDeps {
  store: SessionEventStore;
  interruptions: InterruptionTracker;
  environment: EnvironmentCorrelator;
  patterns: SessionPatternTracker;
  comparison: ComparisonAnalytics;
  clock?: Clock;
}

const CACHE_TTL_MS = 15 * 60 * 1000;
const CACHE_MAX_ENTRIES = 10;
const COMPLETION_TARGET = 70;
const FOCUS_TARGET = 60;

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Aggregates every analytics component into one report and answers drill-down queries
 */
export class ReportsEngine {
  private readonly log = logger.scoped('reports');
  private readonly cache: TtlCache<ComprehensiveReport>;
  private readonly clock: Clock;

  constructor(private readonly deps: ReportsEngineDeps) {
    this.clock = deps.clock ?? systemClock;
    this.cache = new TtlCache<ComprehensiveReport>(CACHE_TTL_MS, CACHE_MAX_ENTRIES, this.clock);
  }

  /**
   * Full report for a range, the last 30 days by default.
   * Identical ranges are served from a 15 minute cache.
   */
  generateComprehensiveReport(range: DateRange = lastNDays(30, this.clock())): ComprehensiveReport {
    assertValidRange(range);
    const key = `${range.start.toISOString()}_${range.end.toISOString()}`;

    const cached = this.cache.get(key);
    if (cached) {
      this.log.debug(`Report cache hit for ${key}`);
      return cached;
    }

    const sessions = this.getSessionSummary(range);
    const focus = this.getFocusAnalysis(range);
    const interruptions = this.getInterruptionAnalysis(range);
    const environment = this.getEnvironmentAnalysis(range);
    const trends = this.getTrendAnalysis(range);

    const optimal = environment.allTimeOptimalTimes.hour ?? environment.allTimeOptimalTimes.weekday;
    const report: ComprehensiveReport = {
      generatedAt: this.clock(),
      range,
      summary: {
        totalSessions: sessions.totalSessions,
        completionRate: sessions.metrics.completionRate,
        averageFocusScore: sessions.metrics.averageFocusScore,
        averageEfficiencyScore: sessions.metrics.averageEfficiencyScore,
        totalInterruptions: sessions.metrics.totalInterruptions,
        bestTime: optimal ? optimal.label : null,
      },
      sessions,
      focus,
      interruptions,
      environment,
      trends,
      recommendations: this.generateRecommendations(range),
    };

    this.log.debug(`Generated report for ${key}`);
    return this.cache.set(key, report);
  }

  getSessionSummary(range: DateRange): SessionSummary {
    const all = this.deps.store.getSessionsInRange(range);
    const work = workSessions(all);
    const breaks = all.filter((session) => session.type === 'break');

    return {
      totalSessions: all.length,
      workSessions: work.length,
      breakSessions: breaks.length,
      completedWorkSessions: work.filter((session) => session.completed).length,
      totalWorkMinutes: round1(work.reduce((total, session) => total + session.actualDurationSeconds / 60, 0)),
      totalBreakMinutes: round1(breaks.reduce((total, session) => total + session.actualDurationSeconds / 60, 0)),
      metrics: calculateSessionMetrics(work),
    };
  }

  getFocusAnalysis(range: DateRange): FocusAnalysis {
    const work = workSessions(this.deps.store.getSessionsInRange(range));
    const scores = work.map((session) => session.focusScore);

    const distribution: Record<FocusLevel, number> = { high: 0, medium: 0, low: 0 };
    for (const score of scores) {
      distribution[focusLevel(score)] += 1;
    }

    const periods = new Map<TimePeriod, number[]>();
    for (const session of work) {
      const values = periods.get(session.environment.timePeriod) ?? [];
      values.push(session.focusScore);
      periods.set(session.environment.timePeriod, values);
    }

    return {
      averageFocusScore: round1(mean(scores)),
      highestFocusScore: scores.length > 0 ? Math.max(...scores) : null,
      lowestFocusScore: scores.length > 0 ? Math.min(...scores) : null,
      distribution,
      byTimePeriod: [...periods.entries()].map(([key, values]) => ({
        key,
        averagePerformance: round1(mean(values)),
        samples: values.length,
      })),
    };
  }

  getInterruptionAnalysis(range: DateRange): InterruptionAnalysis {
    return {
      statistics: this.deps.interruptions.getStatistics(range),
      patterns: this.deps.interruptions.minePatterns(),
    };
  }

  getEnvironmentAnalysis(range: DateRange): EnvironmentAnalysis {
    return {
      insights: this.deps.environment.getInsightsForRange(range),
      allTimeOptimalTimes: this.deps.environment.detectOptimalTime(),
      heatmap: this.deps.environment.getHeatmap(range),
      seasonal: this.deps.environment.getSeasonalPerformance(range),
    };
  }

  getTrendAnalysis(range: DateRange): TrendAnalysis {
    return {
      trendPoints: this.deps.patterns.getProductivityTrend(),
      classification: this.deps.patterns.getTrendClassification(),
      patterns: this.deps.patterns.getPatterns(),
      progress: this.deps.comparison.analyzeProgressTrends(7, range),
    };
  }

  /**
   * Advice derived from completion, focus, interruptions and the best known time
   */
  generateRecommendations(range: DateRange): string[] {
    const work = workSessions(this.deps.store.getSessionsInRange(range));
    if (work.length === 0) {
      return ['No work sessions in this period yet. Complete a few sessions to get recommendations.'];
    }

    const metrics = calculateSessionMetrics(work);
    const recommendations: string[] = [];

    if (metrics.completionRate < COMPLETION_TARGET) {
      recommendations.push(
        `Only ${metrics.completionRate}% of sessions were completed. Set smaller, more achievable goals for each session.`
      );
    }
    if (metrics.averageFocusScore < FOCUS_TARGET) {
      recommendations.push(
        `Average focus is ${metrics.averageFocusScore}. Try a short pre-session ritual to settle in before the timer starts.`
      );
    }
    if (metrics.totalInterruptions > work.length / 2) {
      recommendations.push(
        'Interruptions are frequent. Silence notifications and close chat apps while a session runs.'
      );
    }

    const optimal = this.deps.environment.detectOptimalTime();
    if (optimal.hour) {
      recommendations.push(`You focus best around ${optimal.hour.label}. Schedule your hardest work then.`);
    } else if (optimal.weekday) {
      recommendations.push(`${optimal.weekday.label} is your strongest day. Plan demanding tasks for it.`);
    }

    if (recommendations.length === 0) {
      recommendations.push('Your sessions look healthy. Keep the current routine.');
    }

    return recommendations;
  }

  getSessionDetails(sessionId: string): SessionDetails {
    const session = this.deps.store.getSession(sessionId);
    const interruptionsBySeverity: Record<string, number> = {};
    for (const interruption of session.interruptions) {
      interruptionsBySeverity[interruption.severity] = (interruptionsBySeverity[interruption.severity] ?? 0) + 1;
    }

    return {
      session,
      durationMinutes: round1(session.actualDurationSeconds / 60),
      focusLevel: focusLevel(session.focusScore),
      interruptionsBySeverity,
    };
  }

  getSessionsForDate(dateKey: string): SessionRecord[] {
    if (!DATE_KEY_PATTERN.test(dateKey)) {
      throw new ValidationError(`Expected a date in yyyy-mm-dd form, got "${dateKey}"`, 'date');
    }
    return this.deps.store.getSessionsByDate(dateKey);
  }

  getInterruptionsByType(type: InterruptionType, range: DateRange = lastNDays(30, this.clock())): InterruptionOccurrence[] {
    assertValidRange(range);
    const occurrences: InterruptionOccurrence[] = [];

    for (const session of this.deps.store.getHistory()) {
      for (const interruption of session.interruptions) {
        if (interruption.type === type && isWithinRange(interruption.timestamp, range)) {
          occurrences.push({ sessionId: session.sessionId, sessionType: session.type, interruption });
        }
      }
    }

    return occurrences;
  }

  clearCache(): void {
    this.cache.clear();
  }
}
