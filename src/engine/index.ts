import { EngineConfig } from '../types/config';
import { SnapshotStore } from '../db/database';
import { resolveConfig } from '../utils/config';
import { Clock, systemClock } from '../utils/clock';
import { ComparisonAnalytics } from '../reports/comparison';
import { ReportsEngine } from '../reports/engine';
import { ReportBuilder } from '../reports/builder';
import { TemplateStore } from '../reports/templates';
import { SessionEventStore } from './session-store';
import { FocusMonitor } from './focus-monitor';
import { InterruptionTracker } from './interruption-tracker';
import { EnvironmentCorrelator } from './environment-correlator';
import { SessionPatternTracker } from './pattern-tracker';

export interface AnalyticsEngineOptions {
  /** Snapshot storage; omit to keep everything in memory */
  db?: SnapshotStore | null;
  config?: EngineConfig;
  clock?: Clock;
}

export interface AnalyticsEngine {
  store: SessionEventStore;
  focus: FocusMonitor;
  interruptions: InterruptionTracker;
  environment: EnvironmentCorrelator;
  patterns: SessionPatternTracker;
  comparison: ComparisonAnalytics;
  reports: ReportsEngine;
  templates: TemplateStore;
  builder: ReportBuilder;
  /** Stop timers and detach every subscription */
  dispose(): void;
}

/**
 * Build every service once and wire them to the session store
 */
export function createAnalyticsEngine(options: AnalyticsEngineOptions = {}): AnalyticsEngine {
  const config = resolveConfig(options.config);
  const clock = options.clock ?? systemClock;
  const snapshots = options.db ?? null;
  const shared = { snapshots, config, clock };

  const store = new SessionEventStore(shared);
  const focus = new FocusMonitor(store, clock);
  const interruptions = new InterruptionTracker(store, shared);
  const environment = new EnvironmentCorrelator(store, shared);
  const patterns = new SessionPatternTracker(store, shared);
  const comparison = new ComparisonAnalytics(store, clock);
  const reports = new ReportsEngine({ store, interruptions, environment, patterns, comparison, clock });
  const templates = new TemplateStore(snapshots, clock);
  const builder = new ReportBuilder({
    reports,
    comparison,
    store,
    interruptions,
    environment,
    patterns,
    templates,
    clock,
  });

  return {
    store,
    focus,
    interruptions,
    environment,
    patterns,
    comparison,
    reports,
    templates,
    builder,
    dispose(): void {
      interruptions.dispose();
      focus.detach();
      environment.detach();
      patterns.detach();
      store.dispose();
      for (const emitter of [store, focus, interruptions, environment, patterns]) {
        emitter.removeAllListeners();
      }
    },
  };
}

export { SessionEventStore, calculateEfficiencyScore } from './session-store';
export type { SessionStoreEvents, StatsSummary, HistoryExport } from './session-store';
export { FocusMonitor } from './focus-monitor';
export type { FocusUpdate, FocusLevelChange } from './focus-monitor';
export { calculateTickScore, calculateLiveFocusScore, focusLevel, generateFocusRecommendations } from './focus-score';
export { InterruptionTracker } from './interruption-tracker';
export type { InterruptionPattern, InterruptionStatistics } from './interruption-tracker';
export { EnvironmentCorrelator } from './environment-correlator';
export { SessionPatternTracker, calculateCompositeProductivity } from './pattern-tracker';
export { buildEnvironmentTag } from './environment-tag';
export { classifySeverity } from './severity';
export { ComparisonAnalytics } from '../reports/comparison';
export { ReportsEngine } from '../reports/engine';
export { ReportBuilder } from '../reports/builder';
export { TemplateStore } from '../reports/templates';
export { AnalyticsDB } from '../db/database';
export * from '../types/errors';
export * from '../types/session';
export type { AnalysisResult } from '../types/analysis';
export type { EngineConfig } from '../types/config';
export type { ReportConfig, ComprehensiveReport, BuiltReport } from '../reports/types';
