import { DateRange, SessionRecord } from '../types/session';
import { errorMessage, ValidationError } from '../types/errors';
import { SessionEventStore } from '../engine/session-store';
import { InterruptionTracker } from '../engine/interruption-tracker';
import { EnvironmentCorrelator } from '../engine/environment-correlator';
import { SessionPatternTracker } from '../engine/pattern-tracker';
import { formatHour, WEEKDAY_NAMES } from '../engine/environment-tag';
import { Clock, systemClock } from '../utils/clock';
import { resolvePreset } from '../utils/date';
import { logger } from '../utils/logger';
import { round1 } from '../utils/stats';
import { workSessions } from './calculators/metrics';
import { calculateDailyAverages } from './calculators/trends';
import { ComparisonAnalytics, GRANULARITIES } from './comparison';
import { ReportsEngine } from './engine';
import { TemplateStore } from './templates';
import {
  BuiltReport,
  BuiltSection,
  ChartKind,
  ComparisonSection,
  DateRangeSpec,
  RawSessionRow,
  ReportConfig,
  SectionConfig,
  SectionData,
  SectionParameters,
  Visualization,
} from './types';
import { validateReportConfig } from './validation';

export interface ReportBuilderDeps {
  reports: ReportsEngine;
  comparison: ComparisonAnalytics;
  store: SessionEventStore;
  interruptions: InterruptionTracker;
  environment: EnvironmentCorrelator;
  patterns: SessionPatternTracker;
  templates: TemplateStore;
  clock?: Clock;
}

export interface TemplateOverrides {
  name?: string;
  dateRange?: DateRangeSpec;
  /** Parameters merged over the template's, keyed by section name */
  parameters?: Record<string, SectionParameters>;
}

const COMPARISON_KINDS: readonly ComparisonSection['kind'][] = ['periods', 'weekdays', 'time_periods'];
const CHART_KINDS: readonly ChartKind[] = ['focus_trend', 'daily_sessions', 'interruptions_by_type', 'heatmap'];
const DEFAULT_RAW_LIMIT = 500;

function numberParam(parameters: SectionParameters | undefined, key: string, fallback: number): number {
  const value = parameters?.[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`Parameter "${key}" must be a number, got ${JSON.stringify(value)}`, key);
  }
  return value;
}

function choiceParam<T extends string>(
  parameters: SectionParameters | undefined,
  key: string,
  choices: readonly T[],
  fallback: T
): T {
  const value = parameters?.[key];
  if (value === undefined) {
    return fallback;
  }
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new ValidationError(`Parameter "${key}" must be one of ${choices.join(', ')}, got ${JSON.stringify(value)}`, key);
  }
  return match;
}

export function toRawSessionRow(session: SessionRecord): RawSessionRow {
  return {
    sessionId: session.sessionId,
    type: session.type,
    startTime: session.startTime.toISOString(),
    endTime: session.endTime.toISOString(),
    plannedMinutes: session.plannedDurationMinutes,
    actualMinutes: round1(session.actualDurationSeconds / 60),
    completed: session.completed,
    focusScore: session.focusScore,
    efficiencyScore: session.efficiencyScore,
    interruptions: session.interruptions.length,
    interactions: session.interactions.length,
  };
}

/**
 * Builds custom reports from declarative configs and saved templates.
 * A failing section is reported as a warning; the other sections still build.
 */
export class ReportBuilder {
  private readonly log = logger.scoped('builder');
  private readonly clock: Clock;

  constructor(private readonly deps: ReportBuilderDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * @throws ValidationError when the config itself is malformed
   */
  build(input: unknown): BuiltReport {
    const config = validateReportConfig(input);
    const range = this.resolveRange(config.dateRange);
    const sections: BuiltSection[] = [];
    const warnings: string[] = [];

    for (const section of config.sections) {
      try {
        sections.push({ name: section.name, status: 'ok', ...this.buildSection(section, range) });
      } catch (error) {
        const message = errorMessage(error);
        this.log.warning(`Section "${section.name}" failed: ${message}`);
        warnings.push(`Section "${section.name}" (${section.type}) failed: ${message}`);
        sections.push({ name: section.name, type: section.type, status: 'failed', error: message });
      }
    }

    return { name: config.name, generatedAt: this.clock(), range, sections, warnings };
  }

  /**
   * Build a saved template, with an optional date range and per-section parameter overrides
   */
  buildFromTemplate(templateName: string, overrides: TemplateOverrides = {}): BuiltReport {
    const template = this.deps.templates.loadTemplate(templateName);
    const sectionOverrides = overrides.parameters ?? {};

    for (const sectionName of Object.keys(sectionOverrides)) {
      if (!template.config.sections.some((section) => section.name === sectionName)) {
        throw new ValidationError(`Template "${templateName}" has no section "${sectionName}"`, 'parameters');
      }
    }

    const config: ReportConfig = {
      name: overrides.name ?? template.config.name,
      dateRange: overrides.dateRange ?? template.config.dateRange,
      sections: template.config.sections.map((section) => {
        const extra = sectionOverrides[section.name];
        return extra ? { ...section, parameters: { ...section.parameters, ...extra } } : section;
      }),
    };

    return this.build(config);
  }

  resolveRange(spec: DateRangeSpec): DateRange {
    return typeof spec === 'string' ? resolvePreset(spec, this.clock()) : { start: spec.start, end: spec.end };
  }

  private buildSection(section: SectionConfig, range: DateRange): SectionData {
    const parameters = section.parameters;

    switch (section.type) {
      case 'summary':
        return { type: 'summary', data: this.deps.reports.getSessionSummary(range) };

      case 'productivity_analysis':
        return {
          type: 'productivity_analysis',
          data: {
            focus: this.deps.reports.getFocusAnalysis(range),
            interruptions: this.deps.interruptions.getStatistics(range),
            trendPoints: this.deps.patterns.getProductivityTrend(),
          },
        };

      case 'comparison':
        return { type: 'comparison', data: this.buildComparison(parameters, range) };

      case 'visualization':
        return { type: 'visualization', data: this.buildVisualization(choiceParam(parameters, 'chart', CHART_KINDS, 'focus_trend'), range) };

      case 'trend_analysis':
        return {
          type: 'trend_analysis',
          data: this.deps.comparison.analyzeProgressTrends(numberParam(parameters, 'windowDays', 7), range),
        };

      case 'recommendations':
        return { type: 'recommendations', data: this.deps.reports.generateRecommendations(range) };

      case 'raw_data': {
        const limit = numberParam(parameters, 'limit', DEFAULT_RAW_LIMIT);
        if (limit < 1) {
          throw new ValidationError('Parameter "limit" must be at least 1', 'limit');
        }
        return {
          type: 'raw_data',
          data: this.deps.store.getSessionsInRange(range).slice(0, Math.floor(limit)).map(toRawSessionRow),
        };
      }
    }
  }

  private buildComparison(parameters: SectionParameters | undefined, range: DateRange): ComparisonSection {
    const kind = choiceParam(parameters, 'kind', COMPARISON_KINDS, 'periods');

    switch (kind) {
      case 'periods': {
        const granularity = choiceParam(parameters, 'granularity', GRANULARITIES, 'weekly');
        const count = numberParam(parameters, 'count', 3);
        return {
          kind,
          result: this.deps.comparison.comparePeriods(granularity, range.start, range.end, count),
        };
      }
      case 'weekdays':
        return { kind, result: this.deps.comparison.compareWeekdaysVsWeekends(range) };
      case 'time_periods':
        return { kind, result: this.deps.comparison.compareTimePeriods(undefined, range) };
    }
  }

  private buildVisualization(chart: ChartKind, range: DateRange): Visualization {
    const sessions = this.deps.store.getSessionsInRange(range);

    switch (chart) {
      case 'focus_trend': {
        const days = calculateDailyAverages(workSessions(sessions));
        return {
          chart,
          chartType: 'line',
          title: 'Daily focus and efficiency',
          xLabel: 'Date',
          yLabel: 'Score',
          series: [
            { label: 'Focus', points: days.map((day) => ({ x: day.date, y: day.focus })) },
            { label: 'Efficiency', points: days.map((day) => ({ x: day.date, y: day.efficiency })) },
          ],
        };
      }
      case 'daily_sessions': {
        const days = calculateDailyAverages(sessions);
        return {
          chart,
          chartType: 'bar',
          title: 'Sessions per day',
          xLabel: 'Date',
          yLabel: 'Sessions',
          series: [{ label: 'Sessions', points: days.map((day) => ({ x: day.date, y: day.sessions })) }],
        };
      }
      case 'interruptions_by_type': {
        const statistics = this.deps.interruptions.getStatistics(range);
        return {
          chart,
          chartType: 'bar',
          title: 'Interruptions by type',
          xLabel: 'Type',
          yLabel: 'Count',
          series: [
            {
              label: 'Interruptions',
              points: Object.entries(statistics.byType)
                .sort((a, b) => b[1] - a[1])
                .map(([type, count]) => ({ x: type, y: count })),
            },
          ],
        };
      }
      case 'heatmap': {
        const cells = this.deps.environment.getHeatmap();
        const weekdays = [...new Set(cells.map((cell) => cell.weekday))];
        return {
          chart,
          chartType: 'heatmap',
          title: 'Performance by weekday and hour',
          xLabel: 'Hour',
          yLabel: 'Weekday',
          series: weekdays.map((weekday) => ({
            label: WEEKDAY_NAMES[weekday] ?? String(weekday),
            points: cells
              .filter((cell) => cell.weekday === weekday)
              .map((cell) => ({ x: formatHour(cell.hour), y: cell.averagePerformance })),
          })),
        };
      }
    }
  }
}
