import { DateRange, FocusLevel, InterruptionEvent, Season, SessionRecord, SessionType, TimePeriod } from '../types/session';
import { AnalysisResult } from '../types/analysis';
import { DateRangePreset } from '../utils/date';
import { InterruptionPattern, InterruptionStatistics } from '../engine/interruption-tracker';
import {
  EnvironmentInsights,
  GroupPerformance,
  HeatmapCell,
  OptimalTimes,
} from '../engine/environment-correlator';
import { ProductivityTrendPoint, SessionPattern, TrendClassification } from '../engine/pattern-tracker';
import { SessionMetrics } from './calculators/metrics';
import {
  PeriodComparison,
  ProgressTrends,
  TimePeriodComparison,
  WeekdayWeekendComparison,
} from './comparison';

/**
 * Session counts and time for a date range
 */
export interface SessionSummary {
  totalSessions: number;
  workSessions: number;
  breakSessions: number;
  completedWorkSessions: number;
  totalWorkMinutes: number;
  totalBreakMinutes: number;
  /** Work sessions only */
  metrics: SessionMetrics;
}

export interface FocusAnalysis {
  averageFocusScore: number;
  highestFocusScore: number | null;
  lowestFocusScore: number | null;
  distribution: Record<FocusLevel, number>;
  byTimePeriod: GroupPerformance<TimePeriod>[];
}

export interface InterruptionAnalysis {
  statistics: InterruptionStatistics;
  patterns: AnalysisResult<InterruptionPattern[]>;
}

export interface EnvironmentAnalysis {
  insights: AnalysisResult<EnvironmentInsights>;
  /** Best hour and weekday over every recorded session, not only the report range */
  allTimeOptimalTimes: OptimalTimes;
  heatmap: HeatmapCell[];
  seasonal: GroupPerformance<Season>[];
}

export interface TrendAnalysis {
  trendPoints: ProductivityTrendPoint[];
  classification: AnalysisResult<TrendClassification>;
  patterns: AnalysisResult<SessionPattern[]>;
  progress: AnalysisResult<ProgressTrends>;
}

export interface ReportSummary {
  totalSessions: number;
  completionRate: number;
  averageFocusScore: number;
  averageEfficiencyScore: number;
  totalInterruptions: number;
  bestTime: string | null;
}

export interface ComprehensiveReport {
  generatedAt: Date;
  range: DateRange;
  summary: ReportSummary;
  sessions: SessionSummary;
  focus: FocusAnalysis;
  interruptions: InterruptionAnalysis;
  environment: EnvironmentAnalysis;
  trends: TrendAnalysis;
  recommendations: string[];
}

export interface SessionDetails {
  session: SessionRecord;
  durationMinutes: number;
  focusLevel: FocusLevel;
  interruptionsBySeverity: Record<string, number>;
}

export interface InterruptionOccurrence {
  sessionId: string;
  sessionType: SessionType;
  interruption: InterruptionEvent;
}

export type SectionType =
  | 'summary'
  | 'productivity_analysis'
  | 'comparison'
  | 'visualization'
  | 'trend_analysis'
  | 'recommendations'
  | 'raw_data';

export const SECTION_TYPES: readonly SectionType[] = [
  'summary',
  'productivity_analysis',
  'comparison',
  'visualization',
  'trend_analysis',
  'recommendations',
  'raw_data',
];

export type SectionParameters = Record<string, string | number | boolean>;

export interface SectionConfig {
  name: string;
  type: SectionType;
  parameters?: SectionParameters;
}

/**
 * A named preset, or explicit bounds with an exclusive end
 */
export type DateRangeSpec = DateRangePreset | { start: Date; end: Date };

export interface ReportConfig {
  name: string;
  dateRange: DateRangeSpec;
  sections: SectionConfig[];
}

export interface ProductivityAnalysis {
  focus: FocusAnalysis;
  interruptions: InterruptionStatistics;
  trendPoints: ProductivityTrendPoint[];
}

export type ComparisonSection =
  | { kind: 'periods'; result: PeriodComparison }
  | { kind: 'weekdays'; result: AnalysisResult<WeekdayWeekendComparison> }
  | { kind: 'time_periods'; result: TimePeriodComparison };

export type ChartKind = 'focus_trend' | 'daily_sessions' | 'interruptions_by_type' | 'heatmap';

/**
 * Chart description and numeric series; rendering is up to the viewer
 */
export interface Visualization {
  chart: ChartKind;
  chartType: 'line' | 'bar' | 'heatmap';
  title: string;
  xLabel: string;
  yLabel: string;
  series: Array<{ label: string; points: Array<{ x: string; y: number }> }>;
}

export interface RawSessionRow {
  sessionId: string;
  type: SessionType;
  startTime: string;
  endTime: string;
  plannedMinutes: number;
  actualMinutes: number;
  completed: boolean;
  focusScore: number;
  efficiencyScore: number;
  interruptions: number;
  interactions: number;
}

export type SectionData =
  | { type: 'summary'; data: SessionSummary }
  | { type: 'productivity_analysis'; data: ProductivityAnalysis }
  | { type: 'comparison'; data: ComparisonSection }
  | { type: 'visualization'; data: Visualization }
  | { type: 'trend_analysis'; data: AnalysisResult<ProgressTrends> }
  | { type: 'recommendations'; data: string[] }
  | { type: 'raw_data'; data: RawSessionRow[] };

export type BuiltSection =
  | ({ name: string; status: 'ok' } & SectionData)
  | { name: string; type: SectionType; status: 'failed'; error: string };

export interface BuiltReport {
  name: string;
  generatedAt: Date;
  range: DateRange;
  sections: BuiltSection[];
  warnings: string[];
}
