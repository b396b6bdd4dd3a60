import chalk from 'chalk';
import { AnalysisResult } from '../../types/analysis';
import { formatDateRange } from '../../utils/date';
import { formatMinutes } from '../../utils/duration';
import { WEEKDAY_NAMES, formatHour } from '../../engine/environment-tag';
import { BuiltReport, BuiltSection, ComprehensiveReport, ComparisonSection } from '../types';
import { ProgressTrends } from '../comparison';

const RULE_WIDTH = 80;

/**
 * Format percentage
 */
function formatPercent(value: number): string {
  return `${Math.round(value)}%`;
}

/**
 * Create a progress bar
 */
function progressBar(percent: number, width: number = 20): string {
  const filled = Math.max(0, Math.min(width, Math.round((percent / 100) * width)));
  const empty = width - filled;
  return chalk.green('█'.repeat(filled)) + chalk.gray('░'.repeat(empty));
}

/**
 * Format a percent change with trend indicator
 */
function formatChange(change: number | null, lowerIsBetter: boolean = false): string {
  if (change === null) {
    return chalk.gray('n/a');
  }
  if (change === 0) {
    return chalk.gray('0%');
  }

  const good = lowerIsBetter ? change < 0 : change > 0;
  const indicator = change > 0 ? '↑' : '↓';
  const sign = change > 0 ? '+' : '';
  const text = `${indicator} ${sign}${change}%`;
  return good ? chalk.green(text) : chalk.red(text);
}

function heading(lines: string[], title: string): void {
  lines.push(chalk.bold.yellow(title));
  lines.push(chalk.gray('─'.repeat(RULE_WIDTH)));
}

function banner(lines: string[], title: string, subtitle: string): void {
  lines.push('');
  lines.push(chalk.bold.cyan('═'.repeat(RULE_WIDTH)));
  lines.push(chalk.bold.cyan(`  ${title}`));
  lines.push(chalk.bold.cyan(`  ${subtitle}`));
  lines.push(chalk.bold.cyan('═'.repeat(RULE_WIDTH)));
  lines.push('');
}

export function formatTrendLines(result: AnalysisResult<ProgressTrends>): string[] {
  if (result.status !== 'ok') {
    return [chalk.gray(`  ${result.message}`)];
  }

  const lines: string[] = [];
  const trends = result.data;
  lines.push(`  Overall: ${chalk.bold(trends.overall)} (${trends.days.length} days with sessions)`);
  for (const [metric, trend] of Object.entries(trends.metrics)) {
    lines.push(
      `    ${metric.padEnd(12)} ${trend.direction.padEnd(10)} ${chalk.gray(`${trend.strength}, slope ${trend.slope}`)} ` +
      `next week ~${trend.prediction}`
    );
  }
  for (const milestone of trends.milestones) {
    lines.push(chalk.gray(`    Best ${milestone.metric}: ${milestone.value} on ${milestone.date}`));
  }
  return lines;
}

/**
 * Format the comprehensive report for terminal display
 */
export function formatTerminalReport(report: ComprehensiveReport): string {
  const lines: string[] = [];
  banner(lines, 'FOCUS ANALYTICS REPORT', formatDateRange(report.range));

  // 1. Summary
  heading(lines, '📊 SUMMARY');
  lines.push(`  Sessions: ${chalk.bold(report.sessions.totalSessions)} (${report.sessions.workSessions} work, ${report.sessions.breakSessions} break)`);
  lines.push(`  Work Time: ${chalk.bold(formatMinutes(report.sessions.totalWorkMinutes))}`);
  lines.push(`  Completion: ${progressBar(report.summary.completionRate)} ${formatPercent(report.summary.completionRate)}`);
  lines.push(`  Avg Focus: ${chalk.bold(report.summary.averageFocusScore)}`);
  lines.push(`  Avg Efficiency: ${chalk.bold(report.summary.averageEfficiencyScore)}`);
  if (report.summary.bestTime) {
    lines.push(`  Best Time: ${chalk.bold.green(report.summary.bestTime)}`);
  }
  lines.push('');

  // 2. Focus
  heading(lines, '🧠 FOCUS');
  const { distribution } = report.focus;
  lines.push(
    `  High: ${chalk.green(distribution.high)}  Medium: ${chalk.yellow(distribution.medium)}  Low: ${chalk.red(distribution.low)}`
  );
  for (const period of report.focus.byTimePeriod) {
    lines.push(`    ${period.key.padEnd(12)} ${progressBar(period.averagePerformance)} ${period.averagePerformance} (${period.samples})`);
  }
  lines.push('');

  // 3. Interruptions
  heading(lines, '🔔 INTERRUPTIONS');
  const stats = report.interruptions.statistics;
  lines.push(`  Total: ${chalk.bold(stats.total)} (${stats.averagePerSession} per session)`);
  lines.push(
    `    Low: ${chalk.green(stats.bySeverity.low)}  Medium: ${chalk.yellow(stats.bySeverity.medium)}  High: ${chalk.red(stats.bySeverity.high)}`
  );
  for (const [type, count] of Object.entries(stats.byType).sort((a, b) => b[1] - a[1])) {
    lines.push(`    ${type.padEnd(24)} ${count}`);
  }
  const patterns = report.interruptions.patterns;
  if (patterns.status === 'ok') {
    for (const pattern of patterns.data) {
      lines.push(chalk.cyan(`  • ${pattern.message}`));
    }
  }
  lines.push('');

  // 4. Environment
  heading(lines, '🌅 ENVIRONMENT');
  const insights = report.environment.insights;
  if (insights.status !== 'ok') {
    lines.push(chalk.gray(`  ${insights.message}`));
  } else {
    for (const period of insights.data.timePeriods) {
      lines.push(`    ${period.key.padEnd(12)} ${progressBar(period.averagePerformance)} ${period.averagePerformance}`);
    }
    if (insights.data.weekdayAverage !== null) {
      lines.push(`  Weekdays: ${insights.data.weekdayAverage}`);
    }
    if (insights.data.weekendAverage !== null) {
      lines.push(`  Weekends: ${insights.data.weekendAverage}`);
    }
  }
  const { hour, weekday } = report.environment.allTimeOptimalTimes;
  if (hour) {
    lines.push(`  Optimal hour (all time): ${chalk.bold(hour.label)} (${hour.averagePerformance})`);
  }
  if (weekday) {
    lines.push(`  Optimal day (all time): ${chalk.bold(weekday.label)} (${weekday.averagePerformance})`);
  }
  lines.push('');

  // 5. Trends
  heading(lines, '📈 TRENDS');
  lines.push(...formatTrendLines(report.trends.progress));
  lines.push('');

  // 6. Recommendations
  heading(lines, '💡 RECOMMENDATIONS');
  for (const recommendation of report.recommendations) {
    lines.push(`  • ${recommendation}`);
  }
  lines.push('');

  lines.push(chalk.bold.cyan('═'.repeat(RULE_WIDTH)));
  lines.push('');

  return lines.join('\n');
}

/**
 * Lines describing one comparison result
 */
export function formatComparison(section: ComparisonSection): string[] {
  switch (section.kind) {
    case 'periods': {
      const lines = [`  Verdict: ${chalk.bold(section.result.verdict)}`];
      for (const previous of section.result.previous) {
        lines.push(
          `    vs ${formatDateRange(previous.range)}: focus ${formatChange(previous.changes.averageFocusScore)}, ` +
          `efficiency ${formatChange(previous.changes.averageEfficiencyScore)}, ` +
          `completion ${formatChange(previous.changes.completionRate)}, ` +
          `interruptions ${formatChange(previous.changes.interruptionsPerSession, true)}`
        );
      }
      for (const insight of section.result.insights) {
        lines.push(chalk.cyan(`  • ${insight}`));
      }
      return lines;
    }
    case 'weekdays': {
      if (section.result.status !== 'ok') {
        return [chalk.gray(`  ${section.result.message}`)];
      }
      const result = section.result.data;
      return [
        `  Weekdays: efficiency ${result.weekdays.averageEfficiencyScore} (${result.weekdays.count})`,
        `  Weekends: efficiency ${result.weekends.averageEfficiencyScore} (${result.weekends.count})`,
        `  Difference: ${formatChange(result.differences.averageEfficiencyScore)}, effect size ${result.effectSize.band}`,
        chalk.cyan(`  • ${result.recommendation}`),
      ];
    }
    case 'time_periods': {
      const lines = section.result.periods.map(
        (period) =>
          `    ${period.name.padEnd(12)} ${String(period.compositeScore).padEnd(6)} ` +
          chalk.gray(`${period.metrics.count} sessions, ${period.confidence} confidence`)
      );
      lines.push(chalk.cyan(`  • ${section.result.recommendation}`));
      return lines;
    }
  }
}

function formatSection(section: BuiltSection): string[] {
  if (section.status === 'failed') {
    return [chalk.red(`  Failed: ${section.error}`)];
  }

  switch (section.type) {
    case 'summary':
      return [
        `  Sessions: ${section.data.totalSessions} (${section.data.workSessions} work, ${section.data.breakSessions} break)`,
        `  Work Time: ${formatMinutes(section.data.totalWorkMinutes)}`,
        `  Completion: ${formatPercent(section.data.metrics.completionRate)}`,
        `  Avg Focus: ${section.data.metrics.averageFocusScore}  Avg Efficiency: ${section.data.metrics.averageEfficiencyScore}`,
      ];
    case 'productivity_analysis':
      return [
        `  Avg Focus: ${section.data.focus.averageFocusScore}`,
        `  Interruptions: ${section.data.interruptions.total} (${section.data.interruptions.averagePerSession} per session)`,
        ...section.data.trendPoints.slice(-7).map((point) => `    ${point.date} ${progressBar(point.score)} ${point.score}`),
      ];
    case 'comparison':
      return formatComparison(section.data);
    case 'visualization':
      return [
        `  ${section.data.title} (${section.data.chartType})`,
        ...section.data.series.map(
          (series) => `    ${series.label}: ${series.points.map((point) => `${point.x}=${point.y}`).join(', ') || chalk.gray('no data')}`
        ),
      ];
    case 'trend_analysis':
      return formatTrendLines(section.data);
    case 'recommendations':
      return section.data.map((recommendation) => `  • ${recommendation}`);
    case 'raw_data':
      return [
        `  ${section.data.length} session(s)`,
        ...section.data.map(
          (row) =>
            `    ${row.startTime.substring(0, 16)} ${row.type.padEnd(5)} ${formatMinutes(row.actualMinutes).padEnd(8)} ` +
            `focus ${row.focusScore} efficiency ${row.efficiencyScore}${row.completed ? '' : chalk.yellow(' (incomplete)')}`
        ),
      ];
  }
}

/**
 * Format a custom report built from a config or template
 */
export function formatTerminalBuiltReport(report: BuiltReport): string {
  const lines: string[] = [];
  banner(lines, report.name.toUpperCase(), formatDateRange(report.range));

  for (const section of report.sections) {
    heading(lines, section.name.toUpperCase());
    lines.push(...formatSection(section));
    lines.push('');
  }

  if (report.warnings.length > 0) {
    heading(lines, '⚠️  WARNINGS');
    for (const warning of report.warnings) {
      lines.push(chalk.yellow(`  ${warning}`));
    }
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Weekday x hour grid of mean performance
 */
export function formatHeatmap(cells: ReadonlyArray<{ weekday: number; hour: number; averagePerformance: number; samples: number }>): string {
  if (cells.length === 0) {
    return chalk.gray('  Not enough data for a heatmap yet');
  }

  return cells
    .map(
      (cell) =>
        `  ${(WEEKDAY_NAMES[cell.weekday] ?? String(cell.weekday)).padEnd(10)} ${formatHour(cell.hour)} ` +
        `${progressBar(cell.averagePerformance, 10)} ${cell.averagePerformance} (${cell.samples})`
    )
    .join('\n');
}
