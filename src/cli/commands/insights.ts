import chalk from 'chalk';
import { formatHeatmap } from '../../reports/formatters/terminal';
import { formatJsonReport } from '../../reports/formatters/json';
import { parseWindow } from '../../parser/window';
import { resolveFormat, withEngine, fail } from '../context';

interface InsightsOptions {
  days?: string;
  heatmap?: boolean;
  format?: string;
}

/**
 * focus insights command implementation
 * Shows how time of day and weekday relate to performance
 */
export function insightsCommand(options: InsightsOptions): void {
  try {
    const lookbackDays = options.days ? parseWindow(options.days) : 30;
    const format = resolveFormat(options.format);

    withEngine((engine) => {
      const insights = engine.environment.getInsights(lookbackDays);
      const optimal = engine.environment.detectOptimalTime();
      const heatmap = options.heatmap ? engine.environment.getHeatmap() : [];

      if (format === 'json') {
        console.log(formatJsonReport({ insights, optimal, heatmap }));
        return;
      }

      if (insights.status !== 'ok') {
        console.log(chalk.yellow(insights.message));
      } else {
        const { data } = insights;
        console.log(chalk.bold(`Environment insights, last ${data.lookbackDays} days (${data.sessions} sessions)`));
        for (const period of data.timePeriods) {
          const marker = period.key === data.bestTimePeriod?.key ? chalk.green(' ★') : '';
          console.log(`  ${period.key.padEnd(12)} ${period.averagePerformance} (${period.samples})${marker}`);
        }
        console.log();
        for (const recommendation of data.recommendations) {
          console.log(`  • ${recommendation}`);
        }
      }

      if (optimal.hour) {
        console.log(`  Optimal hour: ${chalk.bold(optimal.hour.label)} (${optimal.hour.averagePerformance})`);
      }
      if (optimal.weekday) {
        console.log(`  Optimal day: ${chalk.bold(optimal.weekday.label)} (${optimal.weekday.averagePerformance})`);
      }

      if (options.heatmap) {
        console.log();
        console.log(chalk.bold('Heatmap:'));
        console.log(formatHeatmap(heatmap));
      }
    });
  } catch (error) {
    fail(error);
  }
}
