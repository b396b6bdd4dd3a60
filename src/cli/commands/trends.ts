import chalk from 'chalk';
import { formatTrendLines } from '../../reports/formatters/terminal';
import { formatJsonReport } from '../../reports/formatters/json';
import { formatDateRange } from '../../utils/date';
import { parseWindow } from '../../parser/window';
import { RangeOptions, resolveFormat, resolveRangeOptions, withEngine, fail } from '../context';

interface TrendsOptions extends RangeOptions {
  window?: string;
  format?: string;
}

/**
 * focus trends command implementation
 */
export function trendsCommand(options: TrendsOptions): void {
  try {
    const range = resolveRangeOptions(options);
    const windowDays = options.window ? parseWindow(options.window) : 7;
    const format = resolveFormat(options.format);

    withEngine((engine) => {
      const result = engine.comparison.analyzeProgressTrends(windowDays, range);

      if (format === 'json') {
        console.log(formatJsonReport(result));
        return;
      }

      console.log(chalk.bold(`Trends for ${formatDateRange(range)} (${windowDays}-day moving average)`));
      console.log(formatTrendLines(result).join('\n'));
    });
  } catch (error) {
    fail(error);
  }
}
