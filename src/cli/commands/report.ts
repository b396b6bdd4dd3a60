import chalk from 'chalk';
import { formatDateRange } from '../../utils/date';
import { formatTerminalReport } from '../../reports/formatters/terminal';
import { formatJsonReport } from '../../reports/formatters/json';
import { logger } from '../../utils/logger';
import { RangeOptions, resolveFormat, resolveRangeOptions, withEngine, fail } from '../context';

interface ReportOptions extends RangeOptions {
  format?: string;
}

/**
 * focus report command implementation
 */
export function reportCommand(options: ReportOptions): void {
  try {
    const range = resolveRangeOptions(options);
    const format = resolveFormat(options.format);
    logger.debug(`Generating report for ${formatDateRange(range)} as ${format}`);

    withEngine((engine) => {
      const report = engine.reports.generateComprehensiveReport(range);

      if (report.sessions.totalSessions === 0) {
        console.log(chalk.yellow('No sessions found for the specified time range.'));
        return;
      }

      console.log(format === 'json' ? formatJsonReport(report) : formatTerminalReport(report));
    });
  } catch (error) {
    fail(error);
  }
}
