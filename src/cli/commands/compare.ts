import chalk from 'chalk';
import { ValidationError } from '../../types/errors';
import { GRANULARITIES, Granularity } from '../../reports/comparison';
import { ComparisonSection } from '../../reports/types';
import { formatComparison } from '../../reports/formatters/terminal';
import { formatJsonReport } from '../../reports/formatters/json';
import { formatDateRange } from '../../utils/date';
import { AnalyticsEngine } from '../../engine';
import { RangeOptions, resolveFormat, resolveRangeOptions, withEngine, fail } from '../context';

interface CompareOptions extends RangeOptions {
  granularity?: string;
  count?: string;
  format?: string;
}

const KINDS = ['periods', 'weekdays', 'time-periods'] as const;
type CompareKind = typeof KINDS[number];

function isCompareKind(value: string): value is CompareKind {
  return (KINDS as readonly string[]).includes(value);
}

function isGranularity(value: string): value is Granularity {
  return (GRANULARITIES as readonly string[]).includes(value);
}

function runComparison(engine: AnalyticsEngine, kind: CompareKind, options: CompareOptions): ComparisonSection {
  const range = resolveRangeOptions(options, kind === 'periods' ? 7 : 30);

  switch (kind) {
    case 'periods': {
      const granularity = options.granularity ?? 'weekly';
      if (!isGranularity(granularity)) {
        throw new ValidationError(`Unknown granularity "${granularity}". Use ${GRANULARITIES.join(', ')}`, 'granularity');
      }
      const count = options.count ? Number(options.count) : 3;
      return { kind: 'periods', result: engine.comparison.comparePeriods(granularity, range.start, range.end, count) };
    }
    case 'weekdays':
      return { kind: 'weekdays', result: engine.comparison.compareWeekdaysVsWeekends(range) };
    case 'time-periods':
      return { kind: 'time_periods', result: engine.comparison.compareTimePeriods(undefined, range) };
  }
}

/**
 * focus compare command implementation
 */
export function compareCommand(kind: string, options: CompareOptions): void {
  try {
    if (!isCompareKind(kind)) {
      throw new ValidationError(`Unknown comparison "${kind}". Use ${KINDS.join(', ')}`, 'kind');
    }
    const format = resolveFormat(options.format);

    withEngine((engine) => {
      const section = runComparison(engine, kind, options);

      if (format === 'json') {
        console.log(formatJsonReport(section));
        return;
      }

      if (section.kind === 'periods') {
        console.log(chalk.bold(`Current period: ${formatDateRange(section.result.current.range)}`));
      }
      console.log(formatComparison(section).join('\n'));
    });
  } catch (error) {
    fail(error);
  }
}
