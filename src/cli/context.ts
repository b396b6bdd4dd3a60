import chalk from 'chalk';
import { AnalyticsDB } from '../db/database';
import { AnalyticsEngine, createAnalyticsEngine } from '../engine';
import { DateRange } from '../types/session';
import { errorMessage, ValidationError } from '../types/errors';
import { ensureDataDir, getDatabasePath, loadConfig } from '../utils/config';
import {
  assertValidRange,
  exclusiveEndOfDay,
  isDateRangePreset,
  lastNDays,
  parseFuzzyDate,
  resolvePreset,
} from '../utils/date';
import { parseWindow } from '../parser/window';

export interface RangeOptions {
  from?: string;
  to?: string;
  range?: string;
  days?: string;
}

export type OutputFormat = 'terminal' | 'json';

/**
 * Open the database, build the engine, run `fn`, then release both
 */
export function withEngine<T>(fn: (engine: AnalyticsEngine) => T): T {
  ensureDataDir();
  const db = new AnalyticsDB(getDatabasePath());

  try {
    const engine = createAnalyticsEngine({ db, config: loadConfig() });
    try {
      return fn(engine);
    } finally {
      engine.dispose();
    }
  } finally {
    db.close();
  }
}

/**
 * Resolve --range, --days or --from/--to into a date range.
 * Without any of them: the last `defaultDays` days.
 */
export function resolveRangeOptions(options: RangeOptions, defaultDays: number = 30, now: Date = new Date()): DateRange {
  if (options.range) {
    if (!isDateRangePreset(options.range)) {
      throw new ValidationError(`Unknown range "${options.range}"`, 'range');
    }
    return resolvePreset(options.range, now);
  }

  if (options.days) {
    return lastNDays(parseWindow(options.days), now);
  }

  if (options.from || options.to) {
    const end = options.to ? exclusiveEndOfDay(parseFuzzyDate(options.to, now)) : exclusiveEndOfDay(now);
    const start = options.from ? parseFuzzyDate(options.from, now) : lastNDays(defaultDays, now).start;
    const range = { start, end };
    assertValidRange(range);
    return range;
  }

  return lastNDays(defaultDays, now);
}

export function resolveFormat(format: string | undefined): OutputFormat {
  const value = format ?? loadConfig().reportFormat;
  if (value !== 'terminal' && value !== 'json') {
    throw new ValidationError(`Unknown format "${value}". Use terminal or json`, 'format');
  }
  return value;
}

/**
 * Print an error and exit with status 1
 */
export function fail(error: unknown): void {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
}
