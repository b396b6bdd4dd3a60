#!/usr/bin/env node

import { Command } from 'commander';
import { statusCommand } from './cli/commands/status';
import { reportCommand } from './cli/commands/report';
import { compareCommand } from './cli/commands/compare';
import { trendsCommand } from './cli/commands/trends';
import { insightsCommand } from './cli/commands/insights';
import { patternsCommand } from './cli/commands/patterns';
import { buildCommand } from './cli/commands/build';
import { templateCommand, collectParam } from './cli/commands/template';
import { exportCommand } from './cli/commands/export';
import { cleanupCommand } from './cli/commands/cleanup';
import { configCommand } from './cli/commands/config';
import { DATE_RANGE_PRESETS } from './utils/date';
import { logger } from './utils/logger';

const program = new Command();

const RANGE_HELP = `Date range preset: ${DATE_RANGE_PRESETS.join(', ')}`;

program
  .name('focus')
  .description('Productivity analytics for focus-timer sessions')
  .option('-v, --verbose', 'Output debug messages.')
  .version('1.0.0');

// Status command (default)
program
  .command('status', { isDefault: true })
  .description("Show today's totals and current highlights")
  .action(() => statusCommand());

// Hook to enable verbose logging before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.optsWithGlobals();
  if (opts.verbose) {
    logger.setVerbose(true);
    logger.debug('Verbose mode enabled');
  }
});

// Report command
program
  .command('report')
  .description('Generate the full analytics report for a date range')
  .option('--from <date>', 'Start date (YYYY-MM-DD or "last monday")')
  .option('--to <date>', 'End date, inclusive')
  .option('--range <preset>', RANGE_HELP)
  .option('--days <window>', 'Lookback window (e.g., 30, 2w, 1w3d)')
  .option('--format <format>', 'Output format: "terminal" or "json" (default from config)')
  .action(reportCommand);

// Compare command
program
  .command('compare')
  .description('Compare periods, weekdays against weekends, or times of day')
  .argument('<kind>', 'periods, weekdays or time-periods')
  .option('--granularity <granularity>', 'For periods: daily, weekly or monthly', 'weekly')
  .option('--count <count>', 'For periods: how many earlier periods to compare against', '3')
  .option('--from <date>', 'Start date (YYYY-MM-DD)')
  .option('--to <date>', 'End date, inclusive')
  .option('--range <preset>', RANGE_HELP)
  .option('--days <window>', 'Lookback window (e.g., 7, 2w)')
  .option('--format <format>', 'Output format: "terminal" or "json"')
  .action(compareCommand);

// Trends command
program
  .command('trends')
  .description('Show focus, efficiency and completion trends')
  .option('--window <window>', 'Moving average window (e.g., 7, 1w)', '7')
  .option('--from <date>', 'Start date (YYYY-MM-DD)')
  .option('--to <date>', 'End date, inclusive')
  .option('--range <preset>', RANGE_HELP)
  .option('--days <window>', 'Lookback window (e.g., 30, 4w)')
  .option('--format <format>', 'Output format: "terminal" or "json"')
  .action(trendsCommand);

// Insights command
program
  .command('insights')
  .description('Show how time of day and weekday relate to performance')
  .option('--days <window>', 'Lookback window (e.g., 30, 4w)', '30')
  .option('--heatmap', 'Include the weekday by hour heatmap')
  .option('--format <format>', 'Output format: "terminal" or "json"')
  .action(insightsCommand);

// Patterns command
program
  .command('patterns')
  .description('Show detected session and interruption patterns')
  .option('--format <format>', 'Output format: "terminal" or "json"')
  .action(patternsCommand);

// Build command
program
  .command('build')
  .description('Build a custom report from a JSON config file')
  .argument('<file>', 'Report config file')
  .option('--format <format>', 'Output format: "terminal" or "json"')
  .action(buildCommand);

// Template command
program
  .command('template')
  .description('Manage and run saved report templates')
  .argument('[subcommand]', 'list (default), show, save, delete or run')
  .argument('[args...]', 'Template name, and the config file for save')
  .option('-d, --description <description>', 'Description for save')
  .option('--param <section.key=value>', 'Override a section parameter for run (repeatable)', collectParam)
  .option('--range <preset>', `Override the date range for run. ${RANGE_HELP}`)
  .option('--format <format>', 'Output format for run: "terminal" or "json"')
  .action(templateCommand);

// Export command
program
  .command('export')
  .description('Export session history')
  .option('--format <format>', 'Export format: "json" (default) or "csv"', 'json')
  .option('-o, --output <file>', 'Write to a file instead of stdout')
  .action(exportCommand);

// Cleanup command
program
  .command('cleanup')
  .description('Delete sessions older than the retention window')
  .option('--days <window>', 'Keep this many days (default from config)')
  .action(cleanupCommand);

// Config command
program
  .command('config')
  .description('Show or change configuration')
  .argument('[subcommand]', 'get, set or path')
  .argument('[args...]', 'Key, and value for set')
  .action(configCommand);

program.parse();
