import chalk from 'chalk';
import { AnalyticsEngine } from '../../engine';
import { formatMinutes } from '../../utils/duration';
import { withEngine, fail } from '../context';

/**
 * Display today's and this week's totals
 */
function displayTotals(engine: AnalyticsEngine): void {
  const summary = engine.store.getStatsSummary();
  const { today, week, total } = summary;

  console.log(chalk.bold("Today's Summary:"));
  console.log(`  Work sessions: ${chalk.cyan(today.workSessions)} (${today.completedSessions} completed)`);
  console.log(`  Work time: ${chalk.cyan(formatMinutes(today.workMinutes))}`);
  console.log(`  Breaks: ${today.breakSessions} (${formatMinutes(today.breakMinutes)})`);
  console.log(`  Productivity: ${chalk.bold(today.productivityScore)}`);
  console.log();
  console.log(chalk.bold(`This Week (${week.key}):`));
  console.log(`  Work sessions: ${chalk.cyan(week.workSessions)}, ${formatMinutes(week.workMinutes)}`);
  console.log();
  console.log(chalk.bold('All Time:'));
  console.log(`  Sessions: ${total.sessions}, work ${formatMinutes(total.workMinutes)}`);
  console.log(`  Longest streak: ${total.longestStreak} completed session(s)`);
}

/**
 * Display the latest trend point and any optimal time
 */
function displayHighlights(engine: AnalyticsEngine): void {
  const trend = engine.patterns.getProductivityTrend();
  const latest = trend[trend.length - 1];
  const optimal = engine.environment.detectOptimalTime();

  if (!latest && !optimal.hour && !optimal.weekday) {
    return;
  }

  console.log();
  console.log(chalk.bold('Highlights:'));
  if (latest) {
    console.log(`  Productivity on ${latest.date}: ${chalk.bold(latest.score)} (${latest.sessionsCount} sessions)`);
  }
  if (optimal.hour) {
    console.log(`  Best hour: ${chalk.green(optimal.hour.label)} (${optimal.hour.averagePerformance})`);
  }
  if (optimal.weekday) {
    console.log(`  Best day: ${chalk.green(optimal.weekday.label)} (${optimal.weekday.averagePerformance})`);
  }
}

/**
 * focus status command implementation
 */
export function statusCommand(): void {
  try {
    withEngine((engine) => {
      if (engine.store.getHistory().length === 0) {
        console.log(chalk.yellow('No sessions recorded yet.'));
        return;
      }

      displayTotals(engine);
      displayHighlights(engine);
    });
  } catch (error) {
    fail(error);
  }
}
