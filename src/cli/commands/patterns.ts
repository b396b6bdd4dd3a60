import chalk from 'chalk';
import { AnalysisResult } from '../../types/analysis';
import { formatJsonReport } from '../../reports/formatters/json';
import { resolveFormat, withEngine, fail } from '../context';

interface PatternsOptions {
  format?: string;
}

function printMessages(title: string, result: AnalysisResult<ReadonlyArray<{ message: string }>>): void {
  console.log(chalk.bold(title));
  if (result.status !== 'ok') {
    console.log(chalk.gray(`  ${result.message}`));
  } else if (result.data.length === 0) {
    console.log(chalk.gray('  Nothing notable'));
  } else {
    for (const pattern of result.data) {
      console.log(chalk.cyan(`  • ${pattern.message}`));
    }
  }
  console.log();
}

/**
 * focus patterns command implementation
 */
export function patternsCommand(options: PatternsOptions): void {
  try {
    const format = resolveFormat(options.format);

    withEngine((engine) => {
      const sessions = engine.patterns.getPatterns();
      const interruptions = engine.interruptions.minePatterns();
      const classification = engine.patterns.getTrendClassification();

      if (format === 'json') {
        console.log(formatJsonReport({ sessions, interruptions, classification }));
        return;
      }

      printMessages('Session patterns:', sessions);
      printMessages('Interruption patterns:', interruptions);

      console.log(chalk.bold('Direction:'));
      if (classification.status !== 'ok') {
        console.log(chalk.gray(`  ${classification.message}`));
        return;
      }
      const { efficiency, focus, recentSessions, previousSessions } = classification.data;
      console.log(`  Efficiency: ${chalk.bold(efficiency)}`);
      console.log(`  Focus: ${chalk.bold(focus)}`);
      console.log(chalk.gray(`  Last ${recentSessions} work sessions against the ${previousSessions} before them`));
    });
  } catch (error) {
    fail(error);
  }
}
