import chalk from 'chalk';
import { writeFileSync } from 'fs';
import { ValidationError } from '../../types/errors';
import { toRawSessionRow } from '../../reports/builder';
import { formatCsvSessions } from '../../reports/formatters/csv';
import { formatJsonReport } from '../../reports/formatters/json';
import { logger } from '../../utils/logger';
import { withEngine, fail } from '../context';

interface ExportOptions {
  format?: string;
  output?: string;
}

/**
 * focus export command implementation
 * JSON carries the full history with aggregates; CSV one row per session
 */
export function exportCommand(options: ExportOptions): void {
  try {
    const format = options.format ?? 'json';
    if (format !== 'json' && format !== 'csv') {
      throw new ValidationError(`Unknown export format "${format}". Use json or csv`, 'format');
    }

    withEngine((engine) => {
      const output =
        format === 'csv'
          ? formatCsvSessions(engine.store.getHistory().map(toRawSessionRow))
          : formatJsonReport(engine.store.exportData());

      if (!options.output) {
        console.log(output);
        return;
      }

      writeFileSync(options.output, output + '\n', 'utf-8');
      logger.debug(`Wrote ${output.length} characters to ${options.output}`);
      console.log(chalk.green(`✓ Exported ${engine.store.getHistory().length} session(s) to ${options.output}`));
    });
  } catch (error) {
    fail(error);
  }
}
