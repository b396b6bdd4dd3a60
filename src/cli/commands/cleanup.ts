import chalk from 'chalk';
import { parseWindow } from '../../parser/window';
import { withEngine, fail } from '../context';

interface CleanupOptions {
  days?: string;
}

/**
 * focus cleanup command implementation
 * Drops sessions older than --days (default: retentionDays from config)
 */
export function cleanupCommand(options: CleanupOptions): void {
  try {
    const days = options.days ? parseWindow(options.days) : undefined;

    withEngine((engine) => {
      const removed = engine.store.cleanupOldData(days);
      if (removed === 0) {
        console.log(chalk.gray('Nothing to clean up.'));
        return;
      }
      console.log(chalk.green(`✓ Removed ${removed} session(s)`));
    });
  } catch (error) {
    fail(error);
  }
}
