import chalk from 'chalk';

type Level = 'error' | 'warning' | 'info' | 'debug';

const LABELS: Record<Level, string> = {
  error: chalk.red('ERROR:'),
  warning: chalk.yellow('WARNING:'),
  info: chalk.cyan('INFO:'),
  debug: chalk.gray('DEBUG:'),
};

/**
 * Logger bound to a component name, e.g. "[interruptions]"
 */
export interface ScopedLogger {
  error(message: string, ...args: unknown[]): void;
  warning(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

/**
 * Global logger for the focus analytics engine and CLI
 * Writes to stderr so report output on stdout stays clean.
 * Debug messages only shown when verbose mode is enabled
 */
class Logger {
  private verbose: boolean = false;

  /**
   * Enable or disable verbose mode
   */
  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  /**
   * Check if verbose mode is enabled
   */
  isVerbose(): boolean {
    return this.verbose;
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  warning(message: string, ...args: unknown[]): void {
    this.write('warning', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  /**
   * Logger that prefixes every message with a component name
   */
  scoped(component: string): ScopedLogger {
    const prefix = `[${component}]`;
    return {
      error: (message, ...args) => this.write('error', `${prefix} ${message}`, args),
      warning: (message, ...args) => this.write('warning', `${prefix} ${message}`, args),
      info: (message, ...args) => this.write('info', `${prefix} ${message}`, args),
      debug: (message, ...args) => this.write('debug', `${prefix} ${message}`, args),
    };
  }

  private write(level: Level, message: string, args: unknown[]): void {
    if (level === 'debug' && !this.verbose) {
      return;
    }
    console.error(LABELS[level], message, ...args);
  }
}

// Export singleton instance
export const logger = new Logger();
