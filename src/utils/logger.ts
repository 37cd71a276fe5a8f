/**
 * Levelled console logger shared by the library and the CLI.
 *
 * Library code only logs at debug, tagged with the dialect it concerns.
 * Commands report outcomes with `success` and `fail`.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogContext {
  /** Dialect the message is about; printed as a tag. */
  dialect?: string;
}

class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, context: LogContext = {}): void {
    if (!this.shouldLog('debug')) return;
    const tag = context.dialect ? `[${context.dialect}] ` : '';
    console.log(chalk.gray(`[DEBUG] ${tag}${message}`));
  }

  error(message: string, error?: Error): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      console.error(chalk.red(error.stack || error.message));
    }
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.red(`✗ ${message}`));
  }
}

export const logger = new Logger();

export { Logger };
