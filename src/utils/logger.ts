/**
 * Leveled console logging.
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

/**
 * Diagnostics for the rect-area CLI. The level gates debug output only;
 * error reports are always written so a failing run never exits silently.
 */
class Logger {
  private level: LogLevel = 'warn';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS[this.level] > LOG_LEVELS.debug) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  error(message: string, error?: Error): void {
    console.error(chalk.red(`[ERROR] ${message}`));
    if (error) {
      console.error(chalk.red(error.stack || error.message));
    }
  }
}

export const logger = new Logger();

export { Logger };
