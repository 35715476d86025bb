/**
 * Levelled console logger.
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

class Logger {
  private level: LogLevel = 'info';

  constructor(private readonly prefix: string = '') {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(tag: string, message: string): string {
    return this.prefix ? `[${tag}] [${this.prefix}] ${message}` : `[${tag}] ${message}`;
  }

  debug(message: string): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(this.format('DEBUG', message)));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.warn(chalk.yellow(this.format('WARN', message)));
  }

  error(message: string): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(this.format('ERROR', message)));
  }

  /**
   * Create a child logger with a prefix.
   * The child takes the parent's level at creation time.
   */
  child(prefix: string): Logger {
    const child = new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix);
    child.setLevel(this.level);
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
