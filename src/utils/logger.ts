/**
 * Levelled logging for the CLI.
 *
 * Diagnostics go to stderr so that report output on stdout (notably
 * `--format json`) stays machine readable.
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

type Paint = (text: string) => string;

class Logger {
  /** Unset on children until set explicitly; they follow their parent */
  private level: LogLevel | undefined;
  private prefix: string = '';
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level ?? this.parent?.getLevel() ?? 'info';
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private emit(level: Exclude<LogLevel, 'silent'>, paint: Paint, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    console.error(paint(`[${level.toUpperCase()}] ${text}`));
    if (data) {
      console.error(paint(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', chalk.gray, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', chalk.blue, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', chalk.yellow, message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (error instanceof Error) {
      this.emit('error', chalk.red, message);
      if (this.shouldLog('error')) {
        console.error(chalk.red(error.stack || error.message));
      }
      return;
    }
    this.emit('error', chalk.red, message, error);
  }

  /**
   * Log a success message (shown at info level).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.green(`✓ ${message}`));
  }

  /**
   * Log a failure message (shown at info level).
   */
  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. It follows this logger's level
   * until its own is set.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
