/**
 * Logging utility for the consistency harness.
 * Log lines go to standard error so standard output carries only the report.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggingConfig {
  level?: LogLevel;
  scope?: string;
  enableTestMode?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export class HarnessLogger implements Logger {
  private readonly level: LogLevel;
  private readonly scope?: string;
  private readonly testMode: boolean;

  constructor(config: LoggingConfig = {}) {
    this.level = config.level ?? 'info';
    this.scope = config.scope;
    // Auto-detect test mode if not explicitly set
    this.testMode = config.enableTestMode ??
      (process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /**
   * Create a logger sharing this one's level with a nested scope
   */
  child(scope: string): HarnessLogger {
    return new HarnessLogger({
      level: this.level,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      enableTestMode: this.testMode
    });
  }

  isEnabled(level: LogLevel): boolean {
    return !this.testMode && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const prefix = this.scope
      ? `[${level.toUpperCase()}] [${this.scope}]`
      : `[${level.toUpperCase()}]`;
    console.error(`${prefix} ${message}`, ...args);
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): HarnessLogger {
  return new HarnessLogger(config);
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
