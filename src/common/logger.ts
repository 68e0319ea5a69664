import { appendFileSync, mkdirSync } from 'fs';
import * as path from 'path';

/**
 * Logging utility for the configurator
 * Component loggers prefix every line with their component tag
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LEVEL_VALUE: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface LoggingConfig {
  level?: LogLevel;
  component?: string;
  /** Also append every emitted line to this file */
  logFile?: string;
  enableTestMode?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export class ConfigureLogger implements Logger {
  private readonly level: LogLevel;
  private readonly testMode: boolean;

  constructor(private readonly config: LoggingConfig = {}) {
    this.level = config.level ?? 'info';
    // Auto-detect test mode if not explicitly set
    this.testMode = config.enableTestMode ?? (process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined);

    if (config.logFile) {
      mkdirSync(path.dirname(config.logFile), { recursive: true });
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  /**
   * Logger for a sub-component sharing level and log file
   */
  child(component: string): ConfigureLogger {
    return new ConfigureLogger({ ...this.config, component, enableTestMode: this.testMode });
  }

  /**
   * Render a line the way it is written to the console and the log file
   */
  format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const tag = this.config.component ? `[${this.config.component.toUpperCase()}] ` : '';
    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    return `${new Date().toISOString()} ${level.toUpperCase()} ${tag}${message}${suffix}`;
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_VALUE[level] < LEVEL_VALUE[this.level]) {
      return;
    }

    const line = this.format(level, message, data);

    if (this.config.logFile) {
      appendFileSync(this.config.logFile, `${line}\n`, 'utf8');
    }

    if (this.testMode) {
      return;
    }

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): ConfigureLogger {
  return new ConfigureLogger(config);
}

/**
 * Default logger instance for simple usage
 */
export const defaultLogger = new ConfigureLogger({ component: 'configure' });

/**
 * Tag a logger with a component name when it supports it
 */
export function componentLogger(logger: Logger, component: string): Logger {
  return logger instanceof ConfigureLogger ? logger.child(component) : logger;
}
