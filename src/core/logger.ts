// Centralized logging service for the project scaffolder

import { ValidationError } from './errors.js';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[scaffold]',
  timestamps: false
};

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Parses a configured level name such as "warn"
 */
export function parseLogLevel(name: string): LogLevel {
  const level = LEVEL_NAMES[name.trim().toLowerCase()];
  if (level === undefined) {
    throw new ValidationError(
      `Unknown log level '${name}'. Must be one of: ${Object.keys(LEVEL_NAMES).join(', ')}`,
      'logging.level'
    );
  }
  return level;
}

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton in place so existing references see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    Logger.getInstance().config = { ...DEFAULT_CONFIG, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Format a log message
   */
  format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.DEBUG) {
      console.debug(this.format('DEBUG', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.INFO) {
      console.info(this.format('INFO', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.WARN) {
      console.warn(this.format('WARN', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.config.level <= LogLevel.ERROR) {
      console.error(this.format('ERROR', message, context));
    }
  }

  /**
   * Log an error with stack trace
   */
  exception(error: unknown, context?: Record<string, unknown>): void {
    if (this.config.level > LogLevel.ERROR) {
      return;
    }
    if (error instanceof Error) {
      console.error(this.format('ERROR', error.message, { ...context, name: error.name, stack: error.stack }));
    } else {
      console.error(this.format('ERROR', String(error), context));
    }
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
