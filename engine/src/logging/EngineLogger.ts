/**
 * Engine Logger
 *
 * Structured logging for the flowcert engine.
 * Supports text and JSON line formats with severity-based filtering.
 *
 * Lines go to stderr by default so that command output on stdout
 * (reports, canonical documents) stays machine-readable.
 *
 * @module logging
 */

import { Chalk, type ChalkInstance } from 'chalk';
import {
  LogLevel,
  LogLevelSeverity,
  type EngineLoggerConfig,
  type LogEntry,
  type LogLevelName,
  type LogSink,
} from '../types/log-types.js';

const defaultSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Engine Logger
 */
export class EngineLogger {
  private config: Required<Omit<EngineLoggerConfig, 'sink'>>;
  private sink: LogSink;
  private color: ChalkInstance;

  constructor(config: EngineLoggerConfig) {
    this.config = {
      level: config.level,
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? true,
      source: config.source ?? 'flowcert',
      category: config.category ?? 'analysis',
    };
    this.sink = config.sink ?? defaultSink;
    this.color = new Chalk({ level: this.config.colors ? 1 : 0 });
  }

  /**
   * Log a debug message
   */
  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  /**
   * Log an info message
   */
  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  /**
   * Log a warning message
   */
  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  /**
   * Log an error message
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.willLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: this.config.category,
      source: this.config.source,
      message,
      context,
      error,
    };

    this.sink(this.format(entry), entry);
  }

  /**
   * Render an entry in the configured format
   */
  format(entry: LogEntry): string {
    if (this.config.format === 'json') {
      return JSON.stringify({
        timestamp: entry.timestamp.toISOString(),
        level: entry.level,
        category: entry.category,
        source: entry.source,
        message: entry.message,
        context: entry.context,
        error: entry.error ? { name: entry.error.name, message: entry.error.message } : undefined,
      });
    }

    const parts: string[] = [];
    if (this.config.timestamp) {
      parts.push(this.color.gray(`[${entry.timestamp.toISOString()}]`));
    }
    parts.push(this.levelLabel(entry.level));
    parts.push(this.color.cyan(`[${entry.source}]`));
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(this.color.dim(JSON.stringify(entry.context)));
    }
    if (entry.error) {
      parts.push(this.color.red(`(${entry.error.name}: ${entry.error.message})`));
    }
    return parts.join(' ');
  }

  private levelLabel(level: LogLevel): string {
    const label = level.toUpperCase().padEnd(5);
    switch (level) {
      case LogLevel.DEBUG:
        return this.color.gray(label);
      case LogLevel.INFO:
        return this.color.blue(label);
      case LogLevel.WARN:
        return this.color.yellow(label);
      case LogLevel.ERROR:
        return this.color.red(label);
    }
  }

  /**
   * Check if a level will be logged
   */
  willLog(level: LogLevel): boolean {
    return LogLevelSeverity[level] >= LogLevelSeverity[this.config.level];
  }

  /**
   * Get current configuration
   */
  getConfig(): Readonly<Omit<EngineLoggerConfig, 'sink'>> {
    return { ...this.config };
  }
}

const LEVELS_BY_NAME: Record<Exclude<LogLevelName, 'silent'>, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Map a configured level name to its LogLevel; null for silent
 */
export function toLogLevel(logLevel: LogLevelName): LogLevel | null {
  return logLevel === 'silent' ? null : LEVELS_BY_NAME[logLevel];
}

/**
 * Create a logger from a configured level name.
 *
 * @returns null in silent mode
 */
export function createEngineLogger(
  logLevel: LogLevelName,
  options: Omit<EngineLoggerConfig, 'level'> = {}
): EngineLogger | null {
  const level = toLogLevel(logLevel);
  if (level === null) {
    return null;
  }

  return new EngineLogger({
    timestamp: false,
    ...options,
    level,
  });
}
