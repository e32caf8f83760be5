/**
 * Log levels, ordered by severity
 */
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

/**
 * Numeric severity for level filtering
 */
export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

/**
 * Level names accepted from configuration; 'silent' turns logging off
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log categories (phase-based, not feature-based)
 *
 * - 'system': configuration, logger and engine setup
 * - 'analysis': parsing, validation, path enumeration, serialization
 */
export type LogCategory = 'system' | 'analysis';

/**
 * Engine-specific log format type
 */
export type EngineLogFormat = 'text' | 'json';

/**
 * Structured log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  category: LogCategory;
  source: string;
  message: string;
  context?: Record<string, unknown>;
  error?: Error;
}

/**
 * Where formatted log lines go
 */
export type LogSink = (line: string, entry: LogEntry) => void;

/**
 * Engine logger configuration
 */
export interface EngineLoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;
  /** Output format */
  format?: EngineLogFormat;
  /** Enable colors in output */
  colors?: boolean;
  /** Include timestamps */
  timestamp?: boolean;
  /** Source identifier */
  source?: string;
  /** Log category */
  category?: LogCategory;
  /** Output target, stderr by default */
  sink?: LogSink;
}
