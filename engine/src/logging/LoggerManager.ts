import { LogLevel, type EngineLoggerConfig } from '../types/log-types.js';
import { EngineLogger } from './EngineLogger.js';

/**
 * Singleton Logger Manager
 *
 * Provides centralized access to an EngineLogger instance without
 * needing to pass it through every call.
 *
 * Usage:
 * ```typescript
 * // In the entry point (CLI, server)
 * LoggerManager.initialize({ level: LogLevel.INFO, source: 'flowcert-cli' });
 *
 * // Anywhere else (loader, parser)
 * const logger = LoggerManager.tryGetLogger();
 * logger?.debug('Loaded flow', { path });
 * ```
 */
export class LoggerManager {
  private static instance: EngineLogger | null = null;

  /**
   * Initialize the logger instance (call once in the entry point).
   * A second call returns the existing instance unchanged.
   */
  static initialize(config: Partial<EngineLoggerConfig> = {}): EngineLogger {
    if (this.instance) {
      this.instance.warn('LoggerManager already initialized; keeping existing instance');
      return this.instance;
    }

    this.instance = new EngineLogger({
      level: LogLevel.INFO,
      format: 'text',
      colors: true,
      timestamp: true,
      source: 'flowcert',
      category: 'system',
      ...config,
    });

    this.instance.debug('LoggerManager initialized', {
      level: this.instance.getConfig().level,
      format: this.instance.getConfig().format,
    });

    return this.instance;
  }

  /**
   * Get the logger instance
   *
   * @throws Error if logger not initialized
   */
  static getLogger(): EngineLogger {
    if (!this.instance) {
      throw new Error('[LoggerManager] Logger accessed before initialization. Call LoggerManager.initialize() first.');
    }
    return this.instance;
  }

  /**
   * Get the logger instance, or null when nobody initialized one
   */
  static tryGetLogger(): EngineLogger | null {
    return this.instance;
  }

  /**
   * Check if logger is initialized
   */
  static isReady(): boolean {
    return this.instance !== null;
  }

  /**
   * Reset the logger instance (useful for testing)
   */
  static reset(): void {
    this.instance = null;
  }
}
