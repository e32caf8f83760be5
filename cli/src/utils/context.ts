/**
 * Command Context
 *
 * Builds what every command needs from its parsed options: a formatter
 * and a configured FlowEngine. Also initializes the shared logger so
 * that the loader and parser log at the same level.
 */

import {
  FlowEngine,
  LoggerManager,
  configFromEnv,
  toLogLevel,
  type FlowEngineConfig,
  type LogLevelName,
} from '@flowcert/engine';
import { createFormatter } from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliGlobalOptions } from '../types/CliOptions.js';

/** CLI default when neither --log-level nor FLOWCERT_LOG_LEVEL is set */
export const DEFAULT_CLI_LOG_LEVEL: LogLevelName = 'warn';

export interface CommandContext {
  formatter: Formatter;
  engine: FlowEngine;
}

export function createCommandContext(
  options: CliGlobalOptions,
  config: FlowEngineConfig = {},
  env: NodeJS.ProcessEnv = process.env
): CommandContext {
  const fromEnv = configFromEnv(env);
  const colors = options.color !== false;
  const logLevel = options.logLevel ?? (env.FLOWCERT_LOG_LEVEL ? fromEnv.logLevel : DEFAULT_CLI_LOG_LEVEL);

  const level = toLogLevel(logLevel);
  if (level !== null && !LoggerManager.isReady()) {
    LoggerManager.initialize({
      level,
      format: fromEnv.logFormat,
      colors,
      timestamp: false,
      source: 'flowcert-cli',
    });
  }

  const engine = new FlowEngine({
    ...fromEnv,
    logLevel,
    colors,
    ...config,
  });

  return {
    formatter: createFormatter(options.format ?? 'human', { noColor: !colors, silent: options.silent }),
    engine,
  };
}
