/**
 * Engine Configuration
 *
 * User-facing configuration for FlowEngine.
 * Every option is optional; resolveConfig() fills in defaults.
 *
 * @module core
 */

import { z } from 'zod';
import type { LogLevelName, EngineLogFormat } from '../types/log-types.js';
import type { SerializerBackend } from '../serialization/FlowSerializer.js';

/**
 * Engine configuration options
 *
 * @example
 * ```ts
 * const engine = new FlowEngine({ logLevel: 'debug', serializer: 'plain' });
 * ```
 */
export interface FlowEngineConfig {
  /**
   * Logging level; 'silent' disables logging entirely
   * @default 'info'
   */
  logLevel?: LogLevelName;

  /**
   * Enable verbose output (equivalent to logLevel='debug')
   * @default false
   */
  verbose?: boolean;

  /**
   * Log line format
   * @default 'text'
   */
  logFormat?: EngineLogFormat;

  /**
   * Colourise text log lines
   * @default true
   */
  colors?: boolean;

  /**
   * Backend used by serialize() and exportFlow()
   * @default 'yaml'
   */
  serializer?: SerializerBackend;
}

export type ResolvedFlowEngineConfig = Required<Omit<FlowEngineConfig, 'verbose'>>;

const ConfigSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    verbose: z.boolean().default(false),
    logFormat: z.enum(['text', 'json']).default('text'),
    colors: z.boolean().default(true),
    serializer: z.enum(['yaml', 'plain']).default('yaml'),
  })
  .strict();

/** Environment variables read by configFromEnv() */
export const CONFIG_ENV = {
  logLevel: 'FLOWCERT_LOG_LEVEL',
  logFormat: 'FLOWCERT_LOG_FORMAT',
  serializer: 'FLOWCERT_SERIALIZER',
} as const;

/**
 * Apply defaults and validate.
 *
 * @throws Error naming every invalid option
 */
export function resolveConfig(config: FlowEngineConfig = {}): ResolvedFlowEngineConfig {
  return resolveUnknown(config);
}

/**
 * Configuration from FLOWCERT_* environment variables; unset ones take defaults.
 *
 * @throws Error when a variable holds an unsupported value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedFlowEngineConfig {
  const raw: Record<string, string> = {};
  for (const [option, variable] of Object.entries(CONFIG_ENV)) {
    const value = env[variable];
    if (value !== undefined && value !== '') {
      raw[option] = value.trim().toLowerCase();
    }
  }
  return resolveUnknown(raw);
}

function resolveUnknown(input: unknown): ResolvedFlowEngineConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new Error(`Invalid engine configuration: ${problems.join('; ')}`);
  }

  const { verbose, ...config } = result.data;
  return verbose ? { ...config, logLevel: 'debug' } : config;
}
