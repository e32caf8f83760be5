/**
 * flowcert engine - structural certification for conversational flows
 *
 * @example
 * ```ts
 * import { FlowLoader, analyze, serialize } from '@flowcert/engine';
 *
 * const flow = await FlowLoader.fromFile('./support.yaml');
 * const report = analyze(flow);
 * if (report.valid) {
 *   console.log(serialize(flow));
 * }
 * ```
 */

// ============================================================================
// PURE ANALYSIS API
// ============================================================================

export { buildIndex } from './graph/GraphIndexBuilder.js';
export { validate } from './validation/StructuralValidator.js';
export { enumeratePaths, MAX_PATH_DEPTH } from './graph/PathEnumerator.js';
export { serialize, exportFlow, slugify } from './serialization/CanonicalSerializer.js';
export { FlowEngine, analyze } from './core/FlowEngine.js';

// ============================================================================
// TYPES
// ============================================================================

export * from './types/flow-types.js';
export type { FlowEngineConfig, ResolvedFlowEngineConfig } from './core/EngineConfig.js';
export type { FlowEngineOptions } from './core/FlowEngine.js';

// ============================================================================
// CONFIGURATION
// ============================================================================

export { resolveConfig, configFromEnv, CONFIG_ENV } from './core/EngineConfig.js';

// ============================================================================
// ADVANCED - building blocks
// ============================================================================

export * from './graph/index.js';
export * from './validation/index.js';
export * from './serialization/index.js';
export * from './parser/index.js';
export * from './loader/index.js';

// ============================================================================
// ERRORS
// ============================================================================

export * from './errors/index.js';

// ============================================================================
// LOGGING
// ============================================================================

export { EngineLogger, createEngineLogger, toLogLevel } from './logging/EngineLogger.js';
export { LoggerManager } from './logging/LoggerManager.js';
export { LogLevel, LogLevelSeverity } from './types/log-types.js';
export type {
  LogLevelName,
  LogCategory,
  LogEntry,
  LogSink,
  EngineLogFormat,
  EngineLoggerConfig,
} from './types/log-types.js';
