/**
 * FlowEngine
 *
 * Configured entry point to the analysis core. Owns one logger and one
 * serializer backend and forwards to the pure functions, so API and CLI
 * callers get consistent logging without threading options through.
 *
 * The pure functions (validate, enumeratePaths, serialize, analyze,
 * exportFlow, buildIndex) stay usable on their own.
 *
 * @example
 * ```ts
 * const engine = new FlowEngine({ logLevel: 'warn' });
 * const report = engine.analyze(flow);
 * if (report.valid) {
 *   await writeFile(engine.exportFlow(flow).filename, engine.serialize(flow));
 * }
 * ```
 *
 * @module core
 */

import type {
  Flow,
  FlowExport,
  FlowPath,
  FlowReport,
  GraphIndex,
  ValidationResult,
} from '../types/flow-types.js';
import { GraphIndexBuilder } from '../graph/GraphIndexBuilder.js';
import { PathEnumerator } from '../graph/PathEnumerator.js';
import { StructuralValidator } from '../validation/StructuralValidator.js';
import { CanonicalSerializer } from '../serialization/CanonicalSerializer.js';
import type { FlowSerializer } from '../serialization/FlowSerializer.js';
import { createSerializer } from '../serialization/createSerializer.js';
import { createEngineLogger, type EngineLogger } from '../logging/EngineLogger.js';
import type { LogSink } from '../types/log-types.js';
import { resolveConfig, type FlowEngineConfig, type ResolvedFlowEngineConfig } from './EngineConfig.js';

export interface FlowEngineOptions {
  /** Logger to use instead of one built from the config */
  logger?: EngineLogger | null;
  /** Where log lines go when the engine builds its own logger */
  sink?: LogSink;
}

export class FlowEngine {
  readonly config: ResolvedFlowEngineConfig;
  private readonly logger: EngineLogger | null;
  private readonly serializer: FlowSerializer;

  constructor(config: FlowEngineConfig = {}, options: FlowEngineOptions = {}) {
    this.config = resolveConfig(config);
    this.logger =
      options.logger !== undefined
        ? options.logger
        : createEngineLogger(this.config.logLevel, {
            format: this.config.logFormat,
            colors: this.config.colors,
            source: 'flowcert-engine',
            category: 'analysis',
            sink: options.sink,
          });
    this.serializer = createSerializer(this.config.serializer);
  }

  buildIndex(flow: Flow): GraphIndex {
    return GraphIndexBuilder.build(flow);
  }

  validate(flow: Flow): ValidationResult {
    return StructuralValidator.validate(flow, { logger: this.logger });
  }

  enumeratePaths(flow: Flow): FlowPath[] {
    const paths = PathEnumerator.enumerate(flow, GraphIndexBuilder.build(flow));
    this.logger?.debug('Enumerated paths', { flowId: flow.id, paths: paths.length });
    return paths;
  }

  serialize(flow: Flow): string {
    return CanonicalSerializer.serialize(flow, { serializer: this.serializer, logger: this.logger });
  }

  analyze(flow: Flow): FlowReport {
    const report = analyze(flow, this.logger);
    this.logger?.info(report.valid ? 'Flow is valid' : 'Flow is invalid', {
      flowId: flow.id,
      errors: report.errors.length,
      warnings: report.warnings.length,
      paths: report.paths.length,
    });
    return report;
  }

  exportFlow(flow: Flow): FlowExport {
    return CanonicalSerializer.export(flow, { serializer: this.serializer, logger: this.logger });
  }

  getLogger(): EngineLogger | null {
    return this.logger;
  }
}

/**
 * Validation result plus every root-to-terminal path, from one shared index.
 * Paths are listed even for invalid flows.
 */
export function analyze(flow: Flow, logger: EngineLogger | null = null): FlowReport {
  const index = GraphIndexBuilder.build(flow);
  const result = StructuralValidator.validate(flow, { index, logger });
  const paths = PathEnumerator.enumerate(flow, index);
  logger?.debug('Enumerated paths', { flowId: flow.id, paths: paths.length });
  return { ...result, paths };
}
