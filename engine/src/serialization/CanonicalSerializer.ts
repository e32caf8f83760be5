/**
 * CanonicalSerializer
 *
 * Emits the canonical, diff-stable text form of a flow for version control
 * and hand-off to a runtime. Byte-identical for flows that differ only in
 * node/edge declaration order.
 */

import type { Flow, FlowExport, GraphIndex } from '../types/flow-types.js';
import type { EngineLogger } from '../logging/EngineLogger.js';
import { CanonicalDocument } from './CanonicalDocument.js';
import type { FlowSerializer, SerializerBackend } from './FlowSerializer.js';
import { createSerializer } from './createSerializer.js';

export interface SerializeOptions {
  /** Backend name or a ready serializer; 'yaml' by default */
  serializer?: SerializerBackend | FlowSerializer;
  /** Prebuilt index of the same flow */
  index?: GraphIndex;
  logger?: EngineLogger | null;
}

export class CanonicalSerializer {
  static serialize(flow: Flow, options: SerializeOptions = {}): string {
    const serializer =
      typeof options.serializer === 'object' ? options.serializer : createSerializer(options.serializer);
    const document = CanonicalDocument.build(flow, options.index);
    const text = serializer.render(document);

    options.logger?.debug('Serialized flow', {
      flowId: flow.id,
      backend: serializer.backend,
      bytes: text.length,
    });

    return text;
  }

  /**
   * Canonical text plus a file name derived from the flow's name
   */
  static export(flow: Flow, options: SerializeOptions = {}): FlowExport {
    return {
      content: this.serialize(flow, options),
      filename: `${slugify(flow.name || flow.id || 'flow', 'flow')}.yaml`,
    };
  }
}

/**
 * Accents stripped, lowercase, runs of anything outside [a-z0-9]
 * collapsed to '-', leading/trailing '-' trimmed. Falls back when nothing is left.
 */
export function slugify(value: string, fallback = 'item'): string {
  const slug = value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || fallback;
}

/**
 * Serialize a flow to its canonical text document.
 */
export function serialize(flow: Flow, options: SerializeOptions = {}): string {
  return CanonicalSerializer.serialize(flow, options);
}

/**
 * Canonical text plus a suggested `.yaml` file name.
 */
export function exportFlow(flow: Flow, options: SerializeOptions = {}): FlowExport {
  return CanonicalSerializer.export(flow, options);
}
