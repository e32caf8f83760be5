/**
 * Flow Serializer Interface
 *
 * A serializer renders a canonical document to text. Ordering and field
 * projection are decided by CanonicalDocument before any backend sees the
 * data, so every backend emits the same structure.
 *
 * @module serialization
 */

import type { CanonicalMap } from './CanonicalDocument.js';

/**
 * Available rendering backends
 * - 'yaml': rendered by the `yaml` library
 * - 'plain': dependency-free block renderer
 */
export type SerializerBackend = 'yaml' | 'plain';

export interface FlowSerializer {
  readonly backend: SerializerBackend;

  /**
   * Render a canonical document. Output ends with a single newline.
   */
  render(document: CanonicalMap): string;
}
