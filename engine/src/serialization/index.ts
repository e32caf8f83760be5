/**
 * Canonical serialization
 *
 * @module serialization
 */

export * from './CanonicalDocument.js';
export * from './CanonicalSerializer.js';
export type { FlowSerializer, SerializerBackend } from './FlowSerializer.js';
export { PlainSerializer, isPlainSafe } from './PlainSerializer.js';
export { YamlSerializer } from './YamlSerializer.js';
export { createSerializer, SERIALIZER_BACKENDS } from './createSerializer.js';
