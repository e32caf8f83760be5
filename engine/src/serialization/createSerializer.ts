/**
 * Serializer Factory
 *
 * Single point where serializer backends are instantiated.
 */

import type { FlowSerializer, SerializerBackend } from './FlowSerializer.js';
import { PlainSerializer } from './PlainSerializer.js';
import { YamlSerializer } from './YamlSerializer.js';

export const SERIALIZER_BACKENDS: readonly SerializerBackend[] = ['yaml', 'plain'];

/**
 * Create a serializer for the given backend
 *
 * @throws Error if the backend is unknown
 */
export function createSerializer(backend: SerializerBackend = 'yaml'): FlowSerializer {
  switch (backend) {
    case 'yaml':
      return new YamlSerializer();
    case 'plain':
      return new PlainSerializer();
    default: {
      const exhaustiveCheck: never = backend;
      throw new Error(
        `Unknown serializer backend: "${String(exhaustiveCheck)}". Valid backends: ${SERIALIZER_BACKENDS.join(', ')}`
      );
    }
  }
}
