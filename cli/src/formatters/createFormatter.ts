/**
 * Formatter Factory
 *
 * Single point where formatters are instantiated.
 */

import type { Formatter, FormatterOptions } from './Formatter.js';
import { HumanFormatter } from './HumanFormatter.js';
import { JsonFormatter } from './JsonFormatter.js';
import { NullFormatter } from './NullFormatter.js';

/**
 * Supported formatter types
 */
export type FormatterType = 'human' | 'json' | 'null';

export const FORMATTER_TYPES: readonly FormatterType[] = ['human', 'json', 'null'];

/**
 * Create a formatter instance
 *
 * @example
 * ```ts
 * const formatter = createFormatter('human', { noColor: true });
 * const quiet = createFormatter('null');
 * ```
 */
export function createFormatter(type: FormatterType = 'human', options: FormatterOptions = {}): Formatter {
  switch (type) {
    case 'human':
      return new HumanFormatter(options);
    case 'json':
      return new JsonFormatter(options);
    case 'null':
      return new NullFormatter();
    default: {
      const exhaustiveCheck: never = type;
      throw new Error(
        `Unknown formatter type: "${String(exhaustiveCheck)}". Valid types: ${FORMATTER_TYPES.join(', ')}`
      );
    }
  }
}
