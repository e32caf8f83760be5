import YAML from 'yaml';
import type { CanonicalMap } from './CanonicalDocument.js';
import type { FlowSerializer } from './FlowSerializer.js';

/**
 * Renders canonical documents with the `yaml` library:
 * two-space indentation, indented block sequences, no line folding.
 */
export class YamlSerializer implements FlowSerializer {
  readonly backend = 'yaml' as const;

  render(document: CanonicalMap): string {
    return YAML.stringify(document, {
      indent: 2,
      indentSeq: true,
      lineWidth: 0,
      aliasDuplicateObjects: false,
    });
  }
}
