import type { CanonicalList, CanonicalMap, CanonicalScalar, CanonicalValue } from './CanonicalDocument.js';
import type { FlowSerializer } from './FlowSerializer.js';

const INDENT = '  ';

/** Longest key YAML allows in implicit `key: value` form */
const MAX_IMPLICIT_KEY_LENGTH = 1024;

/** Values a YAML 1.2 core-schema reader would not load back as strings */
const NON_STRING_SCALAR =
  /^(?:~|null|Null|NULL|true|True|TRUE|false|False|FALSE|[-+]?(?:\d+|\d*\.\d+|\d+\.\d*)(?:[eE][-+]?\d+)?|0x[0-9a-fA-F]+|0o[0-7]+|[-+]?\.(?:inf|Inf|INF)|\.(?:nan|NaN|NAN))$/;

const INDICATOR_START = /^[,[\]{}#&*!|>'"%@`]/;
const BARE_INDICATOR_START = /^[-?:](?:\s|$)/;

function isMap(value: CanonicalValue): value is CanonicalMap {
  return value instanceof Map;
}

function isList(value: CanonicalValue): value is CanonicalList {
  return Array.isArray(value);
}

/**
 * Whether a string can be written as a plain (unquoted) scalar
 */
export function isPlainSafe(text: string): boolean {
  return (
    text.length > 0 &&
    text === text.trim() &&
    !NON_STRING_SCALAR.test(text) &&
    !INDICATOR_START.test(text) &&
    !BARE_INDICATOR_START.test(text) &&
    !/[\n\r\t]/.test(text) &&
    !text.includes(': ') &&
    !text.includes(' #') &&
    !text.endsWith(':')
  );
}

function scalarText(value: CanonicalScalar): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return isPlainSafe(value) ? value : JSON.stringify(value);
  }
  return String(value);
}

/**
 * Dependency-free renderer producing the same block structure as the
 * `yaml` backend: indentation-based mappings, `- item` sequences,
 * `{}` and `[]` for empty containers, and explicit `? key` / `: value`
 * pairs for keys too long to be implicit.
 */
export class PlainSerializer implements FlowSerializer {
  readonly backend = 'plain' as const;

  render(document: CanonicalMap): string {
    const lines = this.renderMap(document, 0);
    return lines.length > 0 ? `${lines.join('\n')}\n` : '{}\n';
  }

  private renderMap(map: CanonicalMap, level: number): string[] {
    const pad = INDENT.repeat(level);
    const lines: string[] = [];

    for (const [key, value] of map) {
      const keyText = scalarText(key);
      if (keyText.length > MAX_IMPLICIT_KEY_LENGTH) {
        lines.push(`${pad}? ${keyText}`, ...this.explicitValue(value, level));
        continue;
      }

      const entry = `${pad}${keyText}:`;
      if (isMap(value)) {
        if (value.size === 0) {
          lines.push(`${entry} {}`);
        } else {
          lines.push(entry, ...this.renderMap(value, level + 1));
        }
      } else if (isList(value)) {
        if (value.length === 0) {
          lines.push(`${entry} []`);
        } else {
          lines.push(entry, ...this.renderList(value, level + 1));
        }
      } else {
        lines.push(`${entry} ${scalarText(value)}`);
      }
    }

    return lines;
  }

  private renderList(list: CanonicalList, level: number): string[] {
    const pad = INDENT.repeat(level);
    const lines: string[] = [];

    for (const item of list) {
      if (isMap(item)) {
        if (item.size === 0) {
          lines.push(`${pad}- {}`);
        } else {
          lines.push(...this.hang(this.renderMap(item, level + 1), pad));
        }
      } else if (isList(item)) {
        if (item.length === 0) {
          lines.push(`${pad}- []`);
        } else {
          lines.push(...this.hang(this.renderList(item, level + 1), pad));
        }
      } else {
        lines.push(`${pad}- ${scalarText(item)}`);
      }
    }

    return lines;
  }

  /**
   * The `: value` half of an explicit pair; a nested block starts on the
   * indicator line
   */
  private explicitValue(value: CanonicalValue, level: number): string[] {
    const pad = INDENT.repeat(level);
    if (isMap(value)) {
      return value.size === 0 ? [`${pad}: {}`] : this.hang(this.renderMap(value, level + 1), pad, ':');
    }
    if (isList(value)) {
      return value.length === 0 ? [`${pad}: []`] : this.hang(this.renderList(value, level + 1), pad, ':');
    }
    return [`${pad}: ${scalarText(value)}`];
  }

  /**
   * Pull the first line of a nested block up behind a `- ` (or `: `) marker
   */
  private hang(block: string[], pad: string, marker = '-'): string[] {
    const [first, ...rest] = block;
    return [`${pad}${marker} ${first.trimStart()}`, ...rest];
  }
}
