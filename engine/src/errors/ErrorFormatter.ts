/**
 * Error Formatter
 *
 * Renders flowcert errors for terminal display.
 *
 * ```typescript
 * console.error(formatError(error));
 * console.error(formatError(error, false)); // CI logs
 * ```
 *
 * @module errors
 */

import { Chalk } from 'chalk';
import { FlowError, FlowSchemaError } from './FlowError.js';

/**
 * Multi-line rendering: header, location, message, schema issues and hint
 */
export function formatError(error: FlowError, useColors: boolean = true): string {
  const c = new Chalk({ level: useColors ? 1 : 0 });
  const lines: string[] = [];

  lines.push(`${c.red(`✗ ${error.name}`)} ${c.gray(`[${error.code}]`)}`);

  if (error.path) {
    lines.push(c.dim(`at ${c.cyan(error.path)}`));
  }

  lines.push('');
  lines.push(c.bold(error.message));

  if (error instanceof FlowSchemaError && error.issues.length > 1) {
    for (const issue of error.issues) {
      lines.push(`  - ${issue}`);
    }
  }

  if (error.hint) {
    lines.push('');
    lines.push(`${c.blue('→ Hint:')} ${error.hint}`);
  }

  return lines.join('\n');
}
