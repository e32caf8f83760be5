#!/usr/bin/env node
/**
 * flowcert CLI
 *
 * Command-line interface for the flowcert engine.
 *
 * Usage:
 *   flowcert validate <files>   Validate flow files (comma-separated)
 *   flowcert paths <file>       List root-to-terminal paths
 *   flowcert export <file>      Print or write the canonical document
 */

import { ExitCode } from '@flowcert/engine';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  console.error('Fatal error:', err.message);
  if (process.env.DEBUG && err.stack) {
    console.error(err.stack);
  }
  process.exit(ExitCode.INTERNAL_ERROR);
});
