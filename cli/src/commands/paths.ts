/**
 * Paths Command
 *
 * Lists every simple path from a start node to a terminal message node,
 * for review and test-case generation. Works on invalid flows too.
 *
 * Usage:
 *   flowcert paths support.yaml
 *   flowcert paths support.yaml -f json
 */

import type { Command } from 'commander';
import { ExitCode, FlowError, FlowLoader, type FlowEngine } from '@flowcert/engine';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliPathsOptions } from '../types/CliOptions.js';
import { createCommandContext } from '../utils/context.js';

export function registerPathsCommand(program: Command): void {
  program
    .command('paths <file>')
    .description('List every path from a start node to a terminal message')
    .action(async (file: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<CliPathsOptions>();
      const { formatter, engine } = createCommandContext(options);
      process.exitCode = await listPaths(file, formatter, engine);
    });
}

/**
 * Paths command handler
 *
 * @returns Process exit code
 */
export async function listPaths(file: string, formatter: Formatter, engine: FlowEngine): Promise<ExitCode> {
  try {
    const flow = await FlowLoader.fromFile(file);
    formatter.showPaths(file, engine.enumeratePaths(flow));
    return ExitCode.SUCCESS;
  } catch (error) {
    if (error instanceof FlowError) {
      formatter.showError(error);
      return error.exitCode;
    }
    throw error;
  }
}
