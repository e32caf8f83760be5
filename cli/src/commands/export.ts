/**
 * Export Command
 *
 * Emits the canonical, diff-stable document of a flow, to stdout or to a
 * file. The output is the same for flows that differ only in node or
 * edge declaration order.
 *
 * Usage:
 *   flowcert export support.yaml
 *   flowcert export support.yaml -o flows/             (writes flows/<slug>.yaml)
 *   flowcert export support.yaml -o out.yaml --serializer plain
 *   flowcert export support.yaml --strict              (refuse invalid flows)
 *
 * Without --strict an invalid flow is still exported, with a warning.
 */

import { stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Option, type Command } from 'commander';
import {
  ExitCode,
  FlowError,
  FlowLoader,
  SERIALIZER_BACKENDS,
  type Flow,
  type FlowEngine,
} from '@flowcert/engine';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliExportOptions } from '../types/CliOptions.js';
import { createCommandContext } from '../utils/context.js';
import { pluralize } from '../utils/format.js';

export function registerExportCommand(program: Command): void {
  program
    .command('export <file>')
    .description('Print or write the canonical document of a flow')
    .option('-o, --output <path>', 'File or directory to write to (default: stdout)')
    .addOption(new Option('--serializer <backend>', 'Document renderer').choices(SERIALIZER_BACKENDS))
    .option('--strict', 'Refuse to export a flow that fails validation')
    .action(async (file: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<CliExportOptions>();
      const { formatter, engine } = createCommandContext(
        options,
        options.serializer ? { serializer: options.serializer } : {}
      );
      process.exitCode = await exportFlowFile(file, options, formatter, engine);
    });
}

/**
 * Export command handler
 *
 * @returns Process exit code
 */
export async function exportFlowFile(
  file: string,
  options: CliExportOptions,
  formatter: Formatter,
  engine: FlowEngine
): Promise<ExitCode> {
  let flow: Flow;
  try {
    flow = await FlowLoader.fromFile(file);
  } catch (error) {
    if (error instanceof FlowError) {
      formatter.showError(error);
      return error.exitCode;
    }
    throw error;
  }

  const result = engine.validate(flow);
  if (!result.valid) {
    if (options.strict) {
      formatter.showValidation(file, result);
      return ExitCode.VALIDATION_FAILED;
    }
    formatter.showWarning(
      `${file} failed validation with ${pluralize(result.errors.length, 'error')}; exporting anyway (use --strict to refuse)`
    );
  }

  const exported = engine.exportFlow(flow);

  if (!options.output) {
    formatter.showExport(exported);
    return ExitCode.SUCCESS;
  }

  const target = (await isDirectory(options.output)) ? join(options.output, exported.filename) : options.output;
  await writeFile(target, exported.content, 'utf-8');
  formatter.showInfo(`Wrote ${target}`);
  return ExitCode.SUCCESS;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
