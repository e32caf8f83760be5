/**
 * Validate Command
 *
 * Certifies one or more flow files: loads and schema-checks each one,
 * then runs the structural validator.
 *
 * Usage:
 *   flowcert validate support.yaml
 *   flowcert validate a.yaml,b.yaml,c.json  (validate multiple)
 *   flowcert validate support.yaml --paths  (also list paths)
 *
 * Exit codes (the most severe outcome across files wins):
 *   0 - All flows valid
 *   1 - One or more flows structurally invalid
 *   2 - A file is not a valid flow document
 *   3 - A file does not exist or cannot be read
 */

import type { Command } from 'commander';
import { ExitCode, FlowError, FlowLoader, type Flow, type FlowEngine } from '@flowcert/engine';
import type { FileOutcome, Formatter } from '../formatters/Formatter.js';
import type { CliValidateOptions } from '../types/CliOptions.js';
import { createCommandContext } from '../utils/context.js';

/**
 * Register the validate command
 */
export function registerValidateCommand(program: Command): void {
  program
    .command('validate <files>')
    .description('Validate one or more flow files (comma-separated for multiple)')
    .option('--paths', 'Also list every path from a start node to a terminal message')
    .action(async (files: string, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<CliValidateOptions>();
      const { formatter, engine } = createCommandContext(options);
      process.exitCode = await validateFlows(files, options, formatter, engine);
    });
}

/**
 * Validate command handler
 *
 * @returns Process exit code
 */
export async function validateFlows(
  fileList: string,
  options: CliValidateOptions,
  formatter: Formatter,
  engine: FlowEngine
): Promise<ExitCode> {
  const files = fileList
    .split(',')
    .map((file) => file.trim())
    .filter((file) => file.length > 0);

  if (files.length === 0) {
    formatter.showError(new Error('No flow files provided'));
    return ExitCode.VALIDATION_FAILED;
  }

  const outcomes: FileOutcome[] = [];
  const exitCodes: ExitCode[] = [];

  for (const file of files) {
    let flow: Flow;
    try {
      flow = await FlowLoader.fromFile(file);
    } catch (error) {
      if (!(error instanceof FlowError)) {
        throw error;
      }
      formatter.showError(error);
      outcomes.push({ file, status: 'error', message: error.message });
      exitCodes.push(error.exitCode);
      continue;
    }

    if (options.paths) {
      const report = engine.analyze(flow);
      formatter.showValidation(file, report, report.paths);
      outcomes.push(outcomeOf(file, report.valid, report.errors));
      exitCodes.push(report.valid ? ExitCode.SUCCESS : ExitCode.VALIDATION_FAILED);
    } else {
      const result = engine.validate(flow);
      formatter.showValidation(file, result);
      outcomes.push(outcomeOf(file, result.valid, result.errors));
      exitCodes.push(result.valid ? ExitCode.SUCCESS : ExitCode.VALIDATION_FAILED);
    }
  }

  if (files.length > 1) {
    formatter.showSummary(outcomes);
  }

  return determineExitCode(exitCodes);
}

function outcomeOf(file: string, valid: boolean, errors: readonly string[]): FileOutcome {
  return valid ? { file, status: 'valid' } : { file, status: 'invalid', message: errors[0] };
}

/**
 * Most severe exit code; missing files outrank schema errors, which
 * outrank structural failures
 */
export function determineExitCode(codes: readonly ExitCode[]): ExitCode {
  return codes.reduce<ExitCode>((worst, code) => (code > worst ? code : worst), ExitCode.SUCCESS);
}
