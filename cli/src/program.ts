/**
 * flowcert program definition
 *
 * Builds the commander program without parsing anything, so that the
 * entry point and tests share one definition.
 */

import { Command, Option } from 'commander';
import { registerValidateCommand } from './commands/validate.js';
import { registerPathsCommand } from './commands/paths.js';
import { registerExportCommand } from './commands/export.js';
import { FORMATTER_TYPES } from './formatters/createFormatter.js';

export const CLI_VERSION = '0.1.0';

export const LOG_LEVEL_CHOICES: readonly string[] = ['debug', 'info', 'warn', 'error', 'silent'];

export function createProgram(): Command {
  const program = new Command();

  program
    .name('flowcert')
    .description('Structural validation, path enumeration and canonical export for conversational flows')
    .version(CLI_VERSION, '-v, --version', 'Show version number')
    .helpOption('-h, --help', 'Show help')
    .addOption(new Option('-f, --format <format>', 'Output format').choices(FORMATTER_TYPES).default('human'))
    .option('--no-color', 'Disable colored output')
    .option('-s, --silent', 'Minimal output')
    .addOption(new Option('--log-level <level>', 'Engine log level (default: warn)').choices(LOG_LEVEL_CHOICES));

  registerValidateCommand(program);
  registerPathsCommand(program);
  registerExportCommand(program);

  return program;
}

export { validateFlows, determineExitCode } from './commands/validate.js';
export { listPaths } from './commands/paths.js';
export { exportFlowFile } from './commands/export.js';
export { createFormatter, type FormatterType } from './formatters/createFormatter.js';
export type { Formatter, FormatterOptions, FileOutcome } from './formatters/Formatter.js';
export { formatPath } from './utils/format.js';
