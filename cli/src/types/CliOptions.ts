/**
 * CLI Command Options
 *
 * Parsed command-line options for the flowcert commands. Global options
 * (`--format`, `--no-color`, `--silent`, `--log-level`) are merged into each
 * command's own options through commander's optsWithGlobals().
 */

import type { LogLevelName, SerializerBackend } from '@flowcert/engine';
import type { FormatterType } from '../formatters/createFormatter.js';

/**
 * Options accepted by every command
 */
export interface CliGlobalOptions {
  /**
   * Output format
   */
  format?: FormatterType;

  /**
   * `false` when `--no-color` is given
   */
  color?: boolean;

  /**
   * Only errors and requested output (documents, failures)
   */
  silent?: boolean;

  /**
   * Engine log level; falls back to FLOWCERT_LOG_LEVEL, then 'warn'
   */
  logLevel?: LogLevelName;
}

/**
 * `flowcert validate` options
 */
export interface CliValidateOptions extends CliGlobalOptions {
  /**
   * Also list every root-to-terminal path
   */
  paths?: boolean;
}

export type CliPathsOptions = CliGlobalOptions;

/**
 * `flowcert export` options
 */
export interface CliExportOptions extends CliGlobalOptions {
  /**
   * File or directory to write to; stdout when omitted
   */
  output?: string;

  serializer?: SerializerBackend;

  /**
   * Refuse to export a flow that fails validation
   */
  strict?: boolean;
}
