/**
 * Base Formatter Interface
 *
 * All formatters must implement this interface.
 * Formatters are the ONLY place where console output is allowed in the CLI.
 *
 * - Command: decides WHAT to display and WHEN
 * - Formatter: decides HOW it looks (colors, symbols, JSON lines)
 * - Console: where output goes (stdout for results, stderr for errors)
 *
 * Engine log lines go to stderr through the engine's own logger and never
 * pass through a formatter.
 */

import type { FlowExport, FlowPath, ValidationResult } from '@flowcert/engine';

/**
 * Formatter options
 */
export interface FormatterOptions {
  /** Disable colors (for CI/CD or terminals without color support) */
  noColor?: boolean;

  /** Silent mode (only errors) */
  silent?: boolean;
}

/**
 * Outcome of validating one file, as shown in summaries
 */
export interface FileOutcome {
  file: string;
  /** 'error' when the file could not be loaded or parsed */
  status: 'valid' | 'invalid' | 'error';
  message?: string;
}

export interface Formatter {
  /**
   * Display the validation result of one flow file
   *
   * @param paths - Root-to-terminal paths, when requested
   */
  showValidation(file: string, result: ValidationResult, paths?: readonly FlowPath[]): void;

  /**
   * Display the paths of one flow file
   */
  showPaths(file: string, paths: readonly FlowPath[]): void;

  /**
   * Display the canonical document of a flow
   */
  showExport(exported: FlowExport): void;

  /**
   * Display the overall outcome of a multi-file validation
   */
  showSummary(outcomes: readonly FileOutcome[]): void;

  /**
   * Display an error (missing file, schema error, unexpected failure)
   */
  showError(error: Error): void;

  showWarning(message: string): void;

  showInfo(message: string): void;
}
