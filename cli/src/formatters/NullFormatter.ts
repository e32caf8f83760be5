/**
 * Null Formatter
 *
 * Produces no output. Useful for scripting (only the exit code matters)
 * and for tests.
 */

import type { FlowExport, FlowPath, ValidationResult } from '@flowcert/engine';
import type { FileOutcome, Formatter } from './Formatter.js';

export class NullFormatter implements Formatter {
  showValidation(_file: string, _result: ValidationResult, _paths?: readonly FlowPath[]): void {}

  showPaths(_file: string, _paths: readonly FlowPath[]): void {}

  showExport(_exported: FlowExport): void {}

  showSummary(_outcomes: readonly FileOutcome[]): void {}

  showError(_error: Error): void {}

  showWarning(_message: string): void {}

  showInfo(_message: string): void {}
}
