/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON) for CI/CD and other tooling.
 * Every line carries a `type`: validation, paths, export, summary,
 * error, warning or info.
 */

import { FlowError, type FlowExport, type FlowPath, type ValidationResult } from '@flowcert/engine';
import type { FileOutcome, Formatter, FormatterOptions } from './Formatter.js';

export class JsonFormatter implements Formatter {
  private options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  showValidation(file: string, result: ValidationResult, paths?: readonly FlowPath[]): void {
    this.emit({
      type: 'validation',
      file,
      valid: result.valid,
      errors: result.errors,
      warnings: result.warnings,
      paths,
    });
  }

  showPaths(file: string, paths: readonly FlowPath[]): void {
    this.emit({ type: 'paths', file, paths });
  }

  showExport(exported: FlowExport): void {
    this.emit({ type: 'export', filename: exported.filename, content: exported.content });
  }

  showSummary(outcomes: readonly FileOutcome[]): void {
    this.emit({
      type: 'summary',
      total: outcomes.length,
      valid: outcomes.filter((outcome) => outcome.status === 'valid').length,
      files: outcomes,
    });
  }

  showError(error: Error): void {
    const payload = error instanceof FlowError ? error.toJSON() : { name: error.name, message: error.message };
    console.error(JSON.stringify({ type: 'error', error: payload }));
  }

  showWarning(message: string): void {
    if (!this.options.silent) {
      this.emit({ type: 'warning', message });
    }
  }

  showInfo(message: string): void {
    if (!this.options.silent) {
      this.emit({ type: 'info', message });
    }
  }

  private emit(payload: Record<string, unknown>): void {
    console.log(JSON.stringify(payload));
  }
}
