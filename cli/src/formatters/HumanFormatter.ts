/**
 * Human-Readable Formatter
 *
 * Formats results for people at a terminal, with symbols and colors.
 *
 * Symbols:
 * - ✔ Valid flow
 * - ✖ Error
 * - ⚠ Warning
 */

import { Chalk, type ChalkInstance } from 'chalk';
import { FlowError, formatError, type FlowExport, type FlowPath, type ValidationResult } from '@flowcert/engine';
import type { FileOutcome, Formatter, FormatterOptions } from './Formatter.js';
import { StatusSymbols, divider, formatPath, pluralize } from '../utils/format.js';

export class HumanFormatter implements Formatter {
  private options: FormatterOptions;
  private color: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.color = new Chalk({ level: options.noColor ? 0 : 1 });
  }

  showValidation(file: string, result: ValidationResult, paths?: readonly FlowPath[]): void {
    const c = this.color;

    if (result.valid) {
      if (!this.options.silent) {
        console.log(c.green(`${StatusSymbols.success} ${file} is valid`));
      }
    } else {
      console.log(c.red.bold(`${StatusSymbols.failure} ${file} is invalid`));
    }

    for (const error of result.errors) {
      console.log(`  ${c.red(StatusSymbols.failure)} ${error}`);
    }

    if (this.options.silent) {
      return;
    }

    for (const warning of result.warnings) {
      console.log(`  ${c.yellow(StatusSymbols.warning)} ${warning}`);
    }

    if (paths) {
      this.printPaths(paths, '  ');
    }
  }

  showPaths(file: string, paths: readonly FlowPath[]): void {
    if (this.options.silent) {
      return;
    }
    console.log(this.color.bold(file));
    this.printPaths(paths, '');
  }

  showExport(exported: FlowExport): void {
    const { content } = exported;
    console.log(content.endsWith('\n') ? content.slice(0, -1) : content);
  }

  showSummary(outcomes: readonly FileOutcome[]): void {
    if (this.options.silent) {
      return;
    }

    const c = this.color;
    const valid = outcomes.filter((outcome) => outcome.status === 'valid').length;
    const failed = outcomes.length - valid;

    console.log();
    console.log(c.cyan(divider()));
    console.log(
      `Validated ${pluralize(outcomes.length, 'flow')}: ${c.green(`${valid} valid`)}, ${failed > 0 ? c.red(`${failed} failed`) : `${failed} failed`}`
    );

    for (const outcome of outcomes) {
      if (outcome.status !== 'valid') {
        console.log(`  - ${outcome.file}: ${outcome.message ?? outcome.status}`);
      }
    }
  }

  showError(error: Error): void {
    console.error();
    if (error instanceof FlowError) {
      console.error(formatError(error, !this.options.noColor));
      return;
    }
    console.error(this.color.red.bold(`${StatusSymbols.failure} Error:`), error.message);
  }

  showWarning(message: string): void {
    if (this.options.silent) {
      return;
    }
    console.warn(this.color.yellow(StatusSymbols.warning), message);
  }

  showInfo(message: string): void {
    if (this.options.silent) {
      return;
    }
    console.log(message);
  }

  private printPaths(paths: readonly FlowPath[], indent: string): void {
    if (paths.length === 0) {
      console.log(`${indent}${this.color.dim('No complete paths from a start node to a terminal message.')}`);
      return;
    }
    console.log(`${indent}Paths (${paths.length}):`);
    for (const path of paths) {
      console.log(`${indent}  ${formatPath(path)}`);
    }
  }
}
