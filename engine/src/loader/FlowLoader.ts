/**
 * Flow Loader
 *
 * File I/O in front of the parser: reads a flow document from disk and
 * hands the text to FlowParser. The analysis core never touches the
 * filesystem; CLI and API callers decide what to load.
 *
 * ```ts
 * const flow = await FlowLoader.fromFile('./flows/support.yaml');
 * const report = analyze(flow);
 * ```
 *
 * @module loader
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Flow } from '../types/flow-types.js';
import { FlowParser } from '../parser/FlowParser.js';
import { FlowLoadError } from '../errors/FlowError.js';
import { LoggerManager } from '../logging/LoggerManager.js';

export class FlowLoader {
  /**
   * Load and parse a flow file (.yaml, .yml or .json)
   *
   * @throws {FlowLoadError} when the file is missing or unreadable
   * @throws {FlowSchemaError} when its content is not a flow document
   */
  static async fromFile(filePath: string): Promise<Flow> {
    const resolvedPath = resolve(filePath);

    let content: string;
    try {
      content = await readFile(resolvedPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw FlowLoadError.notFound(filePath, resolvedPath);
      }
      throw FlowLoadError.readFailed(filePath, error instanceof Error ? error.message : String(error));
    }

    LoggerManager.tryGetLogger()?.debug('Read flow file', { path: resolvedPath, bytes: content.length });
    return FlowParser.fromContent(content, resolvedPath);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
