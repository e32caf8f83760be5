/**
 * Base flowcert Error Class
 *
 * Foundation for errors raised around the analysis core.
 * Provides structured error information for CLI and API integrations.
 *
 * @module errors
 */

import {
  ExitCode,
  FlowErrorCode,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
} from './ErrorCodes.js';

/**
 * Diagnostic error information
 */
export interface FlowErrorDiagnostic {
  /** Structured error code (e.g., FLW-S-002) */
  code: FlowErrorCode;

  /** Human-readable error message */
  message: string;

  /** Process exit code (derived from the code when omitted) */
  exitCode?: ExitCode;

  /** Location of the problem (e.g., "nodes.2.type" or a file path) */
  path?: string;

  /** Suggestion for fixing the error */
  hint?: string;

  /** Additional context data for debugging */
  context?: Record<string, unknown>;
}

/**
 * Base error class for all flowcert errors
 *
 * @example
 * ```typescript
 * throw new FlowError({
 *   code: FlowErrorCode.LOAD_FILE_NOT_FOUND,
 *   message: 'Flow file not found: ./support.yaml',
 *   path: './support.yaml',
 * });
 * ```
 */
export class FlowError extends Error {
  readonly code: FlowErrorCode;
  readonly exitCode: ExitCode;
  readonly path?: string;
  readonly hint?: string;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(diagnostic: FlowErrorDiagnostic) {
    super(diagnostic.message);
    this.name = getErrorCategory(diagnostic.code);
    this.code = diagnostic.code;
    this.exitCode = diagnostic.exitCode ?? getExitCodeForError(diagnostic.code);
    this.path = diagnostic.path;
    this.hint = diagnostic.hint;
    this.context = diagnostic.context;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  /**
   * Format error as string for logging/display
   */
  toString(): string {
    let msg = `${this.name} [${this.code}]`;

    if (this.path) {
      msg += ` at ${this.path}`;
    }

    msg += `\n\n${this.message}`;

    if (this.hint) {
      msg += `\n\nHint: ${this.hint}`;
    }

    return msg;
  }

  /**
   * Convert to JSON for structured logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      exitCode: this.exitCode,
      message: this.message,
      description: this.description,
      path: this.path,
      hint: this.hint,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Raised when a document does not parse or does not match the flow schema
 */
export class FlowSchemaError extends FlowError {
  /** One line per problem, `path.to.field: message` */
  readonly issues: readonly string[];

  constructor(diagnostic: FlowErrorDiagnostic & { issues?: readonly string[] }) {
    super(diagnostic);
    this.issues = diagnostic.issues ?? [diagnostic.message];
  }

  /**
   * Create a syntax error for unparseable YAML/JSON
   */
  static syntax(format: 'YAML' | 'JSON', reason: string, location?: string): FlowSchemaError {
    return new FlowSchemaError({
      code: FlowErrorCode.SCHEMA_PARSE_ERROR,
      message: `${format} parsing failed: ${reason}`,
      path: location,
      hint: `Check the ${format} syntax of the flow document.`,
    });
  }
}

/**
 * Raised when a flow file cannot be found or read
 */
export class FlowLoadError extends FlowError {
  static notFound(filePath: string, resolvedPath: string): FlowLoadError {
    return new FlowLoadError({
      code: FlowErrorCode.LOAD_FILE_NOT_FOUND,
      message: `Flow file not found: ${filePath}`,
      path: filePath,
      hint: 'Check the path and file name.',
      context: { resolvedPath },
    });
  }

  static readFailed(filePath: string, reason: string): FlowLoadError {
    return new FlowLoadError({
      code: FlowErrorCode.LOAD_READ_FAILED,
      message: `Failed to read flow file: ${reason}`,
      path: filePath,
    });
  }
}
