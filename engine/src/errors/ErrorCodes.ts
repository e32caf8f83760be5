/**
 * flowcert Error Codes
 *
 * Structured diagnostic codes for the layers around the analysis core
 * (loader, parser, CLI). The core itself reports problems as plain
 * sentences in a ValidationResult and never throws for bad graphs.
 *
 * Format: FLW-[Category]-[Number]
 *
 * Categories:
 * - S: Schema/Structure errors (syntax, field types)
 * - L: Load errors (missing or unreadable files)
 * - V: Validation errors (structurally unsound graph)
 * - I: Internal errors
 *
 * ADDING NEW ERRORS:
 * 1. Add error code enum value below
 * 2. Add description in getErrorDescription()
 * 3. Add exit code mapping in getExitCodeForError()
 *
 * @module errors
 */

/**
 * Process exit codes used by the CLI
 */
export enum ExitCode {
  SUCCESS = 0,
  VALIDATION_FAILED = 1,
  INVALID_SCHEMA = 2,
  FILE_NOT_FOUND = 3,
  INTERNAL_ERROR = 4,
}

export enum FlowErrorCode {
  /** Malformed YAML/JSON syntax */
  SCHEMA_PARSE_ERROR = 'FLW-S-001',

  /** Value does not match the flow schema */
  SCHEMA_INVALID = 'FLW-S-002',

  /** Unknown node type */
  SCHEMA_UNKNOWN_NODE_TYPE = 'FLW-S-003',

  /** Flow file does not exist */
  LOAD_FILE_NOT_FOUND = 'FLW-L-001',

  /** Flow file could not be read */
  LOAD_READ_FAILED = 'FLW-L-002',

  /** Structural validation reported errors */
  VALIDATION_FAILED = 'FLW-V-001',

  /** Unexpected failure */
  INTERNAL = 'FLW-I-001',
}

export function getErrorDescription(code: FlowErrorCode): string {
  switch (code) {
    case FlowErrorCode.SCHEMA_PARSE_ERROR:
      return 'The flow document is not valid YAML or JSON.';
    case FlowErrorCode.SCHEMA_INVALID:
      return 'The flow document does not match the expected shape (id, name, nodes, edges, metadata).';
    case FlowErrorCode.SCHEMA_UNKNOWN_NODE_TYPE:
      return 'A node declares a type other than question, action or message.';
    case FlowErrorCode.LOAD_FILE_NOT_FOUND:
      return 'The flow file does not exist at the given path.';
    case FlowErrorCode.LOAD_READ_FAILED:
      return 'The flow file exists but could not be read.';
    case FlowErrorCode.VALIDATION_FAILED:
      return 'The flow graph is structurally unsound.';
    case FlowErrorCode.INTERNAL:
      return 'An unexpected internal error occurred.';
  }
}

export function getExitCodeForError(code: FlowErrorCode): ExitCode {
  switch (code) {
    case FlowErrorCode.SCHEMA_PARSE_ERROR:
    case FlowErrorCode.SCHEMA_INVALID:
    case FlowErrorCode.SCHEMA_UNKNOWN_NODE_TYPE:
      return ExitCode.INVALID_SCHEMA;
    case FlowErrorCode.LOAD_FILE_NOT_FOUND:
    case FlowErrorCode.LOAD_READ_FAILED:
      return ExitCode.FILE_NOT_FOUND;
    case FlowErrorCode.VALIDATION_FAILED:
      return ExitCode.VALIDATION_FAILED;
    case FlowErrorCode.INTERNAL:
      return ExitCode.INTERNAL_ERROR;
  }
}

/**
 * Get error category from code (Schema, Load, Validation, Internal)
 */
export function getErrorCategory(code: FlowErrorCode): string {
  const category = code.split('-')[1];
  switch (category) {
    case 'S':
      return 'SchemaError';
    case 'L':
      return 'LoadError';
    case 'V':
      return 'ValidationError';
    default:
      return 'InternalError';
  }
}
