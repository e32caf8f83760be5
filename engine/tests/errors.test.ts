import { describe, expect, it } from 'vitest';
import {
  ExitCode,
  FlowErrorCode,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
} from '../src/errors/ErrorCodes.js';
import { FlowError, FlowLoadError, FlowSchemaError } from '../src/errors/FlowError.js';
import { formatError } from '../src/errors/ErrorFormatter.js';
import {
  findClosestMatch,
  findMatches,
  levenshteinDistance,
  similarityScore,
} from '../src/errors/TypoDetector.js';
import { NODE_KINDS } from '../src/types/flow-types.js';
import { FLOW_FIELDS } from '../src/parser/FlowSchema.js';

describe('error codes', () => {
  it('maps every code to an exit code', () => {
    expect(getExitCodeForError(FlowErrorCode.SCHEMA_PARSE_ERROR)).toBe(ExitCode.INVALID_SCHEMA);
    expect(getExitCodeForError(FlowErrorCode.SCHEMA_UNKNOWN_NODE_TYPE)).toBe(ExitCode.INVALID_SCHEMA);
    expect(getExitCodeForError(FlowErrorCode.LOAD_READ_FAILED)).toBe(ExitCode.FILE_NOT_FOUND);
    expect(getExitCodeForError(FlowErrorCode.VALIDATION_FAILED)).toBe(ExitCode.VALIDATION_FAILED);
    expect(getExitCodeForError(FlowErrorCode.INTERNAL)).toBe(ExitCode.INTERNAL_ERROR);
  });

  it('derives categories from the code prefix', () => {
    expect(getErrorCategory(FlowErrorCode.SCHEMA_INVALID)).toBe('SchemaError');
    expect(getErrorCategory(FlowErrorCode.LOAD_FILE_NOT_FOUND)).toBe('LoadError');
    expect(getErrorCategory(FlowErrorCode.VALIDATION_FAILED)).toBe('ValidationError');
    expect(getErrorCategory(FlowErrorCode.INTERNAL)).toBe('InternalError');
  });
});

describe('FlowError', () => {
  const notFound = FlowLoadError.notFound('missing.yaml', '/work/missing.yaml');

  it('carries diagnostics', () => {
    expect(notFound).toBeInstanceOf(FlowError);
    expect(notFound.name).toBe('LoadError');
    expect(notFound.exitCode).toBe(ExitCode.FILE_NOT_FOUND);
    expect(notFound.description).toBe(getErrorDescription(FlowErrorCode.LOAD_FILE_NOT_FOUND));
    expect(notFound.context).toEqual({ resolvedPath: '/work/missing.yaml' });
  });

  it('renders as text and JSON', () => {
    expect(notFound.toString()).toBe(
      'LoadError [FLW-L-001] at missing.yaml\n\nFlow file not found: missing.yaml\n\nHint: Check the path and file name.'
    );
    expect(notFound.toJSON()).toMatchObject({
      name: 'LoadError',
      code: 'FLW-L-001',
      exitCode: 3,
      path: 'missing.yaml',
    });
  });

  it('lets the caller override the exit code', () => {
    const error = new FlowError({ code: FlowErrorCode.INTERNAL, message: 'x', exitCode: ExitCode.VALIDATION_FAILED });

    expect(error.exitCode).toBe(ExitCode.VALIDATION_FAILED);
  });

  it('defaults schema issues to the message', () => {
    const error = FlowSchemaError.syntax('JSON', 'Unexpected end of JSON input');

    expect(error.message).toBe('JSON parsing failed: Unexpected end of JSON input');
    expect(error.issues).toEqual(['JSON parsing failed: Unexpected end of JSON input']);
  });
});

describe('formatError', () => {
  it('renders header, location, message and hint without colors', () => {
    expect(formatError(FlowLoadError.notFound('missing.yaml', '/work/missing.yaml'), false)).toBe(
      ['✗ LoadError [FLW-L-001]', 'at missing.yaml', '', 'Flow file not found: missing.yaml', '', '→ Hint: Check the path and file name.'].join('\n')
    );
  });

  it('lists schema issues when there are several', () => {
    const error = new FlowSchemaError({
      code: FlowErrorCode.SCHEMA_INVALID,
      message: 'Invalid flow document (2 issues)',
      issues: ['name: Required', 'nodes: Required'],
    });

    expect(formatError(error, false)).toBe(
      ['✗ SchemaError [FLW-S-002]', '', 'Invalid flow document (2 issues)', '  - name: Required', '  - nodes: Required'].join('\n')
    );
  });
});

describe('TypoDetector', () => {
  it('computes edit distance and similarity', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(similarityScore('Message', 'message')).toBe(1);
  });

  it('suggests close candidates only', () => {
    expect(findClosestMatch('mesage', NODE_KINDS)).toBe('message');
    expect(findClosestMatch('zzz', NODE_KINDS)).toBeUndefined();
    expect(findMatches('nme', FLOW_FIELDS)).toEqual(['name']);
  });
});
