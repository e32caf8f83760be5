import { describe, expect, it } from 'vitest';
import { FlowParser } from '../src/parser/FlowParser.js';
import { ExitCode, FlowErrorCode } from '../src/errors/ErrorCodes.js';
import { FlowSchemaError } from '../src/errors/FlowError.js';

function schemaError(run: () => unknown): FlowSchemaError {
  try {
    run();
  } catch (error) {
    if (error instanceof FlowSchemaError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a FlowSchemaError');
}

describe('FlowParser.parse', () => {
  it('builds a typed flow and fills in defaults', () => {
    const flow = FlowParser.parse({
      id: 'f',
      name: 'F',
      nodes: [
        { id: 'q', type: 'question', data: { question: 'Go?', expectedAnswers: ['yes', 1, true], custom: 'keep' } },
        { id: 'm', type: 'message', label: 'Bye' },
      ],
      edges: [{ source: 'q', target: 'm', via_label: 'yes' }],
    });

    expect(flow).toEqual({
      id: 'f',
      name: 'F',
      nodes: [
        { id: 'q', type: 'question', data: { question: 'Go?', expectedAnswers: ['yes', '1', 'true'], custom: 'keep' } },
        { id: 'm', type: 'message', label: 'Bye', data: {} },
      ],
      edges: [{ source: 'q', target: 'm', viaLabel: 'yes', data: {} }],
      metadata: {},
    });
  });

  it('accepts viaLabel and drops a null label', () => {
    const flow = FlowParser.parse({
      id: 'f',
      name: 'F',
      nodes: [],
      edges: [
        { source: 'a', target: 'b', viaLabel: 'no' },
        { source: 'a', target: 'c', viaLabel: null },
      ],
    });

    expect(flow.edges[0].viaLabel).toBe('no');
    expect('viaLabel' in flow.edges[1]).toBe(false);
  });

  it('suggests the closest node type for a misspelt one', () => {
    const error = schemaError(() =>
      FlowParser.parse({ id: 'f', name: 'F', nodes: [{ id: 'q', type: 'questoin' }] })
    );

    expect(error.code).toBe(FlowErrorCode.SCHEMA_UNKNOWN_NODE_TYPE);
    expect(error.message).toBe('Unknown node type "questoin" at nodes.0.type');
    expect(error.path).toBe('nodes.0.type');
    expect(error.hint).toBe('Did you mean "question"?');
    expect(error.exitCode).toBe(ExitCode.INVALID_SCHEMA);
  });

  it('lists every problem as path: message', () => {
    const error = schemaError(() => FlowParser.parse({ id: 'f', nodes: [{ id: 1, type: 'action' }] }));

    expect(error.code).toBe(FlowErrorCode.SCHEMA_INVALID);
    expect(error.issues).toEqual(['name: Required', 'nodes.0.id: Expected string, received number']);
    expect(error.message).toBe('Invalid flow document (2 issues)');
    expect(error.path).toBe('name');
  });

  it('hints at a misspelt top-level field', () => {
    const error = schemaError(() => FlowParser.parse({ id: 'f', name: 'F', nodez: [] }));

    expect(error.message).toBe('Invalid flow document: nodes: Required');
    expect(error.hint).toBe('Unknown field "nodez". Did you mean "nodes"?');
  });

  it('reports a non-object document at the root', () => {
    const error = schemaError(() => FlowParser.parse('just text'));

    expect(error.issues).toEqual(['Expected object, received string']);
    expect(error.path).toBeUndefined();
  });
});

describe('FlowParser text input', () => {
  const yaml = [
    'id: support',
    'name: Support',
    'nodes:',
    '  - id: start',
    '    type: question',
    '    data:',
    '      expectedAnswers: [yes, no]',
    '  - id: end',
    '    type: message',
    'edges:',
    '  - source: start',
    '    target: end',
    '    viaLabel: yes',
  ].join('\n');

  it('parses YAML', () => {
    const flow = FlowParser.fromYAML(yaml);

    expect(flow.nodes.map((node) => node.id)).toEqual(['start', 'end']);
    expect(flow.edges).toEqual([{ source: 'start', target: 'end', viaLabel: 'yes', data: {} }]);
  });

  it('parses JSON by file extension', () => {
    const json = JSON.stringify({ id: 'j', name: 'J', nodes: [{ id: 'm', type: 'message' }] });

    expect(FlowParser.fromContent(json, 'flow.json').nodes).toEqual([{ id: 'm', type: 'message', data: {} }]);
    expect(FlowParser.fromContent(json).id).toBe('j');
  });

  it('wraps syntax errors', () => {
    const yamlError = schemaError(() => FlowParser.fromYAML('id: [unclosed'));
    const jsonError = schemaError(() => FlowParser.fromJSON('{'));

    expect(yamlError.code).toBe(FlowErrorCode.SCHEMA_PARSE_ERROR);
    expect(yamlError.message.startsWith('YAML parsing failed: ')).toBe(true);
    expect(jsonError.code).toBe(FlowErrorCode.SCHEMA_PARSE_ERROR);
    expect(jsonError.message.startsWith('JSON parsing failed: ')).toBe(true);
  });
});

describe('FlowParser.safeParse', () => {
  it('returns the flow or the error instead of throwing', () => {
    const ok = FlowParser.safeParse({ id: 'f', name: 'F', nodes: [] });
    const bad = FlowParser.safeParse({ id: 'f' });

    expect(ok.success).toBe(true);
    expect(bad.success).toBe(false);
    if (!bad.success) {
      expect(bad.error.issues).toEqual(['name: Required', 'nodes: Required']);
    }
  });
});
