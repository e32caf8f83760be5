import { describe, expect, it, vi } from 'vitest';
import { StructuralValidator, validate } from '../src/validation/StructuralValidator.js';
import { EngineLogger } from '../src/logging/EngineLogger.js';
import { LogLevel } from '../src/types/log-types.js';
import { action, branchingFlow, cyclicFlow, edge, makeFlow, message, question } from './fixtures.js';

describe('StructuralValidator', () => {
  it('rejects an empty flow and stops there', () => {
    expect(validate(makeFlow([], [edge('a', 'b')]))).toEqual({
      valid: false,
      errors: ['Flow must contain at least one node.'],
      warnings: [],
    });
  });

  it('accepts a well-formed flow with no warnings', () => {
    const flow = makeFlow(
      [question('q', { expectedAnswers: ['yes', 'no'] }), action('a'), message('m')],
      [edge('q', 'a', 'yes'), edge('q', 'm', 'no'), edge('a', 'm')]
    );

    expect(validate(flow)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('reports a cycle and a missing start node for a looping flow', () => {
    const result = validate(cyclicFlow());

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Flow must contain at least one start node (no incoming edges).',
      'Cycle detected: start -> loop -> start',
    ]);
    expect(result.warnings).toEqual(['Unreachable nodes detected: end, loop, start']);
  });

  it('rejects answer labels outside expectedAnswers', () => {
    const flow = makeFlow(
      [question('q1', { question: 'Continue?', expectedAnswers: ['yes', 'no'] }), message('m1')],
      [edge('q1', 'm1', 'maybe')]
    );

    expect(validate(flow)).toEqual({
      valid: false,
      errors: ["Edge from question 'q1' uses label 'maybe' not present in expected answers."],
      warnings: [],
    });
  });

  it('does not check labels of questions without expectedAnswers, nor unlabelled edges', () => {
    const flow = makeFlow(
      [question('q1'), question('q2', { expectedAnswers: ['ok'] }), message('m')],
      [edge('q1', 'q2', 'anything'), edge('q2', 'm'), { source: 'q2', target: 'm', viaLabel: '', data: {} }]
    );

    expect(validate(flow).errors).toEqual([]);
  });

  it('reports duplicate node ids sorted', () => {
    const flow = makeFlow(
      [question('q'), message('z'), message('b'), action('z'), message('b'), message('m')],
      [edge('q', 'm')]
    );

    expect(validate(flow).errors[0]).toBe('Duplicate node identifiers detected: b, z');
  });

  it('reports edges that reference undeclared nodes', () => {
    const flow = makeFlow([question('only', { question: 'Hi?' })], [edge('only', 'ghost')]);

    expect(validate(flow)).toEqual({
      valid: false,
      errors: [
        "Edge references unknown target node 'ghost'.",
        'Flow must contain at least one terminal message node (message without outgoing edges).',
      ],
      warnings: [],
    });
  });

  it('reports an unknown source separately from an unknown target', () => {
    const flow = makeFlow([question('q'), message('m')], [edge('q', 'm'), edge('nowhere', 'void')]);

    expect(validate(flow).errors).toEqual([
      "Edge references unknown source node 'nowhere'.",
      "Edge references unknown target node 'void'.",
    ]);
  });

  it('warns about repeated edges without failing', () => {
    const flow = makeFlow(
      [question('q', { expectedAnswers: ['yes'] }), message('m')],
      [edge('q', 'm', 'yes'), edge('q', 'm', 'yes'), edge('q', 'm'), edge('q', 'm')]
    );

    expect(validate(flow)).toEqual({
      valid: true,
      errors: [],
      warnings: [
        "Duplicate edge detected from 'q' to 'm' with label 'yes'.",
        "Duplicate edge detected from 'q' to 'm' with label ''.",
      ],
    });
  });

  it('warns about several start nodes and messages that do not terminate', () => {
    const flow = makeFlow(
      [question('first'), question('second'), message('message'), action('follow')],
      [edge('first', 'message'), edge('second', 'follow'), edge('message', 'follow')]
    );

    expect(validate(flow)).toEqual({
      valid: false,
      errors: ['Flow must contain at least one terminal message node (message without outgoing edges).'],
      warnings: [
        'Multiple start nodes detected; execution order may be ambiguous.',
        "Message node 'message' has outgoing edges and will not terminate the flow.",
      ],
    });
  });

  it('warns about nodes no start node reaches', () => {
    const flow = makeFlow(
      [question('q'), message('m'), action('x'), action('y')],
      [edge('q', 'm'), edge('x', 'y'), edge('y', 'x')]
    );

    const result = validate(flow);

    expect(result.errors).toEqual(['Cycle detected: x -> y -> x']);
    expect(result.warnings).toEqual(['Unreachable nodes detected: x, y']);
  });

  it.each([5, 12, 32])('accepts %i parallel branches into one terminal', (count) => {
    expect(validate(branchingFlow(count))).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('keeps valid in step with errors', () => {
    for (const flow of [cyclicFlow(), branchingFlow(3), makeFlow([], [])]) {
      const result = StructuralValidator.validate(flow);
      expect(result.valid).toBe(result.errors.length === 0);
    }
  });

  it('logs a summary at debug level', () => {
    const sink = vi.fn();
    const logger = new EngineLogger({ level: LogLevel.DEBUG, colors: false, timestamp: false, sink });

    validate(cyclicFlow(), { logger });

    expect(sink).toHaveBeenCalledTimes(1);
    expect(sink.mock.calls[0][0]).toBe(
      'DEBUG [flowcert] Structural validation finished {"flowId":"flow","errors":2,"warnings":1}'
    );
  });
});
