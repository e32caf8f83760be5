import { describe, expect, it } from 'vitest';
import { FlowEngine, analyze } from '../src/core/FlowEngine.js';
import { SAMPLE_DOCUMENT, branchingFlow, cyclicFlow, sampleFlow } from './fixtures.js';

describe('analyze', () => {
  it('combines validation with paths', () => {
    expect(analyze(sampleFlow())).toEqual({
      valid: true,
      errors: [],
      warnings: [],
      paths: [
        [{ nodeId: 'start' }, { nodeId: 'action', via: 'yes' }, { nodeId: 'end' }],
        [{ nodeId: 'start' }, { nodeId: 'end', via: 'no' }],
      ],
    });
  });

  it('still reports on invalid flows', () => {
    const report = analyze(cyclicFlow());

    expect(report.valid).toBe(false);
    expect(report.paths).toEqual([]);
  });
});

describe('FlowEngine', () => {
  it('uses the configured serializer backend', () => {
    const engine = new FlowEngine({ serializer: 'plain', logLevel: 'silent' });

    expect(engine.serialize(sampleFlow())).toBe(SAMPLE_DOCUMENT);
    expect(engine.exportFlow(sampleFlow()).filename).toBe('sample-flow.yaml');
    expect(engine.getLogger()).toBeNull();
  });

  it('logs the analysis outcome at info level', () => {
    const lines: string[] = [];
    const engine = new FlowEngine({ logLevel: 'info', colors: false }, { sink: (line) => lines.push(line) });

    engine.analyze(sampleFlow());

    expect(lines).toEqual([
      'INFO  [flowcert-engine] Flow is valid {"flowId":"sample-flow","errors":0,"warnings":0,"paths":2}',
    ]);
  });

  it('forwards to the pure functions', () => {
    const engine = new FlowEngine({ logLevel: 'silent' });
    const flow = branchingFlow(4);

    expect(engine.validate(flow).valid).toBe(true);
    expect(engine.enumeratePaths(flow)).toHaveLength(4);
    expect(engine.buildIndex(flow).outbound.get('start')).toHaveLength(4);
  });

  it('accepts an injected logger', () => {
    const engine = new FlowEngine({}, { logger: null });

    expect(engine.getLogger()).toBeNull();
    expect(engine.config.logLevel).toBe('info');
  });
});
